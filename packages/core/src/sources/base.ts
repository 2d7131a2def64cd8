import type { MediaTarget, RawEntry } from '../schemas.js';

export interface SourceAdapter {
  readonly name: string;
  search(target: MediaTarget): Promise<RawEntry[]>;
}

/** Turns free-text search input into a concrete target. */
export interface TargetIdentifier {
  identify(query: string): Promise<MediaTarget>;
}
