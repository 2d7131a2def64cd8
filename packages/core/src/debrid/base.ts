import type { Candidate } from '../schemas.js';

export interface ReportedFile {
  filename: string;
  /** Bytes. */
  filesize: number;
}

/** One file grouping reported for a hash, keyed by the provider's file id. */
export type FileGroup = Record<string, ReportedFile>;

export interface CacheLookup {
  /** Short provider code appended to `Candidate.cached`, e.g. `RD`. */
  readonly providerCode: string;
  /**
   * Reports the cached file groupings for each hash. Hashes the provider does
   * not know are absent from the result or map to an empty list.
   */
  checkAvailability(hashes: readonly string[]): Promise<Map<string, FileGroup[]>>;
}

export interface DownloadService {
  /** Resolves `true` once the provider has produced links for the release. */
  download(candidate: Candidate): Promise<boolean>;
}

export type DebridService = CacheLookup & DownloadService;
