import type { Candidate, MediaTarget, Version } from '../schemas.js';
import { createLogger } from '../utils/logger.js';
import { getTimeTakenSincePoint } from '../utils/time.js';

const logger = createLogger('filterer');

type Coverage = Pick<Version, 'videoCount' | 'episodeCount' | 'seasons'>;

interface FilterStatistics {
  removed: Record<'noVideo' | 'seasonMismatch' | 'noVersions', number>;
  prunedVersions: number;
}

/**
 * Structural filter against the requested target. Applies to a candidate's
 * promoted aggregates and to each of its versions; a candidate left without
 * versions is dropped.
 */
class StreamFilterer {
  private readonly target: MediaTarget;
  private statistics: FilterStatistics = {
    removed: { noVideo: 0, seasonMismatch: 0, noVersions: 0 },
    prunedVersions: 0,
  };

  constructor(target: MediaTarget) {
    this.target = target;
  }

  private missingSeasons(coverage: Coverage): number {
    return this.target.seasons.filter(
      (season) => !coverage.seasons.includes(season)
    ).length;
  }

  public accepts(coverage: Coverage): boolean {
    if (this.target.kind === 'movie') {
      return coverage.videoCount > 0;
    }

    const missing = this.missingSeasons(coverage);
    if (this.target.seasons.length > 1) {
      return (
        missing <= this.target.seasons.length / 2 && coverage.episodeCount > 1
      );
    }
    if (this.target.episode === undefined) {
      return missing === 0 && coverage.episodeCount > 1;
    }
    return missing === 0 && coverage.episodeCount === 1;
  }

  public filter(candidates: Candidate[]): Candidate[] {
    const start = Date.now();
    const kept: Candidate[] = [];

    for (const candidate of candidates) {
      if (!this.accepts(candidate)) {
        if (this.target.kind === 'movie') this.statistics.removed.noVideo++;
        else this.statistics.removed.seasonMismatch++;
        continue;
      }

      const versions = candidate.versions.filter((version) =>
        this.accepts(version)
      );
      this.statistics.prunedVersions += candidate.versions.length - versions.length;
      if (versions.length === 0) {
        this.statistics.removed.noVersions++;
        continue;
      }

      candidate.versions = versions;
      candidate.kind = this.target.kind;
      kept.push(candidate);
    }

    logger.info(
      `Kept ${kept.length} of ${candidates.length} releases for ${this.target.kind} ${this.target.externalId} in ${getTimeTakenSincePoint(start)}`,
      this.statistics
    );
    return kept;
  }
}

export function filterByTarget(
  candidates: Candidate[],
  target: MediaTarget
): Candidate[] {
  return new StreamFilterer(target).filter(candidates);
}

export default StreamFilterer;
