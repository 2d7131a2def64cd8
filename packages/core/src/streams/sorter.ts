import type { Candidate, RankingProfile, SortKey } from '../schemas.js';
import { createLogger } from '../utils/logger.js';
import { getTimeTakenSincePoint } from '../utils/time.js';
import { evaluatePredicate, sortKeyValue } from './expression.js';
import StreamLimiter from './limiter.js';

const logger = createLogger('sorter');

const EPISODE_COUNT_KEY: SortKey = { type: 'field', field: 'episodeCount' };

/**
 * Stable descending sort on one key, computing it once per candidate.
 */
export function sortByKey(candidates: Candidate[], key: SortKey): Candidate[] {
  return candidates
    .map((candidate) => ({ candidate, value: sortKeyValue(key, candidate) }))
    .sort((a, b) => b.value - a.value)
    .map(({ candidate }) => candidate);
}

class StreamSorter {
  private readonly profile: RankingProfile;

  constructor(profile: RankingProfile) {
    this.profile = profile;
  }

  public filter(candidates: Candidate[]): Candidate[] {
    return candidates.filter((candidate) =>
      this.profile.filters.every((predicate) =>
        evaluatePredicate(predicate, candidate)
      )
    );
  }

  /**
   * Sorts by episode count, then applies each rule in listed order. Every
   * pass is stable, so the last rule decides first and earlier rules only
   * order what it leaves tied.
   */
  public sort(candidates: Candidate[]): Candidate[] {
    return [EPISODE_COUNT_KEY, ...this.profile.sortRules].reduce(
      (sorted, key) => sortByKey(sorted, key),
      candidates
    );
  }
}

/**
 * Filters, sorts and truncates candidates for one profile. Output is
 * deterministic for identical input.
 */
export function rankCandidates(
  candidates: Candidate[],
  profile: RankingProfile
): Candidate[] {
  const start = Date.now();
  const sorter = new StreamSorter(profile);
  const filtered = sorter.filter(candidates);
  const ranked = new StreamLimiter(profile).limit(sorter.sort(filtered));
  logger.info(
    `Ranked ${ranked.length} releases for profile ${profile.name} (${candidates.length - filtered.length} filtered out) in ${getTimeTakenSincePoint(start)}`
  );
  return ranked;
}

export default StreamSorter;
