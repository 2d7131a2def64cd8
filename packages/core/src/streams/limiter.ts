import type { Candidate, RankingProfile } from '../schemas.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('limiter');

class StreamLimiter {
  private readonly profile: RankingProfile;

  constructor(profile: RankingProfile) {
    this.profile = profile;
  }

  public limit(candidates: Candidate[]): Candidate[] {
    const { resultLimit, name } = this.profile;
    if (candidates.length <= resultLimit) {
      return candidates;
    }
    logger.verbose(
      `Limited ${candidates.length} releases to ${resultLimit} for profile ${name}`
    );
    return candidates.slice(0, resultLimit);
  }
}

export default StreamLimiter;
