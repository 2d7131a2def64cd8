import type { RankingProfile } from '@resolvarr/core';
import { APIError } from './responses.js';

/**
 * Selects profiles by a comma separated list of names, or all of them when
 * no names are given.
 */
export function selectProfiles(
  profiles: readonly RankingProfile[],
  names: string | undefined
): RankingProfile[] {
  const requested = (names ?? '')
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  if (requested.length === 0) {
    return [...profiles];
  }

  return requested.map((name) => {
    const profile = profiles.find((p) => p.name === name);
    if (!profile) {
      throw new APIError('BAD_REQUEST', 400, `Unknown profile: ${name}`);
    }
    return profile;
  });
}
