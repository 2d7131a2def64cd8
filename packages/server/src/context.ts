import type { RankingProfile, ReleaseResolver } from '@resolvarr/core';

export interface AppContext {
  resolver: ReleaseResolver;
  profiles: readonly RankingProfile[];
}
