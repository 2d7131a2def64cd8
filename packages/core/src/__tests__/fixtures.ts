import { createVersion, promotePrimaryVersion } from '../debrid/availability.js';
import type { Candidate, FileEntry, Version } from '../schemas.js';

export const HASH_A = 'a'.repeat(40);
export const HASH_B = 'b'.repeat(40);
export const HASH_C = 'c'.repeat(40);

export function fileEntry(overrides: Partial<FileEntry> = {}): FileEntry {
  return {
    id: '1',
    name: 'Movie.2020.1080p.mkv',
    sizeGB: 1,
    isVideo: true,
    isSubtitle: false,
    ...overrides,
  };
}

/** A version holding `count` episode files of one season. */
export function seasonVersion(season: number, count: number): Version {
  return createVersion(
    Array.from({ length: count }, (_, index) =>
      fileEntry({
        id: `${season}-${index + 1}`,
        name: `Show.S${season}E${index + 1}.mkv`,
        season,
        episode: index + 1,
      })
    )
  );
}

export function makeCandidate(overrides: Partial<Candidate> = {}): Candidate {
  return {
    title: 'Release',
    languages: ['EN'],
    resolution: 1080,
    sizeGB: 1,
    seeders: 0,
    sourceGroup: 'unknown',
    contentHash: HASH_A,
    magnetURI: `magnet:?xt=urn:btih:${HASH_A}&dn=&tr=`,
    cached: [],
    versions: [],
    videoCount: 1,
    episodeCount: 1,
    seasons: [],
    ...overrides,
  };
}

/** A candidate whose aggregates are promoted from its first version. */
export function candidateWithVersions(
  versions: Version[],
  overrides: Partial<Candidate> = {}
): Candidate {
  const candidate = makeCandidate({ ...overrides, versions });
  promotePrimaryVersion(candidate);
  return candidate;
}
