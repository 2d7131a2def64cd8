import type { Candidate, FileEntry, Version } from '../schemas.js';
import { classifyFile } from '../parser/files.js';
import { createLogger } from '../utils/logger.js';
import { getTimeTakenSincePoint } from '../utils/time.js';
import type { CacheLookup, FileGroup } from './base.js';

const logger = createLogger('availability');

/**
 * Builds a Version from its files. Seasons and episodes only count for video
 * files, and only when they are non-zero.
 */
export function createVersion(files: readonly FileEntry[]): Version {
  const seasons = new Set<number>();
  let totalSizeGB = 0;
  let videoCount = 0;
  let subtitleCount = 0;
  let episodeCount = 0;

  for (const file of files) {
    totalSizeGB += file.sizeGB;
    if (file.isSubtitle) subtitleCount++;
    if (!file.isVideo) continue;
    videoCount++;
    // season 0 and episode 0 mark extras
    if (file.season) seasons.add(file.season);
    if (file.episode) episodeCount++;
  }

  return Object.freeze({
    files: Object.freeze([...files]),
    totalSizeGB,
    videoCount,
    subtitleCount,
    episodeCount,
    seasons: Object.freeze([...seasons]),
  });
}

export function versionFromGroup(group: FileGroup): Version {
  return createVersion(
    Object.entries(group).map(([id, file]) =>
      classifyFile(id, file.filename, file.filesize)
    )
  );
}

const videoRatio = (version: Version) =>
  version.files.length > 0 ? version.videoCount / version.files.length : 0;

/**
 * Orders versions best first: most videos, then the highest share of videos
 * among all files. Equal versions keep their reported order.
 */
export function sortVersions(versions: readonly Version[]): Version[] {
  return [...versions].sort(
    (a, b) => b.videoCount - a.videoCount || videoRatio(b) - videoRatio(a)
  );
}

/** Copies the primary version's aggregates onto the candidate. */
export function promotePrimaryVersion(candidate: Candidate): void {
  const primary = candidate.versions[0];
  if (!primary) return;
  candidate.sizeGB = primary.totalSizeGB;
  candidate.videoCount = primary.videoCount;
  candidate.episodeCount = primary.episodeCount;
  candidate.seasons = [...primary.seasons];
}

/**
 * Keeps the first occurrence of every content hash.
 */
export function dedupeByHash(candidates: readonly Candidate[]): Candidate[] {
  const seen = new Set<string>();
  return candidates.filter((candidate) => {
    if (seen.has(candidate.contentHash)) return false;
    seen.add(candidate.contentHash);
    return true;
  });
}

/**
 * Checks every candidate against the cache in one batched lookup and expands
 * the reported file groupings into versions. Candidates the provider does not
 * report any grouping for are dropped. A failed lookup rejects.
 */
export async function checkAvailability(
  candidates: readonly Candidate[],
  lookup: CacheLookup
): Promise<Candidate[]> {
  const unique = dedupeByHash(candidates);
  if (unique.length === 0) {
    return [];
  }

  const start = Date.now();
  const availability = await lookup.checkAvailability(
    unique.map((candidate) => candidate.contentHash)
  );

  const available: Candidate[] = [];
  for (const candidate of unique) {
    const groups = availability.get(candidate.contentHash);
    if (!groups || groups.length === 0) continue;

    candidate.versions = sortVersions(groups.map(versionFromGroup));
    promotePrimaryVersion(candidate);
    candidate.cached = [...candidate.cached, lookup.providerCode];
    available.push(candidate);
  }

  logger.info(
    `${available.length} of ${unique.length} releases are cached on ${lookup.providerCode}`,
    { time: getTimeTakenSincePoint(start) }
  );
  return available;
}
