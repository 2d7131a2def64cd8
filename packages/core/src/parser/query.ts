import { EPISODE_PATTERN, SEASON_PATTERN } from './files.js';

const IMDB_ID_PATTERN = /tt\d+/i;

export interface ParsedQuery {
  /** The query with its season and episode tokens removed. */
  text: string;
  imdbId?: string;
  season?: number;
  episode?: number;
}

const globalPattern = (pattern: RegExp) =>
  new RegExp(pattern.source, `${pattern.flags}g`);

/**
 * Extracts an IMDb id and season/episode tokens from a free-text search.
 * Episode tokens are only read once a season token was found.
 */
export function parseSearchQuery(query: string): ParsedQuery {
  const imdbId = IMDB_ID_PATTERN.exec(query)?.[0]?.toLowerCase();
  const seasonMatch = SEASON_PATTERN.exec(query);
  if (seasonMatch?.[1] === undefined) {
    return { text: query.trim(), ...(imdbId ? { imdbId } : {}) };
  }

  const episodeMatch = EPISODE_PATTERN.exec(query);
  const text = query
    .replace(globalPattern(SEASON_PATTERN), '')
    .replace(globalPattern(EPISODE_PATTERN), '')
    .replace(/\s+/g, ' ')
    .trim();

  return {
    text,
    season: Number(seasonMatch[1]),
    ...(episodeMatch?.[1] !== undefined
      ? { episode: Number(episodeMatch[1]) }
      : {}),
    ...(imdbId ? { imdbId } : {}),
  };
}

/** Normalised form used to key coalescer slots and the debounce register. */
export const normaliseQuery = (query: string) =>
  query.trim().replace(/\s+/g, ' ').toLowerCase();
