import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { RawEntrySchema } from '../schemas.js';
import type { Candidate, RawEntry } from '../schemas.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('parser');

const FLAG_LANGUAGES = z
  .record(z.string(), z.string())
  .parse(
    JSON.parse(
      readFileSync(new URL('./flag-languages.json', import.meta.url), 'utf8')
    )
  );

const FLAG_REGEX = /[\u{1F1E6}-\u{1F1FF}]{2}/gu;
const RESOLUTION_REGEX = /(2160|1080|720|480)[pi]/i;
const SIZE_REGEX = /💾\s*(\d+(?:[.,]\d+)?)\s*(GB|MB)/i;
const SEEDERS_REGEX = /👤\s*(\d+)/;
const SOURCE_REGEX = /⚙️?[^\S\n]*([^\s\uFE0F].*)$/m;

const REGIONAL_INDICATOR_A = 0x1f1e6;

function flagToRegion(flag: string): string {
  return Array.from(flag, (char) =>
    String.fromCharCode((char.codePointAt(0) ?? 0) - REGIONAL_INDICATOR_A + 65)
  ).join('');
}

export function parseLanguages(text: string): string[] {
  const flags = text.match(FLAG_REGEX) ?? [];
  if (flags.length === 0) {
    return ['EN'];
  }
  return flags.map((flag) => FLAG_LANGUAGES[flagToRegion(flag)] ?? flag);
}

export function parseResolution(text: string): number {
  const match = RESOLUTION_REGEX.exec(text);
  return match?.[1] !== undefined ? Number(match[1]) : 0;
}

export function parseSize(text: string): number {
  const match = SIZE_REGEX.exec(text);
  if (match?.[1] === undefined || match[2] === undefined) {
    return 0;
  }
  const value = Number(match[1].replace(',', '.'));
  return match[2].toUpperCase() === 'MB' ? value / 1000 : value;
}

export function parseSeeders(text: string): number {
  const match = SEEDERS_REGEX.exec(text);
  return match?.[1] !== undefined ? Number(match[1]) : 0;
}

export function parseSourceGroup(text: string): string {
  const group = SOURCE_REGEX.exec(text)?.[1]?.trim();
  return group ? group : 'unknown';
}

export const createMagnetURI = (hash: string) =>
  `magnet:?xt=urn:btih:${hash}&dn=&tr=`;

/**
 * Turns one raw search result into a Candidate. Throws a ZodError when the
 * entry has no title or no valid info hash.
 */
export function parseTitle(raw: RawEntry): Candidate {
  const { title, contentHash } = RawEntrySchema.parse(raw);
  const hash = contentHash.toLowerCase();
  const firstLine = title.split('\n')[0] ?? '';
  return {
    title: firstLine.trim().replaceAll(' ', '.'),
    languages: parseLanguages(title),
    resolution: parseResolution(title),
    sizeGB: parseSize(title),
    seeders: parseSeeders(title),
    sourceGroup: parseSourceGroup(title),
    contentHash: hash,
    magnetURI: createMagnetURI(hash),
    cached: [],
    versions: [],
    videoCount: 0,
    episodeCount: 0,
    seasons: [],
  };
}

/**
 * Parses every entry, skipping the malformed ones.
 */
export function parseTitles(entries: readonly RawEntry[]): Candidate[] {
  const candidates: Candidate[] = [];
  for (const entry of entries) {
    try {
      candidates.push(parseTitle(entry));
    } catch (error) {
      logger.debug(
        `Skipping malformed entry: ${error instanceof z.ZodError ? z.prettifyError(error) : String(error)}`,
        { title: entry.title }
      );
    }
  }
  if (candidates.length < entries.length) {
    logger.verbose(
      `Skipped ${entries.length - candidates.length} of ${entries.length} entries`
    );
  }
  return candidates;
}
