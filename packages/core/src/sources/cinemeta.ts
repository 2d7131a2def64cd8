import { z } from 'zod';
import { ratio } from 'fuzzball';
import { createMediaTarget } from '../schemas.js';
import type { MediaKind, MediaTarget } from '../schemas.js';
import { parseSearchQuery } from '../parser/query.js';
import { ServiceError } from '../utils/errors.js';
import { requestJson } from '../utils/http.js';
import type { RequestPolicy } from '../utils/http.js';
import { createLogger } from '../utils/logger.js';
import type { TargetIdentifier } from './base.js';

const logger = createLogger('cinemeta');

const SERVICE = 'Cinemeta';

const MetaSchema = z.object({
  id: z.string(),
  imdb_id: z.string().optional(),
  name: z.string().default(''),
});

const CatalogSchema = z.object({
  metas: z.array(MetaSchema).default([]),
});

type Meta = z.infer<typeof MetaSchema>;

export interface CinemetaConfig {
  baseUrl: string;
  policy: RequestPolicy;
}

/**
 * Picks the result whose name is closest to the query. Equal scores keep the
 * catalogue's order.
 */
export function bestMatch(query: string, metas: readonly Meta[]): Meta | undefined {
  let best: Meta | undefined;
  let bestScore = -1;
  for (const meta of metas) {
    const score = ratio(query, meta.name);
    if (score > bestScore) {
      best = meta;
      bestScore = score;
    }
  }
  return best;
}

export class CinemetaCatalog implements TargetIdentifier {
  private readonly baseUrl: string;
  private readonly policy: RequestPolicy;

  constructor(config: CinemetaConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.policy = config.policy;
  }

  private async searchCatalog(kind: MediaKind, query: string): Promise<Meta[]> {
    const type = kind === 'show' ? 'series' : 'movie';
    const { metas } = await requestJson(
      `${this.baseUrl}/catalog/${type}/top/search=${encodeURIComponent(query)}.json`,
      { service: SERVICE, schema: CatalogSchema, policy: this.policy }
    );
    return metas;
  }

  /**
   * Resolves a free-text query. An IMDb id in the query is used as is; a
   * season token makes the target a show. Otherwise the movie catalogue is
   * searched first, then the series catalogue.
   */
  public async identify(query: string): Promise<MediaTarget> {
    const parsed = parseSearchQuery(query);
    const seasons = parsed.season !== undefined ? [parsed.season] : [];
    let kind: MediaKind = parsed.season !== undefined ? 'show' : 'movie';

    if (parsed.imdbId) {
      return createMediaTarget({
        kind,
        externalId: parsed.imdbId,
        seasons,
        episode: parsed.episode,
      });
    }

    let metas = await this.searchCatalog(kind, parsed.text);
    if (metas.length === 0 && kind === 'movie') {
      kind = 'show';
      metas = await this.searchCatalog(kind, parsed.text);
    }

    const match = bestMatch(parsed.text, metas);
    if (!match) {
      throw new ServiceError(`No ${SERVICE} results for "${parsed.text}"`, {
        service: SERVICE,
        statusCode: 404,
        statusText: 'Not Found',
        code: 'NOT_FOUND',
      });
    }

    logger.debug(`Identified "${query}" as ${match.name}`, {
      kind,
      id: match.imdb_id ?? match.id,
    });
    return createMediaTarget({
      kind,
      externalId: match.imdb_id ?? match.id,
      seasons,
      episode: parsed.episode,
    });
  }
}
