import { z } from 'zod';
import type { MediaTarget, RawEntry } from '../schemas.js';
import { requestJson } from '../utils/http.js';
import type { RequestPolicy } from '../utils/http.js';
import { createLogger } from '../utils/logger.js';
import { getTimeTakenSincePoint } from '../utils/time.js';
import type { SourceAdapter } from './base.js';

const logger = createLogger('torrentio');

const StreamSchema = z.object({
  name: z.string().optional(),
  title: z.string().optional(),
  description: z.string().optional(),
  infoHash: z.string().optional(),
});

const StreamResponseSchema = z.object({
  streams: z.array(z.unknown()).default([]),
});

export interface TorrentioConfig {
  /** Manifest URL, its configuration segment included. */
  manifestUrl: string;
  policy: RequestPolicy;
}

export class TorrentioSource implements SourceAdapter {
  readonly name = 'Torrentio';
  private readonly baseUrl: string;
  private readonly policy: RequestPolicy;

  constructor(config: TorrentioConfig) {
    this.baseUrl = config.manifestUrl.replace(/\/manifest\.json$/, '');
    this.policy = config.policy;
  }

  /**
   * Builds the stream URL. Shows are always requested at one episode: the
   * first requested season (or 1) and the requested episode (or 1).
   */
  public buildStreamUrl(target: MediaTarget): string {
    if (target.kind === 'movie') {
      return `${this.baseUrl}/stream/movie/${target.externalId}.json`;
    }
    const season = target.seasons[0] ?? 1;
    const episode = target.episode ?? 1;
    return `${this.baseUrl}/stream/series/${target.externalId}:${season}:${episode}.json`;
  }

  public async search(target: MediaTarget): Promise<RawEntry[]> {
    const start = Date.now();
    const { streams } = await requestJson(this.buildStreamUrl(target), {
      service: this.name,
      schema: StreamResponseSchema,
      policy: this.policy,
    });

    const entries: RawEntry[] = [];
    for (const stream of streams) {
      const parsed = StreamSchema.safeParse(stream);
      const title = parsed.data?.title ?? parsed.data?.description;
      const infoHash = parsed.data?.infoHash;
      if (!title || !infoHash) {
        logger.debug('Skipping stream without a title or info hash', {
          name: parsed.data?.name,
        });
        continue;
      }
      entries.push({ title, contentHash: infoHash });
    }

    logger.info(`Found ${entries.length} releases for ${target.externalId}`, {
      time: getTimeTakenSincePoint(start),
    });
    return entries;
  }
}
