import { z } from 'zod';
import pLimit from 'p-limit';
import type { Candidate, Version } from '../schemas.js';
import { ServiceError } from '../utils/errors.js';
import { requestJson } from '../utils/http.js';
import type { RequestPolicy } from '../utils/http.js';
import { createLogger } from '../utils/logger.js';
import { getTimeTakenSincePoint } from '../utils/time.js';
import type { DebridService, FileGroup } from './base.js';

const logger = createLogger('realdebrid');

const SERVICE = 'Real-Debrid';

const FileGroupSchema = z.record(
  z.string(),
  z.object({
    filename: z.string(),
    filesize: z.number(),
  })
);

// Unknown hashes are reported as an empty array instead of an object.
const InstantAvailabilitySchema = z.record(
  z.string(),
  z.union([
    z.object({ rd: z.array(FileGroupSchema).optional() }),
    z.array(z.unknown()),
  ])
);

const AddMagnetSchema = z.object({
  id: z.string(),
});

const TorrentInfoSchema = z.object({
  id: z.string(),
  filename: z.string(),
  links: z.array(z.string()),
});

const UnrestrictSchema = z.object({
  download: z.string(),
});

export interface RealDebridConfig {
  token: string;
  baseUrl: string;
  policy: RequestPolicy;
  /** Maximum number of hashes per availability request. */
  batchSize: number;
  /** Maximum number of availability requests in flight. */
  concurrency: number;
}

export class RealDebridService implements DebridService {
  readonly providerCode = 'RD';
  private readonly config: RealDebridConfig;

  constructor(config: RealDebridConfig) {
    this.config = config;
  }

  private request<T extends z.ZodType>(
    path: string,
    schema: T,
    options: { method?: 'GET' | 'POST' | 'DELETE'; form?: Record<string, string> } = {}
  ): Promise<z.infer<T>> {
    return requestJson(`${this.config.baseUrl}${path}`, {
      service: SERVICE,
      schema,
      policy: this.config.policy,
      method: options.method,
      form: options.form,
      headers: { authorization: `Bearer ${this.config.token}` },
      secrets: [this.config.token],
    });
  }

  public async checkAvailability(
    hashes: readonly string[]
  ): Promise<Map<string, FileGroup[]>> {
    const result = new Map<string, FileGroup[]>();
    if (hashes.length === 0) {
      return result;
    }

    const start = Date.now();
    const batches: string[][] = [];
    for (let i = 0; i < hashes.length; i += this.config.batchSize) {
      batches.push(hashes.slice(i, i + this.config.batchSize));
    }

    const limit = pLimit(this.config.concurrency);
    const responses = await Promise.all(
      batches.map((batch) =>
        limit(() =>
          this.request(
            `/torrents/instantAvailability/${batch.join('/')}`,
            InstantAvailabilitySchema
          )
        )
      )
    );

    for (const response of responses) {
      for (const [hash, entry] of Object.entries(response)) {
        if (Array.isArray(entry) || !entry.rd || entry.rd.length === 0) {
          continue;
        }
        result.set(hash.toLowerCase(), entry.rd);
      }
    }

    logger.debug(
      `Checked ${hashes.length} hashes in ${batches.length} requests, ${result.size} cached`,
      { time: getTimeTakenSincePoint(start) }
    );
    return result;
  }

  /**
   * Adds the release and selects the files of each version in turn until one
   * produces a link per selected file. A version packed as an archive yields
   * fewer links. Its torrent is deleted before the next version is tried, and
   * so is the torrent of a version whose requests fail.
   */
  public async download(candidate: Candidate): Promise<boolean> {
    for (const [index, version] of candidate.versions.entries()) {
      try {
        if (await this.downloadVersion(candidate, version)) {
          return true;
        }
        logger.warn(
          `Version ${index + 1}/${candidate.versions.length} of ${candidate.title} did not produce a link per file, trying the next one`
        );
      } catch (error) {
        if (!(error instanceof ServiceError)) {
          throw error;
        }
        logger.error(
          `Failed to download version ${index + 1}/${candidate.versions.length} of ${candidate.title}: ${error.message}`
        );
      }
    }
    return false;
  }

  // A failed delete is logged; the caller moves on to the next version.
  private async deleteTorrent(id: string): Promise<void> {
    try {
      await this.request(`/torrents/delete/${id}`, z.unknown(), {
        method: 'DELETE',
      });
    } catch (error) {
      if (!(error instanceof ServiceError)) {
        throw error;
      }
      logger.warn(`Failed to delete torrent ${id}: ${error.message}`);
    }
  }

  private async downloadVersion(
    candidate: Candidate,
    version: Version
  ): Promise<boolean> {
    const { id } = await this.request('/torrents/addMagnet', AddMagnetSchema, {
      method: 'POST',
      form: { magnet: candidate.magnetURI },
    });

    const fileIds = version.files.map((file) => file.id);
    try {
      await this.request(`/torrents/selectFiles/${id}`, z.unknown(), {
        method: 'POST',
        form: { files: fileIds.join(',') },
      });
      const info = await this.request(`/torrents/info/${id}`, TorrentInfoSchema);

      if (info.links.length !== fileIds.length) {
        await this.deleteTorrent(id);
        return false;
      }

      for (const link of info.links) {
        await this.request('/unrestrict/link', UnrestrictSchema, {
          method: 'POST',
          form: { link },
        });
      }
      logger.info(`Added ${info.filename} to ${SERVICE}`, {
        hash: candidate.contentHash,
        links: info.links.length,
      });
      return true;
    } catch (error) {
      await this.deleteTorrent(id);
      throw error;
    }
  }
}
