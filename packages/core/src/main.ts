import { targetKey } from './schemas.js';
import type {
  Candidate,
  MediaTarget,
  RankingProfile,
  ResolutionResult,
} from './schemas.js';
import { parseTitles } from './parser/title.js';
import { normaliseQuery } from './parser/query.js';
import { checkAvailability, getDebridService } from './debrid/index.js';
import type { CacheLookup, DownloadService } from './debrid/index.js';
import { CinemetaCatalog, TorrentioSource } from './sources/index.js';
import type { SourceAdapter, TargetIdentifier } from './sources/index.js';
import { filterByTarget, rankCandidates } from './streams/index.js';
import { SearchDebouncer, SingleFlight } from './coalescer/index.js';
import { SelectionLedger } from './ledger/ledger.js';
import {
  Env,
  ResolutionError,
  createLogger,
  getTimeTakenSincePoint,
} from './utils/index.js';
import type { RequestPolicy } from './utils/index.js';

const logger = createLogger('core');

export type DownloadOutcome =
  | { status: 'downloaded'; candidate: Candidate; offset: number }
  | { status: 'failed' }
  | { status: 'not_found' };

export interface ReleaseResolverOptions {
  source: SourceAdapter;
  identifier: TargetIdentifier;
  cache: CacheLookup;
  downloader: DownloadService;
  ledger: SelectionLedger;
  debouncer: SearchDebouncer;
  /** See `SingleFlightOptions.snapshotTtl`. */
  snapshotTtl?: number;
}

export class ReleaseResolver {
  private readonly options: ReleaseResolverOptions;
  private readonly flights: SingleFlight<Candidate[]>;

  constructor(options: ReleaseResolverOptions) {
    this.options = options;
    this.flights = new SingleFlight({ snapshotTtl: options.snapshotTtl });
  }

  public get ledger(): SelectionLedger {
    return this.options.ledger;
  }

  /**
   * Fetches, parses, checks and structurally filters the releases of one
   * target. Runs at most once at a time per target.
   */
  private async fetchSnapshot(target: MediaTarget): Promise<Candidate[]> {
    const start = Date.now();
    const entries = await this.options.source.search(target);
    const candidates = parseTitles(entries);
    const available = await checkAvailability(candidates, this.options.cache);
    const snapshot = filterByTarget(available, target);
    logger.info(
      `Resolved ${snapshot.length} releases for ${targetKey(target)} in ${getTimeTakenSincePoint(start)}`,
      {
        fetched: entries.length,
        parsed: candidates.length,
        cached: available.length,
      }
    );
    return snapshot;
  }

  private async coalesce(
    key: string,
    task: () => Promise<Candidate[]>
  ): Promise<Candidate[]> {
    try {
      return await this.flights.run(key, task);
    } catch (error) {
      throw new ResolutionError(
        `Resolution of ${key} failed: ${error instanceof Error ? error.message : String(error)}`,
        key,
        { cause: error }
      );
    }
  }

  // Each profile ranks its own copy of the snapshot.
  private publish(
    snapshot: readonly Candidate[],
    profiles: readonly RankingProfile[]
  ): ResolutionResult {
    const result: ResolutionResult = {};
    for (const profile of profiles) {
      const ranked = rankCandidates(structuredClone([...snapshot]), profile);
      result[profile.name] = this.options.ledger.put(ranked);
    }
    return result;
  }

  public async resolve(
    target: MediaTarget,
    profiles: readonly RankingProfile[]
  ): Promise<ResolutionResult> {
    const key = targetKey(target);
    const snapshot = await this.coalesce(key, () => this.fetchSnapshot(target));
    return this.publish(snapshot, profiles);
  }

  /**
   * Resolves a free-text query once it has settled. Returns an empty result
   * when a newer query superseded it.
   */
  public async resolveSearch(
    query: string,
    profiles: readonly RankingProfile[]
  ): Promise<ResolutionResult> {
    const normalised = normaliseQuery(query);
    if (!(await this.options.debouncer.settle(normalised))) {
      return {};
    }
    const snapshot = await this.coalesce(`search:${normalised}`, async () =>
      this.fetchSnapshot(await this.options.identifier.identify(query))
    );
    return this.publish(snapshot, profiles);
  }

  public selectForDownload(handleId: string, offset: number): Candidate | undefined {
    return this.options.ledger.get(handleId, offset);
  }

  /**
   * Downloads the candidate at `offset`, falling back to each later candidate
   * of the ranking until one succeeds.
   */
  public async download(handleId: string, offset: number): Promise<DownloadOutcome> {
    const candidates = this.options.ledger.remaining(handleId, offset);
    if (candidates.length === 0) {
      return { status: 'not_found' };
    }

    for (const [index, candidate] of candidates.entries()) {
      if (await this.options.downloader.download(candidate)) {
        logger.info(`Downloaded ${candidate.title}`, {
          handle: handleId,
          offset: offset + index,
        });
        return { status: 'downloaded', candidate, offset: offset + index };
      }
    }
    logger.warn(
      `None of the ${candidates.length} releases from offset ${offset} of ${handleId} could be downloaded`
    );
    return { status: 'failed' };
  }
}

export function createReleaseResolver(): ReleaseResolver {
  const policy: RequestPolicy = {
    timeout: Env.REQUEST_TIMEOUT,
    maxAttempts: Env.REQUEST_MAX_ATTEMPTS,
    retryCodes: Env.REQUEST_RETRY_CODES,
    retryInterval: Env.REQUEST_RETRY_INTERVAL,
  };
  const debrid = getDebridService('realdebrid', Env.REALDEBRID_API_KEY);

  return new ReleaseResolver({
    source: new TorrentioSource({ manifestUrl: Env.TORRENTIO_URL, policy }),
    identifier: new CinemetaCatalog({ baseUrl: Env.CINEMETA_URL, policy }),
    cache: debrid,
    downloader: debrid,
    ledger: new SelectionLedger({
      maxEntries: Env.LEDGER_MAX_ENTRIES,
      ttl: Env.LEDGER_TTL,
    }),
    debouncer: new SearchDebouncer(Env.SEARCH_DEBOUNCE),
    snapshotTtl: Env.SNAPSHOT_TTL,
  });
}
