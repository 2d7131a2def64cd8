import { createLogger } from '../utils/logger.js';
import { sleep } from '../utils/time.js';

const logger = createLogger('debouncer');

interface DebounceEntry {
  query: string;
  timestamp: number;
}

/**
 * Absorbs bursts of free-text searches. Only the most recent query survives
 * once no new query has been recorded for the quiet period.
 */
export class SearchDebouncer {
  private latest: DebounceEntry = { query: '', timestamp: 0 };

  constructor(private readonly quietPeriod: number) {}

  /**
   * Records the query and waits for the quiet period. Resolves `false` when
   * a different query was recorded in the meantime.
   */
  public async settle(query: string): Promise<boolean> {
    this.latest = { query, timestamp: Date.now() };

    let remaining = this.quietPeriod;
    while (remaining > 0) {
      await sleep(remaining);
      remaining = this.latest.timestamp + this.quietPeriod - Date.now();
    }

    if (this.latest.query !== query) {
      logger.debug(`Search "${query}" superseded by "${this.latest.query}"`);
      return false;
    }
    return true;
  }
}
