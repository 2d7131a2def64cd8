import { randomUUID } from 'node:crypto';
import type { Candidate, ResolutionHandle } from '../schemas.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ledger');

export interface LedgerOptions {
  /** Handles kept at most; the oldest is evicted first. */
  maxEntries: number;
  /** Lifetime of a handle in milliseconds. 0 or less keeps handles forever. */
  ttl: number;
}

interface LedgerEntry {
  handle: ResolutionHandle;
  createdAt: number;
}

/**
 * Write-once store of ranked result sets, addressed by an opaque handle and
 * an offset into the ranking.
 */
export class SelectionLedger {
  private readonly entries = new Map<string, LedgerEntry>();
  private readonly options: LedgerOptions;

  constructor(options: LedgerOptions) {
    this.options = options;
  }

  public get size(): number {
    return this.entries.size;
  }

  private isExpired(entry: LedgerEntry, now: number): boolean {
    return this.options.ttl > 0 && now - entry.createdAt >= this.options.ttl;
  }

  private prune(now: number): void {
    for (const [id, entry] of this.entries) {
      if (this.isExpired(entry, now)) this.entries.delete(id);
    }
    while (this.entries.size >= this.options.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      logger.debug(`Evicted handle ${oldest.value}`);
    }
  }

  public put(candidates: readonly Candidate[]): ResolutionHandle {
    const now = Date.now();
    this.prune(now);
    const handle: ResolutionHandle = Object.freeze({
      id: randomUUID(),
      candidates: Object.freeze([...candidates]),
    });
    this.entries.set(handle.id, { handle, createdAt: now });
    return handle;
  }

  public getHandle(id: string): ResolutionHandle | undefined {
    const entry = this.entries.get(id);
    if (!entry) return undefined;
    if (this.isExpired(entry, Date.now())) {
      this.entries.delete(id);
      return undefined;
    }
    return entry.handle;
  }

  public get(id: string, offset: number): Candidate | undefined {
    if (!Number.isInteger(offset) || offset < 0) return undefined;
    return this.getHandle(id)?.candidates[offset];
  }

  /** The candidates from `offset` to the end of the ranking. */
  public remaining(id: string, offset: number): readonly Candidate[] {
    if (!Number.isInteger(offset) || offset < 0) return [];
    return this.getHandle(id)?.candidates.slice(offset) ?? [];
  }
}
