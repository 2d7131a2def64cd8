import { createLogger } from '../utils/logger.js';

const logger = createLogger('coalescer');

export interface SingleFlightOptions {
  /**
   * How long a successful result is handed to later callers without running
   * again, in milliseconds. 0 disables reuse.
   */
  snapshotTtl?: number;
}

interface Snapshot<T> {
  value: T;
  createdAt: number;
}

/**
 * Runs at most one task per key at a time. Callers arriving while a key is
 * resolving receive the promise of the running task, so they observe its
 * result or its failure. The key is released when the task settles.
 */
export class SingleFlight<T> {
  private readonly inflight = new Map<string, Promise<T>>();
  private readonly snapshots = new Map<string, Snapshot<T>>();
  private readonly snapshotTtl: number;

  constructor(options: SingleFlightOptions = {}) {
    this.snapshotTtl = options.snapshotTtl ?? 0;
  }

  public isResolving(key: string): boolean {
    return this.inflight.has(key);
  }

  public get size(): number {
    return this.inflight.size;
  }

  /** Number of results currently held for reuse. */
  public get snapshotCount(): number {
    return this.snapshots.size;
  }

  private pruneSnapshots(now: number): void {
    for (const [key, snapshot] of this.snapshots) {
      if (now - snapshot.createdAt >= this.snapshotTtl) {
        this.snapshots.delete(key);
      }
    }
  }

  private freshSnapshot(key: string): Snapshot<T> | undefined {
    if (this.snapshotTtl <= 0) return undefined;
    this.pruneSnapshots(Date.now());
    return this.snapshots.get(key);
  }

  public run(key: string, task: () => Promise<T>): Promise<T> {
    const running = this.inflight.get(key);
    if (running) {
      logger.debug(`Joining running resolution for ${key}`);
      return running;
    }

    const snapshot = this.freshSnapshot(key);
    if (snapshot) {
      logger.debug(`Reusing snapshot for ${key}`);
      return Promise.resolve(snapshot.value);
    }

    // The task starts on a later tick, after the slot is registered.
    const flight = Promise.resolve()
      .then(task)
      .then((value) => {
        if (this.snapshotTtl > 0) {
          this.snapshots.set(key, { value, createdAt: Date.now() });
        }
        return value;
      })
      .finally(() => {
        this.inflight.delete(key);
      });
    this.inflight.set(key, flight);
    return flight;
  }
}
