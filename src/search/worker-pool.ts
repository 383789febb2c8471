/**
 * Worker Pool
 * Bounded concurrency for per-file search tasks.
 *
 * At most `concurrency` tasks run at once; further tasks wait for a slot in
 * FIFO order, and the producer does not pull the next candidate until one is
 * free. One pool serves one request and is idle again when runAll returns.
 */

import { DEFAULT_WORKER_COUNT, LOG_PREFIX, VERBOSE } from '../config.js';
import { toSkipReason } from '../filesystem/read.js';
import type { SkipReason, SkippedFile } from '../filesystem/types.js';

interface QueueEntry {
  resolve: () => void;
}

export type FileTask<T> = (file: string) => Promise<T[]>;

export interface RunOptions {
  /** Stop dispatching when aborted; in-flight tasks still settle */
  signal?: AbortSignal;
  /** Decide whether a task failure is a per-file skip (non-null) or fatal (null) */
  isolate?: (error: unknown) => SkipReason | null;
}

export interface PoolRunResult<T> {
  /** Records in task completion order */
  records: T[];
  skipped: SkippedFile[];
  filesScanned: number;
}

export class WorkerPool {
  private _queue: QueueEntry[] = [];
  private _concurrency: number;
  private _activeCount = 0;
  private _totalTasks = 0;
  private _totalWaits = 0;
  private _maxQueueDepth = 0;

  constructor(concurrency = DEFAULT_WORKER_COUNT) {
    this._concurrency = Math.max(1, Math.floor(concurrency) || 1);
  }

  /** Take a slot. Resolves when one is free. */
  async acquire(): Promise<void> {
    if (this._activeCount < this._concurrency) {
      this._activeCount++;
      return;
    }

    this._totalWaits++;
    return new Promise<void>((resolve) => {
      this._queue.push({ resolve });
      if (this._queue.length > this._maxQueueDepth) {
        this._maxQueueDepth = this._queue.length;
      }
    });
  }

  /** Give a slot back. Hands it straight to the next waiter if there is one. */
  release(): void {
    if (this._activeCount <= 0) return;

    const next = this._queue.shift();
    if (next) {
      next.resolve();
    } else {
      this._activeCount--;
    }
  }

  /**
   * Run `task` once per candidate and collect the records.
   *
   * A failure that `isolate` classifies becomes a skipped entry and siblings
   * keep running. Any other failure stops dispatch, waits for in-flight tasks
   * and is rethrown. The same happens with `signal.reason` on abort.
   */
  async runAll<T>(
    candidates: AsyncIterable<string> | Iterable<string>,
    task: FileTask<T>,
    options: RunOptions = {},
  ): Promise<PoolRunResult<T>> {
    const { signal, isolate = toSkipReason } = options;
    const records: T[] = [];
    const skipped: SkippedFile[] = [];
    const inFlight = new Set<Promise<void>>();
    const fatal: unknown[] = [];
    let filesScanned = 0;

    const runOne = async (file: string): Promise<void> => {
      try {
        const fileRecords = await task(file);
        records.push(...fileRecords);
      } catch (error) {
        const reason = isolate(error);
        if (reason === null) {
          fatal.push(error);
          return;
        }
        skipped.push({ file, ...reason });
        if (VERBOSE) {
          console.error(`${LOG_PREFIX} Skipped ${file}: ${reason.code} ${reason.message}`);
        }
      } finally {
        this.release();
      }
    };

    try {
      for await (const file of candidates) {
        if (fatal.length > 0 || signal?.aborted) break;
        await this.acquire();
        if (fatal.length > 0 || signal?.aborted) {
          this.release();
          break;
        }
        this._totalTasks++;
        filesScanned++;
        const running = runOne(file).finally(() => inFlight.delete(running));
        inFlight.add(running);
      }
    } finally {
      // Never return (or throw) while a task still holds a file
      await Promise.allSettled([...inFlight]);
    }

    if (fatal.length > 0) throw fatal[0];
    signal?.throwIfAborted();

    return { records, skipped, filesScanned };
  }

  /** Diagnostics */
  get stats() {
    return {
      activeTasks: this._activeCount,
      queueDepth: this._queue.length,
      concurrency: this._concurrency,
      totalTasks: this._totalTasks,
      totalWaits: this._totalWaits,
      maxQueueDepth: this._maxQueueDepth,
    };
  }
}
