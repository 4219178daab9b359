import { randomUUID } from 'crypto';
import type { BaseLogger } from 'pino';
import { evict, expiredBins, hasBin, markerBin, nowSeconds } from '../codec/expiry';
import type { RecordStore } from '../contracts/recordStore';
import type { BinName, RecordKey, RecordSetId } from '../types';
import type { Clock } from './fieldAccessor';

export type SweepState = 'running' | 'done' | 'cancelled' | 'failed';

export interface SweepProgress {
  /** Records read. */
  visited: number;
  /** Records holding none of the candidate bins. */
  skipped: number;
  /** Records rewritten to drop expired bins. */
  cleaned: number;
  removedBins: number;
  /** Records that failed and were left as they were. */
  errors: number;
}

export interface SweepReport {
  id: string;
  recordSet: RecordSetId;
  state: Exclude<SweepState, 'running'>;
  progress: SweepProgress;
  startedAt: number;
  finishedAt: number;
  error?: string;
}

export interface SweepSnapshot extends Omit<SweepReport, 'state' | 'finishedAt'> {
  state: SweepState;
  finishedAt?: number;
}

export interface SweepOptions {
  /** Only these bins are inspected; records holding none of them are skipped without a write. */
  bins?: readonly BinName[];
  /** Cancels the pass once elapsed. 0 or absent means no limit. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface SweepDeps {
  store: RecordStore;
  logger: BaseLogger;
  clock: Clock;
}

/** Handle of a running sweep. `done` always resolves, also on cancellation or failure. */
export class SweepJob {
  readonly id = randomUUID();
  readonly startedAt: number;
  readonly done: Promise<SweepReport>;
  readonly progress: SweepProgress = { visited: 0, skipped: 0, cleaned: 0, removedBins: 0, errors: 0 };
  private currentState: SweepState = 'running';
  private finishedAt?: number;
  private error?: string;
  private readonly controller = new AbortController();

  constructor(
    readonly recordSet: RecordSetId,
    private readonly deps: SweepDeps,
    private readonly options: SweepOptions = {},
  ) {
    this.startedAt = deps.clock();
    this.done = this.run();
  }

  get state(): SweepState {
    return this.currentState;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  cancel(reason = 'cancelled'): void {
    if (!this.controller.signal.aborted) this.controller.abort(reason);
  }

  snapshot(): SweepSnapshot {
    return {
      id: this.id,
      recordSet: this.recordSet,
      state: this.currentState,
      progress: { ...this.progress },
      startedAt: this.startedAt,
      ...(this.finishedAt !== undefined ? { finishedAt: this.finishedAt } : {}),
      ...(this.error !== undefined ? { error: this.error } : {}),
    };
  }

  private async run(): Promise<SweepReport> {
    const { logger } = this.deps;
    const unlink = this.linkCancellation();
    const log = { job: this.id, namespace: this.recordSet.namespace, set: this.recordSet.set };
    logger.info(log, 'sweep started');

    try {
      for await (const key of this.deps.store.scan(this.recordSet)) {
        if (this.signal.aborted) break;
        await this.visit(key);
      }
      this.currentState = this.signal.aborted ? 'cancelled' : 'done';
    } catch (err) {
      this.currentState = 'failed';
      this.error = err instanceof Error ? err.message : String(err);
      logger.error({ ...log, err }, 'sweep failed');
    } finally {
      unlink();
    }

    this.finishedAt = this.deps.clock();
    logger.info({ ...log, state: this.currentState, ...this.progress }, 'sweep finished');
    return this.report();
  }

  private async visit(key: RecordKey): Promise<void> {
    const { store, logger } = this.deps;
    const candidates = this.options.bins;
    this.progress.visited++;

    try {
      const fields = await store.read(key);
      if (!fields) return;
      if (candidates && !candidates.some((bin) => hasBin(fields, bin) || hasBin(fields, markerBin(bin)))) {
        this.progress.skipped++;
        return;
      }
      if (expiredBins(fields, this.now(), candidates).length === 0) return;

      // recomputed under the write so a racing put or touch is never undone
      const removed = await store.readModifyWrite(key, (current) => {
        if (!current) return { result: 0 };
        const expired = expiredBins(current, this.now(), candidates);
        return { ...evict(expired), result: expired.length };
      });
      if (removed > 0) {
        this.progress.cleaned++;
        this.progress.removedBins += removed;
      }
    } catch (err) {
      this.progress.errors++;
      logger.warn({ job: this.id, key: key.key, err }, 'sweep skipped record');
    }
  }

  private linkCancellation(): () => void {
    const { signal, timeoutMs } = this.options;
    const onAbort = () => this.cancel('aborted');
    signal?.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) this.cancel('aborted');

    const timer = timeoutMs && timeoutMs > 0 ? setTimeout(() => this.cancel('timeout'), timeoutMs) : undefined;
    return () => {
      signal?.removeEventListener('abort', onAbort);
      if (timer) clearTimeout(timer);
    };
  }

  private report(): SweepReport {
    const state = this.currentState === 'running' ? 'failed' : this.currentState;
    return {
      id: this.id,
      recordSet: this.recordSet,
      state,
      progress: { ...this.progress },
      startedAt: this.startedAt,
      finishedAt: this.finishedAt ?? this.deps.clock(),
      ...(this.error !== undefined ? { error: this.error } : {}),
    };
  }

  private now(): number {
    return nowSeconds(this.deps.clock());
  }
}

/** Starts sweeps; holds no state of its own between calls. */
export class SweepCoordinator {
  constructor(private readonly deps: SweepDeps) {}

  clean(recordSet: RecordSetId, options: SweepOptions = {}): SweepJob {
    return new SweepJob(recordSet, this.deps, options);
  }
}
