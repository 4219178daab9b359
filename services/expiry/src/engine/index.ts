import type { BaseLogger } from 'pino';
import type { RecordStore } from '../contracts/recordStore';
import type { BinName, BinPut, BinTouch, BinTtl, FieldValue, RecordFields, RecordKey, RecordSetId, TtlResult } from '../types';
import { FieldAccessor, type Clock } from './fieldAccessor';
import { SweepCoordinator, type SweepJob, type SweepOptions } from './sweep';
import { InputValidator, recordKeySchema, validate } from './validation';

export interface EngineOptions {
  store: RecordStore;
  logger: BaseLogger;
  /** Defaults to `Date.now`. */
  clock?: Clock;
  /** Upper bound for any bin ttl. */
  maxTtlSeconds: number;
}

/** Bin-expiration operations over a record store. */
export interface ExpiryEngine {
  readonly store: RecordStore;
  get(key: RecordKey, bins: readonly BinName[]): Promise<RecordFields>;
  put(key: RecordKey, bin: BinName, value: FieldValue, ttl: BinTtl): Promise<void>;
  puts(key: RecordKey, entries: readonly BinPut[]): Promise<void>;
  touch(key: RecordKey, entries: readonly BinTouch[]): Promise<void>;
  ttl(key: RecordKey, bin: BinName): Promise<TtlResult>;
  clean(recordSet: RecordSetId, options?: SweepOptions): SweepJob;
}

export function createEngine(options: EngineOptions): ExpiryEngine {
  const clock = options.clock ?? Date.now;
  const validator = new InputValidator(options.maxTtlSeconds);
  const accessor = new FieldAccessor({ store: options.store, validator, logger: options.logger, clock });
  const sweeper = new SweepCoordinator({ store: options.store, logger: options.logger, clock });
  const recordSetSchema = recordKeySchema.pick({ namespace: true, set: true });

  return {
    store: options.store,
    get: (key, bins) => accessor.get(key, bins),
    put: (key, bin, value, ttl) => accessor.put(key, bin, value, ttl),
    puts: (key, entries) => accessor.puts(key, entries),
    touch: (key, entries) => accessor.touch(key, entries),
    ttl: (key, bin) => accessor.ttl(key, bin),
    clean: (recordSet, sweepOptions = {}) => {
      const target = validate(recordSetSchema, recordSet, 'record set');
      const bins = sweepOptions.bins?.length ? validator.bins(sweepOptions.bins) : undefined;
      return sweeper.clean(target, { ...sweepOptions, bins });
    },
  };
}

export { FieldAccessor, SweepCoordinator, InputValidator };
export type { Clock, SweepJob, SweepOptions };
export type { SweepProgress, SweepReport, SweepSnapshot, SweepState } from './sweep';
