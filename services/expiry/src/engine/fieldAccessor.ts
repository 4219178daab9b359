import type { BaseLogger } from 'pino';
import { NotFoundError } from '../errors';
import {
  clearField,
  encodeField,
  encodeMarker,
  evict,
  expiredBins,
  expiryForPut,
  expiryForTouch,
  mergeWrites,
  nowSeconds,
  remainingSeconds,
  visibleField,
} from '../codec/expiry';
import type { RecordStore, RecordWrite } from '../contracts/recordStore';
import {
  NO_EXPIRY_CREATION,
  type BinName,
  type BinPut,
  type BinTouch,
  type BinTtl,
  type FieldValue,
  type RecordFields,
  type RecordKey,
  type TtlResult,
} from '../types';
import type { InputValidator } from './validation';

export type Clock = () => number;

export interface FieldAccessorDeps {
  store: RecordStore;
  validator: InputValidator;
  logger: BaseLogger;
  /** Milliseconds since the epoch. */
  clock: Clock;
}

/**
 * Bin-level get/put/puts/touch/ttl over one record. Reads never mutate; every write is a single
 * read-modify-write that also evicts bins already past their deadline.
 */
export class FieldAccessor {
  constructor(private readonly deps: FieldAccessorDeps) {}

  async get(key: RecordKey, bins: readonly BinName[]): Promise<RecordFields> {
    const { validator, store } = this.deps;
    const recordKey = validator.key(key);
    const names = validator.bins(bins);

    const fields = await store.read(recordKey);
    if (!fields) throw new NotFoundError(recordKey);

    const now = this.now();
    const result: RecordFields = {};
    for (const bin of names) {
      const decoded = visibleField(fields, bin, now);
      if (decoded) result[bin] = decoded.value;
    }
    return result;
  }

  async put(key: RecordKey, bin: BinName, value: FieldValue, ttl: BinTtl): Promise<void> {
    const { validator } = this.deps;
    const recordKey = validator.key(key);
    const entry: BinPut = { bin: validator.bin(bin), value: validator.value(value), ttl: validator.binTtl(ttl) };
    await this.applyPuts(recordKey, [entry]);
  }

  async puts(key: RecordKey, entries: readonly BinPut[]): Promise<void> {
    const { validator } = this.deps;
    const recordKey = validator.key(key);
    await this.applyPuts(recordKey, validator.puts(entries));
  }

  async touch(key: RecordKey, entries: readonly BinTouch[]): Promise<void> {
    const { validator, store } = this.deps;
    const recordKey = validator.key(key);
    const touches = validator.touches(entries);

    await store.readModifyWrite(recordKey, (current) => {
      if (!current) throw new NotFoundError(recordKey);
      const now = this.now();
      const writes: RecordWrite[] = [];
      for (const { bin, ttl } of touches) {
        if (!visibleField(current, bin, now)) throw new NotFoundError(recordKey, bin);
        writes.push(encodeMarker(bin, expiryForTouch(ttl, now)));
      }
      const { write } = withEviction(current, now, touches.map((entry) => entry.bin), writes);
      return { ...write, result: undefined };
    });
  }

  async ttl(key: RecordKey, bin: BinName): Promise<TtlResult> {
    const { validator, store } = this.deps;
    const recordKey = validator.key(key);
    const name = validator.bin(bin);

    const fields = await store.read(recordKey);
    if (!fields) throw new NotFoundError(recordKey);

    const now = this.now();
    const decoded = visibleField(fields, name, now);
    if (!decoded) return { state: 'absent' };
    if (decoded.expiry.kind !== 'at') return { state: 'never' };
    return { state: 'expiring', seconds: remainingSeconds(decoded.expiry, now) };
  }

  private async applyPuts(recordKey: RecordKey, entries: readonly BinPut[]): Promise<void> {
    const evicted = await this.deps.store.readModifyWrite(recordKey, (current) => {
      const fields = current ?? {};
      const now = this.now();
      // later entries see the effect of earlier ones for the same bin
      const working: RecordFields = { ...fields };
      const writes: RecordWrite[] = [];
      for (const entry of entries) {
        const write = this.planPut(working, entry, now);
        applyToView(working, write);
        writes.push(write);
      }
      const { write, evicted } = withEviction(fields, now, entries.map((entry) => entry.bin), writes);
      return { ...write, result: evicted };
    });
    if (evicted > 0) {
      this.deps.logger.debug({ key: recordKey, evicted }, 'evicted expired bins during write');
    }
  }

  private planPut(fields: RecordFields, entry: BinPut, now: number): RecordWrite {
    if (entry.value === undefined) return clearField(entry.bin);
    const current = visibleField(fields, entry.bin, now);
    const expiry = expiryForPut(current?.expiry, entry.ttl ?? NO_EXPIRY_CREATION, now);
    return encodeField(entry.bin, entry.value, expiry);
  }

  private now(): number {
    return nowSeconds(this.deps.clock());
  }
}

/** Prepends removal of the record's other expired bins to `writes`. */
function withEviction(fields: RecordFields, now: number, written: readonly BinName[], writes: RecordWrite[]) {
  const stale = expiredBins(fields, now).filter((bin) => !written.includes(bin));
  return { write: mergeWrites(evict(stale), ...writes), evicted: stale.length };
}

function applyToView(view: RecordFields, write: RecordWrite): void {
  for (const bin of write.remove ?? []) delete view[bin];
  Object.assign(view, write.set);
}
