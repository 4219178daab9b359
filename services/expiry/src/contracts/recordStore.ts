import type { BinName, RecordFields, RecordKey, RecordSetId } from '../types';

/** Bins to set and bins to delete in one atomic record write. Other bins are left as they are. */
export interface RecordWrite {
  set?: RecordFields;
  remove?: BinName[];
}

export interface RecordMutation<T> extends RecordWrite {
  result: T;
}

/**
 * Receives the current bins (null when the record does not exist).
 * Throwing aborts the mutation without writing.
 */
export type MutationFn<T> = (current: RecordFields | null) => RecordMutation<T>;

/**
 * Host record store. Records are atomic units; the store owns generation and whole-record TTL,
 * which writes through this interface never change.
 */
export interface RecordStore {
  readonly name: string;
  ping(): Promise<void>;
  /** Effect-free read. */
  read(key: RecordKey): Promise<RecordFields | null>;
  /** Applies `fn` and commits its write atomically with respect to other writers of the same record. */
  readModifyWrite<T>(key: RecordKey, fn: MutationFn<T>): Promise<T>;
  /** Every record key of the set, at least once. */
  scan(recordSet: RecordSetId): AsyncIterable<RecordKey>;
}
