import { isEmptyWrite } from '../codec/expiry';
import type { MutationFn, RecordStore, RecordWrite } from '../contracts/recordStore';
import type { RecordFields, RecordKey, RecordSetId } from '../types';

interface StoredRecord {
  fields: RecordFields;
  generation: number;
}

/**
 * In-process record store. Each mutation runs without suspending between read and write,
 * which makes it atomic per record on the event loop.
 */
export class MemoryRecordStore implements RecordStore {
  readonly name = 'memory';
  private readonly records = new Map<string, StoredRecord>();

  async ping(): Promise<void> {}

  async read(key: RecordKey): Promise<RecordFields | null> {
    const record = this.records.get(storageKey(key));
    return record ? { ...record.fields } : null;
  }

  async readModifyWrite<T>(key: RecordKey, fn: MutationFn<T>): Promise<T> {
    const id = storageKey(key);
    const existing = this.records.get(id);
    const mutation = fn(existing ? { ...existing.fields } : null);
    this.apply(id, existing, mutation);
    return mutation.result;
  }

  async *scan(recordSet: RecordSetId): AsyncIterable<RecordKey> {
    const prefix = setPrefix(recordSet);
    // snapshot so writes during the scan do not disturb iteration
    const ids = [...this.records.keys()].filter((id) => id.startsWith(prefix));
    for (const id of ids) {
      yield { ...recordSet, key: id.slice(prefix.length) };
    }
  }

  /** Generation of a record, bumped by every committed write. 0 when absent. */
  generation(key: RecordKey): number {
    return this.records.get(storageKey(key))?.generation ?? 0;
  }

  get size(): number {
    return this.records.size;
  }

  clear(): void {
    this.records.clear();
  }

  private apply(id: string, existing: StoredRecord | undefined, write: RecordWrite): void {
    if (isEmptyWrite(write)) return;

    const fields: RecordFields = { ...existing?.fields };
    for (const bin of write.remove ?? []) delete fields[bin];
    Object.assign(fields, write.set);

    if (Object.keys(fields).length === 0) {
      this.records.delete(id);
      return;
    }
    this.records.set(id, { fields, generation: (existing?.generation ?? 0) + 1 });
  }
}

function setPrefix(recordSet: RecordSetId): string {
  return `${recordSet.namespace}:${recordSet.set}:`;
}

function storageKey(key: RecordKey): string {
  return `${setPrefix(key)}${key.key}`;
}
