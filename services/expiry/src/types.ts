export type Namespace = string;
export type SetName = string;
export type BinName = string;

export interface RecordSetId {
  namespace: Namespace;
  set: SetName;
}

export interface RecordKey extends RecordSetId {
  key: string;
}

/** Tagged bin value. Mirrors the value kinds a record bin can hold. */
export type FieldValue =
  | { type: 'nil' }
  | { type: 'bool'; value: boolean }
  | { type: 'int'; value: number }
  | { type: 'float'; value: number }
  | { type: 'string'; value: string }
  | { type: 'bytes'; value: Uint8Array }
  | { type: 'list'; value: FieldValue[] }
  | { type: 'map'; value: Record<string, FieldValue> };

export type RecordFields = Record<BinName, FieldValue>;

/** `-1` never expires, `0` do not create as expiring, `n > 0` expires in n seconds. */
export type BinTtl = number;

export const NEVER_EXPIRES = -1;
export const NO_EXPIRY_CREATION = 0;

export interface BinPut {
  bin: BinName;
  /** Omitted value clears the bin. */
  value?: FieldValue;
  ttl?: BinTtl;
}

export interface BinTouch {
  bin: BinName;
  /** Required; touch rejects entries without it. */
  ttl?: BinTtl;
}

export type TtlResult =
  | { state: 'expiring'; seconds: number }
  | { state: 'never' }
  | { state: 'absent' };

export function formatRecordKey(key: RecordKey): string {
  return `${key.namespace}/${key.set}/${key.key}`;
}
