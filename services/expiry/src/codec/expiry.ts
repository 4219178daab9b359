import { NEVER_EXPIRES, type BinName, type BinTtl, type FieldValue, type RecordFields } from '../types';
import type { RecordWrite } from '../contracts/recordStore';

/** Bins starting with this character belong to the engine and the host store. */
export const RESERVED_BIN_PREFIX = '!';
const MARKER_PREFIX = `${RESERVED_BIN_PREFIX}exp:`;

export type Expiry =
  | { kind: 'plain' }
  | { kind: 'never' }
  | { kind: 'at'; at: number };

export interface DecodedField {
  value: FieldValue;
  expiry: Expiry;
}

const PLAIN: Expiry = { kind: 'plain' };
const NEVER: Expiry = { kind: 'never' };

export function markerBin(bin: BinName): BinName {
  return `${MARKER_PREFIX}${bin}`;
}

export function isReservedBin(bin: BinName): boolean {
  return bin.startsWith(RESERVED_BIN_PREFIX);
}

/** Bin name a marker belongs to, or undefined when `bin` is not a marker. */
export function markedBin(bin: BinName): BinName | undefined {
  return bin.startsWith(MARKER_PREFIX) ? bin.slice(MARKER_PREFIX.length) : undefined;
}

/** Own-key lookup; inherited object properties are never bins. */
export function hasBin(fields: RecordFields, bin: BinName): boolean {
  return Object.hasOwn(fields, bin);
}

export function nowSeconds(nowMs: number): number {
  return Math.floor(nowMs / 1000);
}

export function decodeExpiry(raw: FieldValue | undefined): Expiry {
  if (!raw || raw.type !== 'int') return PLAIN;
  if (raw.value === NEVER_EXPIRES) return NEVER;
  if (raw.value >= 0) return { kind: 'at', at: raw.value };
  return PLAIN;
}

export function encodeExpiry(expiry: Expiry): FieldValue | undefined {
  switch (expiry.kind) {
    case 'plain':
      return undefined;
    case 'never':
      return { type: 'int', value: NEVER_EXPIRES };
    case 'at':
      return { type: 'int', value: expiry.at };
  }
}

/** Decodes a bin and its marker. Undefined when the value bin does not exist. */
export function decodeField(fields: RecordFields, bin: BinName): DecodedField | undefined {
  if (!hasBin(fields, bin)) return undefined;
  const marker = markerBin(bin);
  return { value: fields[bin], expiry: decodeExpiry(hasBin(fields, marker) ? fields[marker] : undefined) };
}

export function isVisible(expiry: Expiry, now: number): boolean {
  return expiry.kind !== 'at' || now < expiry.at;
}

/** Decoded bin if it exists and has not expired as of `now`. */
export function visibleField(fields: RecordFields, bin: BinName, now: number): DecodedField | undefined {
  const decoded = decodeField(fields, bin);
  if (!decoded || !isVisible(decoded.expiry, now)) return undefined;
  return decoded;
}

/** Seconds left, or `-1` for bins that never expire. */
export function remainingSeconds(expiry: Expiry, now: number): number {
  return expiry.kind === 'at' ? Math.max(0, expiry.at - now) : NEVER_EXPIRES;
}

/**
 * Expiry written by `put`/`puts`. Wrapping only escalates: a plain bin stays plain on `-1`,
 * and an expiring bin keeps its marker on `0`. `current` is the visible expiry, if any.
 */
export function expiryForPut(current: Expiry | undefined, ttl: BinTtl, now: number): Expiry {
  if (ttl > 0) return { kind: 'at', at: now + ttl };
  if (ttl === NEVER_EXPIRES) return current?.kind === 'plain' ? PLAIN : NEVER;
  return current ?? PLAIN;
}

/** Expiry written by `touch`, which replaces the marker unconditionally. */
export function expiryForTouch(ttl: BinTtl, now: number): Expiry {
  if (ttl > 0) return { kind: 'at', at: now + ttl };
  if (ttl === NEVER_EXPIRES) return NEVER;
  return PLAIN;
}

export function encodeField(bin: BinName, value: FieldValue, expiry: Expiry): RecordWrite {
  return mergeWrites({ set: { [bin]: value } }, encodeMarker(bin, expiry));
}

export function encodeMarker(bin: BinName, expiry: Expiry): RecordWrite {
  const marker = encodeExpiry(expiry);
  return marker === undefined ? { remove: [markerBin(bin)] } : { set: { [markerBin(bin)]: marker } };
}

export function clearField(bin: BinName): RecordWrite {
  return { remove: [bin, markerBin(bin)] };
}

/**
 * Bins whose deadline has passed, plus bins left with an orphaned marker.
 * With `candidates`, only those bins are inspected.
 */
export function expiredBins(fields: RecordFields, now: number, candidates?: readonly BinName[]): BinName[] {
  const names = candidates ?? Object.keys(fields).flatMap((name) => markedBin(name) ?? []);
  const expired: BinName[] = [];
  for (const bin of new Set(names)) {
    const marker = markerBin(bin);
    if (!hasBin(fields, marker)) continue;
    if (!hasBin(fields, bin) || !isVisible(decodeExpiry(fields[marker]), now)) {
      expired.push(bin);
    }
  }
  return expired;
}

/** Write removing `bins` together with their markers. */
export function evict(bins: readonly BinName[]): RecordWrite {
  return { remove: bins.flatMap((bin) => [bin, markerBin(bin)]) };
}

/** Later writes win over earlier ones for the same bin. */
export function mergeWrites(...writes: RecordWrite[]): RecordWrite {
  const set: RecordFields = {};
  const remove = new Set<BinName>();
  for (const write of writes) {
    for (const bin of write.remove ?? []) {
      remove.add(bin);
      delete set[bin];
    }
    for (const [bin, value] of Object.entries(write.set ?? {})) {
      set[bin] = value;
      remove.delete(bin);
    }
  }
  return { set, remove: [...remove] };
}

export function isEmptyWrite(write: RecordWrite): boolean {
  return Object.keys(write.set ?? {}).length === 0 && (write.remove ?? []).length === 0;
}
