import { z } from 'zod';
import type { FieldValue, RecordFields } from './types';

/** JSON form of a `FieldValue`; bytes travel as base64. */
export type WireFieldValue =
  | { type: 'nil' }
  | { type: 'bool'; value: boolean }
  | { type: 'int'; value: number }
  | { type: 'float'; value: number }
  | { type: 'string'; value: string }
  | { type: 'bytes'; value: string }
  | { type: 'list'; value: WireFieldValue[] }
  | { type: 'map'; value: Record<string, WireFieldValue> };

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export const wireFieldValueSchema: z.ZodType<WireFieldValue> = z.lazy(() =>
  z.union([
    z.object({ type: z.literal('nil') }),
    z.object({ type: z.literal('bool'), value: z.boolean() }),
    z.object({ type: z.literal('int'), value: z.number().int().safe() }),
    z.object({ type: z.literal('float'), value: z.number() }),
    z.object({ type: z.literal('string'), value: z.string() }),
    z.object({ type: z.literal('bytes'), value: z.string().regex(BASE64, 'bytes must be base64') }),
    z.object({ type: z.literal('list'), value: z.array(wireFieldValueSchema) }),
    z.object({ type: z.literal('map'), value: z.record(wireFieldValueSchema) }),
  ]),
);

/** In-process form, as the engine accepts it. */
export const fieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
  z.union([
    z.object({ type: z.literal('nil') }),
    z.object({ type: z.literal('bool'), value: z.boolean() }),
    z.object({ type: z.literal('int'), value: z.number().int().safe() }),
    z.object({ type: z.literal('float'), value: z.number() }),
    z.object({ type: z.literal('string'), value: z.string() }),
    z.object({ type: z.literal('bytes'), value: z.instanceof(Uint8Array) }),
    z.object({ type: z.literal('list'), value: z.array(fieldValueSchema) }),
    z.object({ type: z.literal('map'), value: z.record(fieldValueSchema) }),
  ]),
);

export function toWire(value: FieldValue): WireFieldValue {
  switch (value.type) {
    case 'bytes':
      return { type: 'bytes', value: Buffer.from(value.value).toString('base64') };
    case 'list':
      return { type: 'list', value: value.value.map(toWire) };
    case 'map':
      return { type: 'map', value: mapValues(value.value, toWire) };
    default:
      return value;
  }
}

export function fromWire(value: WireFieldValue): FieldValue {
  switch (value.type) {
    case 'bytes':
      return { type: 'bytes', value: new Uint8Array(Buffer.from(value.value, 'base64')) };
    case 'list':
      return { type: 'list', value: value.value.map(fromWire) };
    case 'map':
      return { type: 'map', value: mapValues(value.value, fromWire) };
    default:
      return value;
  }
}

export function recordToWire(fields: RecordFields): Record<string, WireFieldValue> {
  return mapValues(fields, toWire);
}

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

/** Plain JSON to a tagged value. Integral numbers become `int`. */
export function fromJson(value: JsonValue): FieldValue {
  if (value === null) return { type: 'nil' };
  if (typeof value === 'boolean') return { type: 'bool', value };
  if (typeof value === 'number') return Number.isInteger(value) ? { type: 'int', value } : { type: 'float', value };
  if (typeof value === 'string') return { type: 'string', value };
  if (Array.isArray(value)) return { type: 'list', value: value.map(fromJson) };
  return { type: 'map', value: mapValues(value, fromJson) };
}

/** Tagged value to plain JSON. Bytes become base64 strings, so this is lossy. */
export function toJson(value: FieldValue): JsonValue {
  switch (value.type) {
    case 'nil':
      return null;
    case 'bytes':
      return Buffer.from(value.value).toString('base64');
    case 'list':
      return value.value.map(toJson);
    case 'map':
      return mapValues(value.value, toJson);
    default:
      return value.value;
  }
}

function mapValues<A, B>(source: Record<string, A>, fn: (value: A) => B): Record<string, B> {
  return Object.fromEntries(Object.entries(source).map(([key, value]) => [key, fn(value)]));
}
