import { describe, expect, it } from 'vitest';
import { fromJson, fromWire, toJson, toWire, wireFieldValueSchema } from '../src/values';

describe('wire values', () => {
  it('carries bytes as base64 on the wire', () => {
    expect(toWire({ type: 'bytes', value: new Uint8Array([104, 105]) })).toEqual({ type: 'bytes', value: 'aGk=' });
    expect(fromWire({ type: 'bytes', value: 'aGk=' })).toEqual({ type: 'bytes', value: new Uint8Array([104, 105]) });
  });

  it('converts nested collections', () => {
    expect(
      toWire({ type: 'map', value: { xs: { type: 'list', value: [{ type: 'bytes', value: new Uint8Array([0]) }] } } }),
    ).toEqual({ type: 'map', value: { xs: { type: 'list', value: [{ type: 'bytes', value: 'AA==' }] } } });
  });

  it('validates tagged payloads', () => {
    expect(wireFieldValueSchema.safeParse({ type: 'list', value: [{ type: 'int', value: 3 }] }).success).toBe(true);
    expect(wireFieldValueSchema.safeParse({ type: 'int', value: 1.5 }).success).toBe(false);
    expect(wireFieldValueSchema.safeParse({ type: 'bytes', value: 'not base64!' }).success).toBe(false);
    expect(wireFieldValueSchema.safeParse({ type: 'date', value: 'x' }).success).toBe(false);
  });
});

describe('plain JSON values', () => {
  it('tags integers and floats apart', () => {
    expect(fromJson(3)).toEqual({ type: 'int', value: 3 });
    expect(fromJson(3.5)).toEqual({ type: 'float', value: 3.5 });
    expect(fromJson(null)).toEqual({ type: 'nil' });
  });

  it('maps tagged values back to plain JSON', () => {
    expect(toJson(fromJson({ a: [1, 'two', true, null] }))).toEqual({ a: [1, 'two', true, null] });
    expect(toJson({ type: 'bytes', value: new Uint8Array([255]) })).toBe('/w==');
  });
});
