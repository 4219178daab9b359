import { describe, expect, it } from 'vitest';
import { decodeParticle, encodeParticle } from '../src/redis/particle';
import type { FieldValue } from '../src/types';

describe('bin particle encoding', () => {
  it('tags scalar values', () => {
    expect(encodeParticle({ type: 'nil' })).toBe('N:');
    expect(encodeParticle({ type: 'bool', value: true })).toBe('B:1');
    expect(encodeParticle({ type: 'int', value: 42 })).toBe('I:42');
    expect(encodeParticle({ type: 'float', value: 1.5 })).toBe('F:1.5');
    expect(encodeParticle({ type: 'string', value: 'Hello World.' })).toBe('S:Hello World.');
    expect(encodeParticle({ type: 'bytes', value: new Uint8Array([1, 2, 3]) })).toBe('X:AQID');
  });

  it('encodes collections as JSON of encoded members', () => {
    const list: FieldValue = { type: 'list', value: [{ type: 'int', value: 1 }, { type: 'string', value: 'a' }] };
    expect(encodeParticle(list)).toBe('L:["I:1","S:a"]');
    const map: FieldValue = { type: 'map', value: { k: { type: 'bool', value: false } } };
    expect(encodeParticle(map)).toBe('M:{"k":"B:0"}');
  });

  it('decodes nested values back to the same variant', () => {
    const value: FieldValue = {
      type: 'map',
      value: {
        tags: { type: 'list', value: [{ type: 'string', value: 'x' }, { type: 'nil' }] },
        blob: { type: 'bytes', value: new Uint8Array([255, 0]) },
        ratio: { type: 'float', value: 0.25 },
      },
    };
    expect(decodeParticle(encodeParticle(value))).toEqual(value);
  });

  it('reads untagged or malformed hash values as strings', () => {
    expect(decodeParticle('hello')).toEqual({ type: 'string', value: 'hello' });
    expect(decodeParticle('I:abc')).toEqual({ type: 'string', value: 'I:abc' });
    expect(decodeParticle('I:')).toEqual({ type: 'string', value: 'I:' });
    expect(decodeParticle('L:not json')).toEqual({ type: 'string', value: 'L:not json' });
    expect(decodeParticle('Q:x')).toEqual({ type: 'string', value: 'Q:x' });
  });

  it('keeps an empty string distinct from nil', () => {
    expect(decodeParticle('S:')).toEqual({ type: 'string', value: '' });
    expect(decodeParticle('N:')).toEqual({ type: 'nil' });
  });
});
