import { describe, expect, it } from 'vitest';
import {
  decodeExpiry,
  decodeField,
  encodeField,
  evict,
  expiredBins,
  expiryForPut,
  expiryForTouch,
  isReservedBin,
  isVisible,
  markerBin,
  mergeWrites,
  nowSeconds,
  remainingSeconds,
} from '../src/codec/expiry';
import { int, str } from './helpers';

const NOW = 1_000;

describe('expiry codec', () => {
  it('names markers with the reserved prefix', () => {
    expect(markerBin('score')).toBe('!exp:score');
    expect(isReservedBin('!exp:score')).toBe(true);
    expect(isReservedBin('score')).toBe(false);
  });

  it('truncates the clock to whole seconds', () => {
    expect(nowSeconds(1_700_000_000_999)).toBe(1_700_000_000);
  });

  it('distinguishes plain, never and deadline markers', () => {
    expect(decodeExpiry(undefined)).toEqual({ kind: 'plain' });
    expect(decodeExpiry(int(-1))).toEqual({ kind: 'never' });
    expect(decodeExpiry(int(1_050))).toEqual({ kind: 'at', at: 1_050 });
    // markers that are not integers >= -1 do not throw
    expect(decodeExpiry(str('soon'))).toEqual({ kind: 'plain' });
    expect(decodeExpiry(int(-7))).toEqual({ kind: 'plain' });
  });

  it('decodes a bin with its marker and leaves plain bins unwrapped', () => {
    const fields = { a: str('x'), [markerBin('a')]: int(1_010), b: str('y') };
    expect(decodeField(fields, 'a')).toEqual({ value: str('x'), expiry: { kind: 'at', at: 1_010 } });
    expect(decodeField(fields, 'b')).toEqual({ value: str('y'), expiry: { kind: 'plain' } });
    expect(decodeField(fields, 'missing')).toBeUndefined();
  });

  it('hides a bin from the deadline second onwards', () => {
    expect(isVisible({ kind: 'at', at: NOW + 1 }, NOW)).toBe(true);
    expect(isVisible({ kind: 'at', at: NOW }, NOW)).toBe(false);
    expect(isVisible({ kind: 'never' }, NOW)).toBe(true);
    expect(isVisible({ kind: 'plain' }, NOW)).toBe(true);
  });

  it('reports remaining seconds, -1 for bins without a deadline', () => {
    expect(remainingSeconds({ kind: 'at', at: NOW + 42 }, NOW)).toBe(42);
    expect(remainingSeconds({ kind: 'never' }, NOW)).toBe(-1);
    expect(remainingSeconds({ kind: 'plain' }, NOW)).toBe(-1);
  });

  describe('expiryForPut', () => {
    it('sets a deadline for positive ttls, escalating plain bins', () => {
      expect(expiryForPut(undefined, 30, NOW)).toEqual({ kind: 'at', at: NOW + 30 });
      expect(expiryForPut({ kind: 'plain' }, 30, NOW)).toEqual({ kind: 'at', at: NOW + 30 });
    });

    it('keeps plain bins plain on -1 and marks everything else as never', () => {
      expect(expiryForPut({ kind: 'plain' }, -1, NOW)).toEqual({ kind: 'plain' });
      expect(expiryForPut(undefined, -1, NOW)).toEqual({ kind: 'never' });
      expect(expiryForPut({ kind: 'at', at: NOW + 5 }, -1, NOW)).toEqual({ kind: 'never' });
    });

    it('does not create or drop markers on 0', () => {
      expect(expiryForPut(undefined, 0, NOW)).toEqual({ kind: 'plain' });
      expect(expiryForPut({ kind: 'at', at: NOW + 5 }, 0, NOW)).toEqual({ kind: 'at', at: NOW + 5 });
      expect(expiryForPut({ kind: 'never' }, 0, NOW)).toEqual({ kind: 'never' });
    });
  });

  it('replaces the marker unconditionally on touch', () => {
    expect(expiryForTouch(10, NOW)).toEqual({ kind: 'at', at: NOW + 10 });
    expect(expiryForTouch(-1, NOW)).toEqual({ kind: 'never' });
    expect(expiryForTouch(0, NOW)).toEqual({ kind: 'plain' });
  });

  it('encodes a plain bin as a value write plus marker removal', () => {
    expect(encodeField('a', str('x'), { kind: 'plain' })).toEqual({ set: { a: str('x') }, remove: ['!exp:a'] });
    expect(encodeField('a', str('x'), { kind: 'never' })).toEqual({
      set: { a: str('x'), '!exp:a': int(-1) },
      remove: [],
    });
  });

  it('finds expired bins and orphaned markers', () => {
    const fields = {
      gone: str('1'),
      [markerBin('gone')]: int(NOW),
      live: str('2'),
      [markerBin('live')]: int(NOW + 1),
      forever: str('3'),
      [markerBin('forever')]: int(-1),
      plain: str('4'),
      [markerBin('orphan')]: int(NOW + 100),
    };
    expect(expiredBins(fields, NOW)).toEqual(['gone', 'orphan']);
    expect(expiredBins(fields, NOW, ['live', 'gone', 'plain'])).toEqual(['gone']);
  });

  it('merges writes with later ones winning', () => {
    const merged = mergeWrites(evict(['a']), { set: { a: str('new') } }, { remove: ['b'] });
    expect(merged).toEqual({ set: { a: str('new') }, remove: ['!exp:a', 'b'] });
  });
});
