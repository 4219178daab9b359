// Text encoding of bin values inside Redis hash fields: a one-letter tag, ':' and the payload.
import type { FieldValue } from '../types';

const SEP = ':';

export function encodeParticle(value: FieldValue): string {
  switch (value.type) {
    case 'nil':
      return `N${SEP}`;
    case 'bool':
      return `B${SEP}${value.value ? '1' : '0'}`;
    case 'int':
      return `I${SEP}${value.value}`;
    case 'float':
      return `F${SEP}${value.value}`;
    case 'string':
      return `S${SEP}${value.value}`;
    case 'bytes':
      return `X${SEP}${Buffer.from(value.value).toString('base64')}`;
    case 'list':
      return `L${SEP}${JSON.stringify(value.value.map(encodeParticle))}`;
    case 'map': {
      const entries = Object.entries(value.value).map(([k, v]) => [k, encodeParticle(v)]);
      return `M${SEP}${JSON.stringify(Object.fromEntries(entries))}`;
    }
  }
}

/** Hash values written by other clients carry no tag and read back as strings. */
export function decodeParticle(raw: string): FieldValue {
  if (raw.length < 2 || raw[1] !== SEP) return { type: 'string', value: raw };
  const payload = raw.slice(2);
  switch (raw[0]) {
    case 'N':
      return { type: 'nil' };
    case 'B':
      return { type: 'bool', value: payload === '1' };
    case 'I':
      return numberParticle('int', payload, raw);
    case 'F':
      return numberParticle('float', payload, raw);
    case 'S':
      return { type: 'string', value: payload };
    case 'X':
      return { type: 'bytes', value: new Uint8Array(Buffer.from(payload, 'base64')) };
    case 'L': {
      const items = parseJson(payload);
      if (!Array.isArray(items)) return { type: 'string', value: raw };
      return { type: 'list', value: items.map((item) => decodeParticle(String(item))) };
    }
    case 'M': {
      const entries = parseJson(payload);
      if (!isPlainObject(entries)) return { type: 'string', value: raw };
      const decoded = Object.entries(entries).map(([k, v]) => [k, decodeParticle(String(v))] as const);
      return { type: 'map', value: Object.fromEntries(decoded) };
    }
    default:
      return { type: 'string', value: raw };
  }
}

function numberParticle(type: 'int' | 'float', payload: string, raw: string): FieldValue {
  const value = Number(payload);
  if (payload === '' || (Number.isNaN(value) && payload !== 'NaN')) return { type: 'string', value: raw };
  return { type, value };
}

function parseJson(payload: string): unknown {
  try {
    return JSON.parse(payload);
  } catch {
    return undefined;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
