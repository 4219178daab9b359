import pino from 'pino';
import { createEngine } from '../src/engine';
import type { buildApp } from '../src/server';
import { MemoryRecordStore } from '../src/storage/memoryRecordStore';
import type { FieldValue, RecordKey } from '../src/types';

export const T0_MS = 1_700_000_000_000;
export const T0 = T0_MS / 1000;

export const silentLogger = pino({ level: 'silent' });

export function createClock(startMs = T0_MS) {
  let now = startMs;
  return {
    now: () => now,
    advance(ms: number) {
      now += ms;
    },
  };
}

export function createTestEngine(store = new MemoryRecordStore()) {
  const clock = createClock();
  const engine = createEngine({ store, logger: silentLogger, clock: clock.now, maxTtlSeconds: 3600 });
  return { store, clock, engine };
}

export function recordKey(key: string, set = 's'): RecordKey {
  return { namespace: 'test', set, key };
}

export const str = (value: string): FieldValue => ({ type: 'string', value });
export const int = (value: number): FieldValue => ({ type: 'int', value });

type AppInstance = Awaited<ReturnType<typeof buildApp>>;
type InjectMethod = 'GET' | 'POST' | 'DELETE';

function injectMethod(method: string | undefined): InjectMethod {
  const upper = (method ?? 'GET').toUpperCase();
  if (upper === 'GET' || upper === 'POST' || upper === 'DELETE') return upper;
  throw new Error(`unsupported method ${upper}`);
}

/** `fetch` that answers from an in-process app instead of the network. */
export function injectFetch(app: AppInstance): typeof fetch {
  return async (input, init) => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url);
    const res = await app.inject({
      method: injectMethod(init?.method),
      url: `${url.pathname}${url.search}`,
      ...(typeof init?.body === 'string'
        ? { payload: init.body, headers: { 'content-type': 'application/json' } }
        : {}),
    });
    return new Response(res.body, {
      status: res.statusCode,
      headers: { 'content-type': 'application/json' },
    });
  };
}
