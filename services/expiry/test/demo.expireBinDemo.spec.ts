import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { runExpireBinDemo } from '../src/demo/expireBinDemo';
import { ExpireBinClient } from '../src/sdk/expireBinClient';
import { buildApp } from '../src/server';
import { MemoryRecordStore } from '../src/storage/memoryRecordStore';
import { createClock, injectFetch, silentLogger } from './helpers';

type AppInstance = Awaited<ReturnType<typeof buildApp>>;

describe('expire bin demo', () => {
  let app: AppInstance;
  let clock: ReturnType<typeof createClock>;

  beforeEach(async () => {
    clock = createClock();
    app = await buildApp({ store: new MemoryRecordStore(), clock: clock.now });
  });

  afterEach(async () => {
    await app.close();
  });

  it('walks through write, expiry, touch and clean', async () => {
    const client = new ExpireBinClient({ baseUrl: 'http://expiry.test', fetch: injectFetch(app) });

    const result = await runExpireBinDemo(client, silentLogger, {
      sleep: async (ms) => clock.advance(ms),
    });

    expect(result.initial).toEqual({
      TestBin1: 'Hello World.',
      TestBin2: "I don't expire.",
      TestBin3: 'I will expire soon.',
      TestBin4: 'Good Morning.',
      TestBin5: 'Good Night.',
    });
    expect(result.initialTtls).toEqual({ TestBin1: -1, TestBin2: -1, TestBin3: 5, TestBin4: 100, TestBin5: -1 });
    expect(result.afterWait).toEqual({
      TestBin1: 'Hello World.',
      TestBin2: "I don't expire.",
      TestBin4: 'Good Morning.',
      TestBin5: 'Good Night.',
    });
    expect(result.touchedTtls).toEqual({ TestBin1: 10, TestBin2: -1, TestBin3: null, TestBin4: 5, TestBin5: -1 });
    expect(result.sweep.state).toBe('done');
    expect(result.sweep.progress).toEqual({ visited: 1, skipped: 0, cleaned: 0, removedBins: 0, errors: 0 });
    expect(result.afterClean).toEqual(result.afterWait);
  });
});
