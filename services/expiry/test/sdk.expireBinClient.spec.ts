import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ExpireBinClient, ExpireBinClientError } from '../src/sdk/expireBinClient';
import { buildApp } from '../src/server';
import { MemoryRecordStore } from '../src/storage/memoryRecordStore';
import { createClock, injectFetch, int, str } from './helpers';

type AppInstance = Awaited<ReturnType<typeof buildApp>>;

const key = { namespace: 'test', set: 's', key: 'k' };

describe('ExpireBinClient', () => {
  let app: AppInstance;
  let clock: ReturnType<typeof createClock>;
  let client: ExpireBinClient;

  beforeEach(async () => {
    clock = createClock();
    app = await buildApp({ store: new MemoryRecordStore(), clock: clock.now });
    client = new ExpireBinClient({ baseUrl: 'http://expiry.test', fetch: injectFetch(app) });
  });

  afterEach(async () => {
    await app.close();
  });

  it('writes and reads bins with their ttls', async () => {
    await client.put(key, 'a', str('v'), 20);
    await client.puts(key, [
      { bin: 'b', value: int(7), ttl: -1 },
      { bin: 'blob', value: { type: 'bytes', value: new Uint8Array([1, 2, 3]) } },
    ]);

    expect(await client.get(key, ['a', 'b', 'blob', 'nope'])).toEqual({
      a: str('v'),
      b: int(7),
      blob: { type: 'bytes', value: new Uint8Array([1, 2, 3]) },
    });
    expect(await client.ttl(key, 'a')).toBe(20);
    expect(await client.ttl(key, 'b')).toBe(-1);

    clock.advance(20_000);
    expect(await client.ttl(key, 'a')).toBeNull();
  });

  it('touches deadlines and clears bins', async () => {
    await client.put(key, 'a', str('v'), 0);
    await client.put(key, 'b', str('w'), 0);

    await client.touch(key, [{ bin: 'a', ttl: 45 }]);
    await client.puts(key, [{ bin: 'b' }]);

    expect(await client.ttl(key, 'a')).toBe(45);
    expect(await client.get(key, ['a', 'b'])).toEqual({ a: str('v') });
  });

  it('surfaces failures as ExpireBinClientError', async () => {
    const attempt = client.get(key, ['a']);

    await expect(attempt).rejects.toBeInstanceOf(ExpireBinClientError);
    await expect(attempt).rejects.toMatchObject({
      operation: 'bins.get',
      status: 404,
      body: '{"status":"FAILED","error":"not_found","detail":"record test/s/k not found"}',
    });
  });

  it('runs a sweep to completion', async () => {
    await client.put(key, 'a', str('v'), 1);
    await client.put(key, 'b', str('w'), 0);
    clock.advance(1_000);

    const jobId = await client.clean(key, { bins: ['a'] });
    const snapshot = await client.waitForClean(jobId, 1);

    expect(snapshot.state).toBe('done');
    expect(snapshot.progress).toEqual({ visited: 1, skipped: 0, cleaned: 1, removedBins: 1, errors: 0 });
    expect(await client.get(key, ['a', 'b'])).toEqual({ b: str('w') });

    const report = await client.cancelClean(jobId);
    expect(report.state).toBe('done');
  });
});
