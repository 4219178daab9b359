/**
 * Walkthrough of expiring bins against a running service.
 *
 * Flow:
 *  1. Write five bins: two that never expire, one expiring in 5s, and a batch of one 100s bin plus one plain bin.
 *  2. Read them back with their TTLs.
 *  3. Wait for the short-lived bin to expire and read again.
 *  4. Touch two bins to change their deadlines.
 *  5. Sweep the set and read once more.
 */
import type { BaseLogger } from 'pino';
import type { ExpireBinClient } from '../sdk/expireBinClient';
import type { RecordKey } from '../types';
import { fromJson, toJson } from '../values';

export const DEMO_BINS = ['TestBin1', 'TestBin2', 'TestBin3', 'TestBin4', 'TestBin5'];

export interface DemoOptions {
  key?: RecordKey;
  /** How long to wait for TestBin3 to lapse. */
  waitMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export async function runExpireBinDemo(client: ExpireBinClient, log: BaseLogger, options: DemoOptions = {}) {
  const key = options.key ?? { namespace: 'test', set: 'expireBin', key: 'testKey' };
  const waitMs = options.waitMs ?? 10_000;
  const sleep = options.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));

  const showBins = async (label: string) => {
    const fields = await client.get(key, DEMO_BINS);
    const values = Object.fromEntries(Object.entries(fields).map(([bin, value]) => [bin, toJson(value)]));
    log.info({ bins: values }, label);
    return values;
  };
  const showTtls = async () => {
    const ttls: Record<string, number | null> = {};
    for (const bin of DEMO_BINS) ttls[bin] = await client.ttl(key, bin);
    log.info({ ttls }, 'Bin TTLs');
    return ttls;
  };

  log.info('Creating expire bins...');
  await client.put(key, 'TestBin1', fromJson('Hello World.'), -1);
  await client.put(key, 'TestBin2', fromJson("I don't expire."), -1);
  await client.put(key, 'TestBin3', fromJson('I will expire soon.'), 5);
  await client.puts(key, [
    { bin: 'TestBin4', value: fromJson('Good Morning.'), ttl: 100 },
    { bin: 'TestBin5', value: fromJson('Good Night.'), ttl: 0 },
  ]);

  const initial = await showBins('Bins after writes');
  const initialTtls = await showTtls();

  log.info({ waitMs }, 'Waiting for TestBin3 to expire...');
  await sleep(waitMs);
  const afterWait = await showBins('Bins after waiting');

  log.info('Changing expiration times...');
  await client.touch(key, [
    { bin: 'TestBin1', ttl: 10 },
    { bin: 'TestBin4', ttl: 5 },
  ]);
  const touchedTtls = await showTtls();

  log.info('Cleaning bins...');
  const jobId = await client.clean(key, { bins: DEMO_BINS });
  const sweep = await client.waitForClean(jobId);
  log.info({ state: sweep.state, progress: sweep.progress }, 'Scan completed');
  const afterClean = await showBins('Bins after clean');

  return { initial, initialTtls, afterWait, touchedTtls, sweep, afterClean };
}
