import type { BinName, FieldValue, RecordFields, RecordKey, RecordSetId } from '../types';
import type { SweepReport, SweepSnapshot } from '../engine/sweep';
import { fromWire, toWire, type WireFieldValue } from '../values';

const DEFAULT_BASE_URL = 'http://localhost:8080';
const DEFAULT_POLL_INTERVAL_MS = 500;

type FetchImpl = typeof fetch;

export interface ExpireBinClientOptions {
  baseUrl?: string;
  fetch?: FetchImpl;
}

export interface ClientBinPut {
  bin: BinName;
  value?: FieldValue;
  ttl?: number;
}

export interface ClientBinTouch {
  bin: BinName;
  ttl: number;
}

export interface CleanOptions {
  bins?: BinName[];
  timeoutMs?: number;
}

export class ExpireBinClientError extends Error {
  constructor(
    readonly operation: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`${operation} failed: ${status}${body ? ` - ${body}` : ''}`);
    this.name = 'ExpireBinClientError';
  }
}

interface GetResponse {
  bins: Record<string, WireFieldValue>;
}

interface TtlResponse {
  ttl: number | null;
}

interface CleanStartResponse {
  job_id: string;
}

/** HTTP client for the bin expiry service. */
export class ExpireBinClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchImpl;

  constructor(options: ExpireBinClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    const fetchImpl = options.fetch ?? globalThis.fetch;
    if (!fetchImpl) {
      throw new Error('ExpireBinClient: fetch implementation required');
    }
    this.fetchImpl = fetchImpl.bind(globalThis);
  }

  /** Values of the requested bins; absent and expired bins are left out. */
  async get(key: RecordKey, bins: BinName[]): Promise<RecordFields> {
    const search = new URLSearchParams({ ...keyParams(key), bins: bins.join(',') });
    const body = await this.request<GetResponse>('bins.get', 'GET', `/bins.get?${search.toString()}`);
    return Object.fromEntries(Object.entries(body.bins).map(([bin, value]) => [bin, fromWire(value)]));
  }

  async put(key: RecordKey, bin: BinName, value: FieldValue, ttl: number): Promise<void> {
    await this.request('bins.put', 'POST', '/bins.put', {
      ...keyParams(key),
      bin,
      value: toWire(value),
      ttl_s: ttl,
    });
  }

  async puts(key: RecordKey, entries: ClientBinPut[]): Promise<void> {
    await this.request('bins.puts', 'POST', '/bins.puts', {
      ...keyParams(key),
      bins: entries.map((entry) => ({
        bin: entry.bin,
        ...(entry.value !== undefined ? { value: toWire(entry.value) } : {}),
        ...(entry.ttl !== undefined ? { ttl_s: entry.ttl } : {}),
      })),
    });
  }

  async touch(key: RecordKey, entries: ClientBinTouch[]): Promise<void> {
    await this.request('bins.touch', 'POST', '/bins.touch', {
      ...keyParams(key),
      bins: entries.map((entry) => ({ bin: entry.bin, ttl_s: entry.ttl })),
    });
  }

  /** Seconds left, `-1` when the bin never expires, `null` when absent or expired. */
  async ttl(key: RecordKey, bin: BinName): Promise<number | null> {
    const search = new URLSearchParams({ ...keyParams(key), bin });
    const body = await this.request<TtlResponse>('bins.ttl', 'GET', `/bins.ttl?${search.toString()}`);
    return body.ttl;
  }

  async clean(recordSet: RecordSetId, options: CleanOptions = {}): Promise<string> {
    const body = await this.request<CleanStartResponse>('bins.clean', 'POST', '/bins.clean', {
      ns: recordSet.namespace,
      set: recordSet.set,
      ...(options.bins ? { bins: options.bins } : {}),
      ...(options.timeoutMs !== undefined ? { timeout_ms: options.timeoutMs } : {}),
    });
    return body.job_id;
  }

  async cleanStatus(jobId: string): Promise<SweepSnapshot> {
    const search = new URLSearchParams({ job_id: jobId });
    return this.request<SweepSnapshot>('bins.clean', 'GET', `/bins.clean?${search.toString()}`);
  }

  async cancelClean(jobId: string): Promise<SweepReport> {
    return this.request<SweepReport>('bins.clean', 'DELETE', '/bins.clean', { job_id: jobId });
  }

  /** Polls until the sweep leaves the running state. */
  async waitForClean(jobId: string, intervalMs = DEFAULT_POLL_INTERVAL_MS): Promise<SweepSnapshot> {
    for (;;) {
      const snapshot = await this.cleanStatus(jobId);
      if (snapshot.state !== 'running') return snapshot;
      await sleep(intervalMs);
    }
  }

  private async request<T>(operation: string, method: string, path: string, payload?: unknown): Promise<T> {
    const init: RequestInit = { method };
    if (payload !== undefined) {
      init.headers = { 'content-type': 'application/json' };
      init.body = JSON.stringify(payload);
    }

    const res = await this.fetchImpl(`${this.baseUrl}${path}`, init);
    if (!res.ok) {
      throw new ExpireBinClientError(operation, res.status, await safeReadBody(res));
    }
    return (await res.json()) as T;
  }
}

function keyParams(key: RecordKey) {
  return { ns: key.namespace, set: key.set, key: key.key };
}

async function safeReadBody(res: Response): Promise<string> {
  try {
    return await res.text();
  } catch {
    return '';
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
