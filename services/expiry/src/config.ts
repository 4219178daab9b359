import 'dotenv/config';

export type StoreBackend = 'redis' | 'memory';

const DEFAULT_MAX_TTL_SECONDS = 60 * 60 * 24 * 365; // one year

export const config = {
  port: parseInt(process.env.PORT || '8080', 10),
  host: process.env.HOST || '0.0.0.0',
  logLevel: process.env.LOG_LEVEL || 'info',
  redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
  store: parseStoreBackend(process.env.STORE_BACKEND),
  keyPrefix: process.env.KEY_PREFIX || 'eb',
  // bin TTL bounds to avoid abuse
  ttl: {
    maxSeconds: parseInt(process.env.BIN_TTL_MAX_SECONDS || String(DEFAULT_MAX_TTL_SECONDS), 10),
  },
  rmw: {
    maxRetries: parseInt(process.env.RMW_MAX_RETRIES || '16', 10),
  },
  sweep: {
    scanCount: parseInt(process.env.SWEEP_SCAN_COUNT || '100', 10),
    retainJobs: parseInt(process.env.SWEEP_RETAIN_JOBS || '50', 10),
  },
};

function parseStoreBackend(value: string | undefined): StoreBackend {
  if (!value || value === 'redis') return 'redis';
  if (value === 'memory') return 'memory';
  throw new Error(`Unsupported STORE_BACKEND: ${value}`);
}
