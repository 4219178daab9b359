import Fastify, { type FastifyServerOptions } from 'fastify';
import { config } from './config';
import { createEngine, type ExpiryEngine } from './engine';
import { SweepRegistry } from './engine/sweepRegistry';
import type { RecordStore } from './contracts/recordStore';
import { getRedis } from './redis/client';
import { MemoryRecordStore } from './storage/memoryRecordStore';
import { RedisRecordStore } from './storage/redisRecordStore';
import { registerBinRoutes } from './routes/bins';
import { registerCleanRoutes } from './routes/clean';

export interface BuildAppOptions {
  /** Prebuilt engine; when absent one is created over `store`. */
  engine?: ExpiryEngine;
  store?: RecordStore;
  clock?: () => number;
  logger?: FastifyServerOptions['logger'];
}

export function createStore(): RecordStore {
  if (config.store === 'memory') return new MemoryRecordStore();
  return new RedisRecordStore(getRedis(), {
    keyPrefix: config.keyPrefix,
    maxRetries: config.rmw.maxRetries,
    scanCount: config.sweep.scanCount,
  });
}

export async function buildApp(options: BuildAppOptions = {}) {
  const app = Fastify({ logger: options.logger ?? false });

  const engine =
    options.engine ??
    createEngine({
      store: options.store ?? createStore(),
      logger: app.log,
      clock: options.clock,
      maxTtlSeconds: config.ttl.maxSeconds,
    });
  const sweeps = new SweepRegistry(config.sweep.retainJobs);

  app.get('/health', async () => {
    try {
      await engine.store.ping();
      return { status: 'ok', store: 'ok' };
    } catch (err) {
      app.log.error({ err }, 'Record store health check failed');
      return { status: 'degraded', store: 'error' };
    }
  });

  await registerBinRoutes(app, engine);
  await registerCleanRoutes(app, engine, sweeps);

  app.addHook('onClose', async () => {
    await sweeps.cancelAll();
  });

  return app;
}
