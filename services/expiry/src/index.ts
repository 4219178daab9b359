import { config } from './config';
import { closeRedis } from './redis/client';
import { buildApp } from './server';

/**
 * Main entrypoint for the bin expiry service.
 * Builds the app over the configured record store and listens on configured host/port.
 */
async function main() {
  const app = await buildApp({ logger: { level: config.logLevel } });

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, 'Shutting down');
    await app.close();
    if (config.store === 'redis') await closeRedis();
    process.exit(0);
  };
  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      console.error('Shutdown failed:', err);
      process.exit(1);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Bin expiry server listening on http://${config.host}:${config.port} (store: ${config.store})`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting bin expiry service:', err);
  process.exit(1);
});
