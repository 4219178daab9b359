import { logger } from '../logger';
import { ExpireBinClient } from '../sdk/expireBinClient';
import { runExpireBinDemo } from './expireBinDemo';

const baseUrl = process.env.EXPIRY_BASE_URL ?? `http://localhost:${process.env.PORT || '8080'}`;

runExpireBinDemo(new ExpireBinClient({ baseUrl }), logger).catch((err) => {
  logger.error({ err }, 'Demo failed');
  process.exit(1);
});
