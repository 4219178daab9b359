import pino from 'pino';
import { config } from './config';

/** Standalone logger for code running outside the Fastify app (scripts, demo). */
export const logger = pino({ name: 'bin-expiry', level: config.logLevel });
