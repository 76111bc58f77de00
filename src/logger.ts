import pino from 'pino';
import { config, isTest } from './config.js';

// No transport under Vitest: pino-pretty runs in a worker thread that outlives the test run
export const logger = isTest
  ? pino({ level: config.LOG_LEVEL })
  : pino({ level: config.LOG_LEVEL, transport: { target: 'pino-pretty' } });
