import pino from 'pino';
import { config } from './config.js';

// stdout is left to callers; diagnostics always go to stderr.
export const logger = pino(
  {
    name: 'recap-watchlist',
    level: config.logLevel,
  },
  pino.destination({ dest: 2, sync: true }),
);
