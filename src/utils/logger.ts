// ===========================================
// LOGGER UTILITY
// ===========================================

import pino from 'pino';
import { appConfig } from '../config/index.js';

export const logger = pino({
  level: appConfig.logLevel,
  transport: appConfig.nodeEnv === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  } : undefined,
  base: {
    env: appConfig.nodeEnv,
  },
  // Upstream credentials ride along on axios error objects
  redact: {
    paths: [
      'error.config.headers.Authorization',
      'err.config.headers.Authorization',
      'headers.Authorization',
    ],
    censor: '[redacted]',
  },
});

/**
 * Child logger tagged with the component name, so a scan cycle can be
 * followed across market data, verifier and scorer lines.
 */
export function componentLogger(component: string): pino.Logger {
  return logger.child({ component });
}

export default logger;
