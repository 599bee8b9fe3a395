// ===========================================
// LOGGER UTILITY
// ===========================================

import pino from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';
import { appConfig } from '../config/index.js';
import type { AppConfig } from '../types/index.js';

// Error objects are logged under either key across the codebase
export const LOG_SERIALIZERS = {
  err: pino.stdSerializers.err,
  error: pino.stdSerializers.err,
};

/**
 * Build the service logger. A destination bypasses the pretty transport.
 */
export function createLogger(
  config: Pick<AppConfig, 'nodeEnv' | 'logLevel'>,
  destination?: DestinationStream
): Logger {
  const options: LoggerOptions = {
    level: config.logLevel,
    serializers: LOG_SERIALIZERS,
    base: {
      env: config.nodeEnv,
      service: 'airhealth-query-engine',
    },
  };

  if (destination) {
    return pino(options, destination);
  }

  return pino({
    ...options,
    transport: config.nodeEnv === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    } : undefined,
  });
}

/**
 * Child logger bound to one query. Every line carries the request id and,
 * once known, the dispatched intent.
 */
export function requestLogger(log: Logger, requestId: string, intent?: string): Logger {
  return log.child(intent === undefined ? { requestId } : { requestId, intent });
}

export const logger = createLogger(appConfig);

export type { Logger } from 'pino';

export default logger;
