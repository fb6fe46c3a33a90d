import { pino, type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: string;
  name?: string;
}

/**
 * Build the process logger. The API hands the same instance to Fastify so engine
 * and request logs share one stream.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'used-market',
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
  });
}
