import pino from 'pino';
import { Logger } from '../types/index.js';

const baseLogger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'catalog-change-detector' },
  transport:
    process.env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

function write(level: 'debug' | 'info' | 'warn' | 'error', message: string, meta?: Record<string, unknown>): void {
  if (meta && Object.keys(meta).length > 0) {
    baseLogger[level](meta, message);
  } else {
    baseLogger[level](message);
  }
}

export const logger: Logger = {
  debug: (message, meta) => write('debug', message, meta),
  info: (message, meta) => write('info', message, meta),
  warn: (message, meta) => write('warn', message, meta),
  error: (message, meta) => write('error', message, meta),
};

/**
 * Formats an unknown thrown value for log metadata
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
