import type { FastifyBaseLogger } from 'fastify';
import pino, { stdTimeFunctions, type LoggerOptions } from 'pino';

export const createLogger = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

/** The subset of the request logger that background components write to. */
export type ServiceLogger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

/** Standalone logger for processes that run without a Fastify instance. */
export const createProcessLogger = (level: string): ServiceLogger => pino(createLogger(level));
