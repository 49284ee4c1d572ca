import pino from 'pino';
import type { FastifyBaseLogger } from 'fastify';
import type { Env } from './env';

export function createLogger(
  options: { level?: Env['LOG_LEVEL']; name?: string } = {}
): FastifyBaseLogger {
  return pino({
    name: options.name ?? 'ragme',
    level: options.level ?? 'info',
  });
}
