/**
 * src/shared/logger/with-context.ts
 *
 * WHY:
 * - Most logs should include requestId + host so we can trace a full request.
 * - We don't want every handler repeating the same fields manually.
 *
 * HOW TO USE:
 * - In a request handler: `withRequestContext(logger, req).info('msg', { flow: '...' })`
 */

import type { FastifyRequest } from 'fastify';
import type { Logger } from './logger';

type LogMeta = Record<string, unknown>;

export type ContextLogger = {
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
  debug: (msg: string, meta?: LogMeta) => void;
};

export function withRequestContext(logger: Logger, req: FastifyRequest): ContextLogger {
  const base = {
    requestId: req.requestContext?.requestId,
    host: req.requestContext?.host,
  };

  return {
    info: (msg, meta = {}) => logger.info(msg, { ...base, ...meta }),
    warn: (msg, meta = {}) => logger.warn(msg, { ...base, ...meta }),
    error: (msg, meta = {}) => logger.error(msg, { ...base, ...meta }),
    debug: (msg, meta = {}) => logger.debug(msg, { ...base, ...meta }),
  };
}
