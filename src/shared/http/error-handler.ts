/**
 * src/shared/http/error-handler.ts
 *
 * WHY:
 * - Handlers return explicit outcomes for expected failures (not found, validation).
 *   Anything they throw is by definition unexpected and lands here.
 * - One place that turns every uncaught fault into the same problem response.
 *
 * RESPONSIBILITIES:
 * - Fastify client errors (bad JSON, unsupported media type, body too large)
 *   → keep their 4xx status, problem body.
 * - Everything else → 500 problem body carrying the error message as `detail`.
 * - Unknown routes → 404 with an empty body.
 * - Log all errors with request context.
 *
 * RULES:
 * - No business logic here.
 * - Stack traces are logged, never sent.
 * - Never pass a `message` key in log meta: winston appends it to the event name.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { Logger } from '../logger/logger';
import { withRequestContext } from '../logger/with-context';
import { buildProblem, sendProblem } from './problem';

function clientErrorStatus(err: FastifyError): number | null {
  const status = err.statusCode;
  if (typeof status === 'number' && status >= 400 && status < 500) return status;
  return null;
}

export function registerErrorHandler(app: FastifyInstance, logger: Logger): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(logger, req);

    // 1) Framework-level client errors
    const status = clientErrorStatus(err);
    if (status !== null) {
      log.warn('client_error', {
        flow: 'http.error',
        status,
        code: err.code,
        errorMessage: err.message,
      });

      return sendProblem(reply, buildProblem(status, err.message));
    }

    // 2) Unexpected errors
    log.error('unhandled_error', {
      flow: 'http.error',
      errorMessage: err.message,
      stack: err.stack,
    });

    return sendProblem(reply, buildProblem(500, err.message));
  });

  app.setNotFoundHandler((_req: FastifyRequest, reply: FastifyReply) => {
    return reply.status(404).send();
  });
}
