/**
 * src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * ORDER MATTERS:
 * - request context first (every later hook logs requestId),
 * - then request/response logging,
 * - then the error + not-found handlers.
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { registerRequestContext } from '../shared/http/request-context';
import { registerRequestResponseLogging } from '../shared/http/request-response-logging';
import { registerErrorHandler } from '../shared/http/error-handler';

export function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    bodyLimit: opts.config.http.bodyLimitBytes,
  });

  registerRequestContext(app);

  registerRequestResponseLogging(app, {
    logger: opts.deps.logger,
    logBodies: opts.config.http.logBodies,
    bodyLimitBytes: opts.config.http.bodyLimitBytes,
  });

  registerErrorHandler(app, opts.deps.logger);

  return app;
}
