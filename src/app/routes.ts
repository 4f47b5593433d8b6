/**
 * src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/, /health, /error)
 *   - module routes (users)
 *
 * RULES:
 * - No business logic here.
 * - Only wiring: app.get/post + handler functions.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { buildProblem, sendProblem } from '../shared/http/problem';

export const ROOT_GREETING = 'Root';

export const GENERIC_ERROR_DETAIL = 'An unexpected error occurred.';

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  app.get('/', () => ROOT_GREETING);

  // Platform checks
  app.get('/health', (req) => {
    return {
      ok: true,
      env: opts.config.nodeEnv,
      service: opts.config.serviceName,
      requestId: req.requestContext.requestId,
    };
  });

  // Fallback problem endpoint; real faults are rendered by the global error handler.
  app.all('/error', (_req, reply) => {
    return sendProblem(reply, buildProblem(500, GENERIC_ERROR_DETAIL));
  });

  // Module routes
  opts.deps.users.registerRoutes(app);
}
