/**
 * src/shared/http/request-context.ts
 *
 * WHY:
 * - We want a stable requestId for logs and debugging.
 * - Request/response log lines for one request must be joinable.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 *
 * RULES:
 * - A client-supplied x-request-id is reused when it looks sane; otherwise we mint one.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
  host: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

export function parseHost(rawHost: unknown): string | null {
  if (typeof rawHost !== 'string') return null;

  const trimmed = rawHost.trim();
  if (!trimmed) return null;

  // strip port if present (e.g., "localhost:3000")
  return trimmed.split(':')[0]?.toLowerCase() ?? null;
}

export function resolveRequestId(raw: unknown): string {
  if (typeof raw === 'string' && REQUEST_ID_PATTERN.test(raw)) return raw;
  return randomUUID();
}

export function registerRequestContext(app: FastifyInstance) {
  // We decorate the request so TypeScript + Fastify know the property exists.
  // We'll assign the real value on each request in the onRequest hook.
  app.decorateRequest('requestContext', null as unknown as RequestContext);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, reply, done) => {
    req.requestContext = {
      requestId: resolveRequestId(req.headers['x-request-id']),
      host: parseHost(req.headers.host),
    };

    void reply.header('x-request-id', req.requestContext.requestId);

    done();
  });
}
