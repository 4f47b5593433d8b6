/**
 * src/shared/http/request-response-logging.ts
 *
 * WHY:
 * - Every request/response pair is logged with its body, for debugging clients.
 * - Request bodies are a one-shot stream and Fastify parses them after hooks run;
 *   response payloads may be streams too. Both have to be buffered, logged,
 *   and then replayed so the parser / the client still get the full content.
 *
 * HOW IT WORKS:
 * 1. preParsing: drain the raw body into a Buffer, log the request line,
 *    return a fresh stream over the same bytes for the body parser.
 * 2. onSend: capture the serialized payload (buffering it when it is a stream),
 *    log status + body, hand the payload (or a replay of it) back to Fastify.
 *
 * RULES:
 * - Bodies over bodyLimitBytes are rejected with 413 before they are fully buffered,
 *   and logged without their content.
 * - Registered directly on the root instance (no encapsulation) so it wraps
 *   every route, the not-found handler and error responses.
 * - Body text is omitted from the lines when `logBodies` is false.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { PassThrough, Readable } from 'node:stream';
import { buffer } from 'node:stream/consumers';
import type { Logger } from '../logger/logger';
import { withRequestContext } from '../logger/with-context';

export type RequestLogParts = {
  scheme: string;
  host: string;
  url: string;
  body: string;
};

export type RequestResponseLoggingOptions = {
  logger: Logger;
  logBodies: boolean;
  // Same limit Fastify enforces; the hook buffers before Fastify's parser sees the body.
  bodyLimitBytes: number;
};

export class PayloadTooLargeError extends Error {
  readonly statusCode = 413;
  readonly code = 'FST_ERR_CTP_BODY_TOO_LARGE';

  constructor(public readonly limitBytes: number) {
    super('Request body is too large');
    this.name = 'PayloadTooLargeError';
  }
}

/**
 * Drains `stream` into one Buffer, rejecting with PayloadTooLargeError as soon as
 * more than `limitBytes` have arrived. The stream is paused, not destroyed, so the
 * connection stays usable for the 413 response.
 */
export function readBoundedBody(stream: Readable, limitBytes: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;

    const cleanup = () => {
      stream.off('data', onData);
      stream.off('end', onEnd);
      stream.off('error', onError);
    };

    const onData = (chunk: Buffer | string) => {
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      received += bytes.length;

      if (received > limitBytes) {
        cleanup();
        stream.pause();
        reject(new PayloadTooLargeError(limitBytes));
        return;
      }

      chunks.push(bytes);
    };

    const onEnd = () => {
      cleanup();
      resolve(Buffer.concat(chunks, received));
    };

    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };

    stream.on('data', onData);
    stream.on('end', onEnd);
    stream.on('error', onError);
  });
}

function declaredLength(req: FastifyRequest): number | null {
  const raw = req.headers['content-length'];
  if (raw === undefined) return null;
  const length = Number(raw);
  return Number.isFinite(length) ? length : null;
}

/**
 * Splits a raw request url into path and query string.
 * The query string keeps its leading `?` and is empty when absent.
 */
export function splitUrl(url: string): { path: string; queryString: string } {
  const idx = url.indexOf('?');
  if (idx === -1) return { path: url, queryString: '' };
  return { path: url.slice(0, idx), queryString: url.slice(idx) };
}

/** `<scheme> <host><path> <queryString> <body>` */
export function formatRequest(parts: RequestLogParts): string {
  const { path, queryString } = splitUrl(parts.url);
  return `${parts.scheme} ${parts.host}${path} ${queryString} ${parts.body}`;
}

/** `<statusCode>: <body>` */
export function formatResponse(statusCode: number, body: string): string {
  return `${statusCode}: ${body}`;
}

function replay(bytes: Buffer): PassThrough {
  const stream = new PassThrough();
  stream.end(bytes);
  return stream;
}

type CapturedPayload = {
  text: string;
  forward: unknown;
};

export async function capturePayload(payload: unknown): Promise<CapturedPayload> {
  if (payload === undefined || payload === null) return { text: '', forward: payload };
  if (typeof payload === 'string') return { text: payload, forward: payload };
  if (Buffer.isBuffer(payload)) return { text: payload.toString('utf8'), forward: payload };

  if (payload instanceof Readable) {
    const bytes = await buffer(payload);
    return { text: bytes.toString('utf8'), forward: replay(bytes) };
  }

  return { text: String(payload), forward: payload };
}

function requestParts(req: FastifyRequest, body: string): RequestLogParts {
  return {
    scheme: req.protocol,
    host: req.headers.host ?? '',
    url: req.url,
    body,
  };
}

export function registerRequestResponseLogging(
  app: FastifyInstance,
  opts: RequestResponseLoggingOptions,
): void {
  app.addHook('preParsing', async (req, reply, payload) => {
    const log = withRequestContext(opts.logger, req);

    const logIncoming = (body: string, meta: Record<string, unknown> = {}) =>
      log.info('http.request.incoming', {
        method: req.method,
        url: req.url,
        request: formatRequest(requestParts(req, body)),
        ...meta,
      });

    const declared = declaredLength(req);
    if (declared !== null && declared > opts.bodyLimitBytes) {
      logIncoming('', { bodyTooLarge: true, contentLength: declared });
      void reply.header('connection', 'close');
      throw new PayloadTooLargeError(opts.bodyLimitBytes);
    }

    let bytes: Buffer;
    try {
      bytes = await readBoundedBody(payload, opts.bodyLimitBytes);
    } catch (err) {
      if (err instanceof PayloadTooLargeError) {
        logIncoming('', { bodyTooLarge: true });
        void reply.header('connection', 'close');
      }
      throw err;
    }

    logIncoming(opts.logBodies ? bytes.toString('utf8') : '');

    // Fastify compares this against content-length once parsing finishes.
    return Object.assign(replay(bytes), { receivedEncodedLength: bytes.length });
  });

  app.addHook('onSend', async (req, reply, payload: unknown) => {
    const captured = await capturePayload(payload);
    const body = opts.logBodies ? captured.text : '';

    withRequestContext(opts.logger, req).info('http.response.outgoing', {
      method: req.method,
      url: req.url,
      statusCode: reply.statusCode,
      response: formatResponse(reply.statusCode, body),
    });

    return captured.forward;
  });
}
