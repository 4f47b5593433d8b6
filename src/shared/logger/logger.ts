/**
 * src/shared/logger/logger.ts
 *
 * WHY:
 * - Central logger factory (structured JSON logs).
 * - Keeps logging consistent across app/modules.
 * - Adds stable metadata (service, env) on every line.
 *
 * HOW TO USE:
 * - The composition root (app/di.ts) builds one logger from config and passes it down.
 * - `logger` below is only for the entrypoint (before config is parsed / fatal startup).
 * - Prefer `withRequestContext(logger, req)` inside request handlers.
 * - Do not log raw Error objects only—pass `{ err }` so stack/message is preserved.
 */

import winston from 'winston';

export type Logger = winston.Logger;

export type CreateLoggerOptions = {
  level: string;
  service: string;
  env: string;
  // Tests pass a Stream transport to capture output.
  transports?: winston.LoggerOptions['transports'];
};

export function createLogger(opts: CreateLoggerOptions): Logger {
  return winston.createLogger({
    level: opts.level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }), // ensures Error.stack is serialized
      winston.format.json(),
    ),
    defaultMeta: {
      service: opts.service,
      env: opts.env,
    },
    transports: opts.transports ?? [new winston.transports.Console()],
  });
}

export const logger = createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  service: process.env.SERVICE_NAME ?? 'user-management-api',
  env: process.env.NODE_ENV ?? 'development',
});
