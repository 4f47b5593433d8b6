/**
 * src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Every setting has a default, so the service boots with an empty environment.
 *
 * HOW TO USE:
 * - In dev, a local .env is loaded via dotenv.
 * - buildConfig() takes an explicit env object so tests never touch process.env.
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string.
 *   Invalid values ('prod', 'staging') are caught at startup by Zod.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const LogLevelSchema = z
  .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
  .default('info');

// z.coerce.boolean() turns the string "false" into true.
const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),

  // Logging / service identity
  LOG_LEVEL: LogLevelSchema,
  SERVICE_NAME: z.string().min(1).default('user-management-api'),
  LOG_HTTP_BODIES: BooleanFlagSchema.default('true'),

  // HTTP
  BODY_LIMIT_BYTES: z.coerce
    .number()
    .int()
    .min(1024)
    .default(1024 * 1024),

  // Users
  USERS_DEFAULT_PAGE_SIZE: z.coerce.number().int().min(1).max(1000).default(10),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  host: string;
  port: number;

  logLevel: LogLevel;
  serviceName: string;

  http: {
    logBodies: boolean;
    bodyLimitBytes: number;
  };

  users: {
    defaultPageSize: number;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.HOST,
    port: parsed.PORT,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    http: {
      logBodies: parsed.LOG_HTTP_BODIES,
      bodyLimitBytes: parsed.BODY_LIMIT_BYTES,
    },

    users: {
      defaultPageSize: parsed.USERS_DEFAULT_PAGE_SIZE,
    },
  };
}
