/**
 * src/index.ts
 *
 * WHY:
 * - Single entrypoint for the service.
 * - Keeps startup logic small: load config -> build app -> listen.
 */

import { buildConfig } from './app/config';
import { buildApp } from './app/build-app';
import { logger } from './shared/logger/logger';

async function main(): Promise<void> {
  const config = buildConfig();
  const { app, deps, close } = await buildApp(config);

  await app.listen({ port: config.port, host: config.host });

  deps.logger.info('server.listening', {
    host: config.host,
    port: config.port,
    env: config.nodeEnv,
    service: config.serviceName,
  });

  const shutdown = async (signal: string) => {
    deps.logger.info('server.shutdown', { signal });
    await close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

void main().catch((err: unknown) => {
  logger.error('server.fatal_startup_error', { err });
  process.exit(1);
});
