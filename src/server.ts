/**
 * Server entry: loads configuration, builds the application and serves it
 * until SIGTERM or SIGINT.
 *
 * @module server
 */

import { createApp } from './app.js';
import { buildAppDependencies, createMemoryStores, createRedisStores } from './bootstrap.js';
import { configWarnings, loadConfig } from './config/appConfig.js';
import { createLogger, toError } from './logging/logger.js';
import { pgUserDirectory } from './repositories/userDirectory.js';
import { startSecuritySweeper } from './security/sweeper.js';
import { createRedisClient } from './store/redisStores.js';
import { closePool, openPool } from './utils/db.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, context: { component: 'server' } });

  for (const warning of configWarnings(config)) {
    logger.warn(warning);
  }

  const redis = config.redisUrl ? createRedisClient(config.redisUrl, logger) : null;
  const stores = redis ? createRedisStores(redis) : createMemoryStores();
  logger.info('Security stores ready', { backend: redis ? 'redis' : 'memory' });

  openPool(config.database, logger);
  const deps = buildAppDependencies({ config, logger, stores, directory: pgUserDirectory });
  const app = createApp(deps);

  const stopSweeper = startSecuritySweeper({
    targets: deps.sweepTargets,
    intervalMs: config.sweepIntervalSeconds * 1000,
    logger,
  });

  const server = app.listen(config.port, () => {
    logger.info('Server listening', { port: config.port, env: config.env });
  });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });
    stopSweeper();

    server.close((closeErr) => {
      if (closeErr) logger.error('HTTP server close failed', closeErr);
      Promise.all([redis ? redis.quit() : Promise.resolve('OK'), closePool()])
        .then(() => {
          logger.info('Shutdown complete');
          process.exit(closeErr ? 1 : 0);
        })
        .catch((err: unknown) => {
          logger.error('Shutdown failed', toError(err));
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  createLogger().fatal('Startup failed', toError(err));
  process.exit(1);
});
