/**
 * chatrouter API Server
 *
 * Widget, agent console and admin endpoints over the routing services.
 */

import { logger } from '@chatrouter/core';

import { buildApp } from './app.js';
import { loadApiConfig } from './config.js';
import { createContainer } from './container.js';

async function main(): Promise<void> {
  const config = loadApiConfig();
  const container = createContainer(config);
  const app = await buildApp({ config, container });

  // A second signal during shutdown is ignored
  let isShuttingDown = false;
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

  for (const signal of signals) {
    process.on(signal, () => {
      if (isShuttingDown) {
        logger.info({ signal }, 'Shutdown already in progress, ignoring duplicate signal');
        return;
      }
      isShuttingDown = true;
      logger.info({ signal }, 'Received shutdown signal');
      app
        .close()
        .then(() => {
          logger.info('Server closed gracefully');
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        });
    });
  }

  process.on('uncaughtException', (error) => {
    logger.fatal({ err: error }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ err: reason }, 'Unhandled rejection');
    process.exit(1);
  });

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address, env: config.nodeEnv }, 'chatrouter API server started');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  try {
    logger.fatal({ err: error }, 'Fatal error during startup');
  } catch {
    console.error('Fatal error during startup (logger unavailable):', error);
  }
  process.exit(1);
});
