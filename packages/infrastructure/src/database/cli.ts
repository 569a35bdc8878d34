/**
 * Database maintenance entry point
 *
 *   tsx packages/infrastructure/src/database/cli.ts migrate
 *   tsx packages/infrastructure/src/database/cli.ts seed
 */

import { createDatabasePool, createLogger, loadRoutingConfig, toError } from '@chatrouter/core';

import { runMigrations } from './migrations.js';
import { seedDevelopmentData } from './seed.js';

const logger = createLogger({ name: 'db-cli' });

async function main(command: string | undefined): Promise<void> {
  const config = loadRoutingConfig(process.env);
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is required');
  }

  const db = createDatabasePool({ connectionString: config.databaseUrl });
  try {
    switch (command) {
      case 'migrate': {
        const report = await runMigrations(db, { logger });
        logger.info(report, 'Migrations complete');
        break;
      }
      case 'seed':
        await seedDevelopmentData(db, logger);
        break;
      default:
        throw new Error(`Unknown command "${command ?? ''}", expected migrate or seed`);
    }
  } finally {
    await db.end();
  }
}

main(process.argv[2]).catch((error: unknown) => {
  logger.error({ err: toError(error) }, 'Database command failed');
  process.exitCode = 1;
});
