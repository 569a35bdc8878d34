/**
 * Database Infrastructure
 *
 * Schema migrations and development seed data.
 *
 * @module infrastructure/database
 */

export {
  DEFAULT_MIGRATIONS_DIR,
  listMigrationFiles,
  runMigrations,
  type MigrationOptions,
  type MigrationReport,
} from './migrations.js';
export { DEV_BRANCH_ID, DEV_WIDGET_TOKEN, seedDevelopmentData, type SeedReport } from './seed.js';
