/**
 * Schema migrations
 *
 * Applies the numbered SQL files under `packages/infrastructure/migrations`
 * in name order and records each in `schema_migrations`. A file and its
 * bookkeeping row are sent as one multi-statement simple query, which
 * Postgres runs as a single implicit transaction: files must not contain
 * their own BEGIN/COMMIT.
 *
 * @module infrastructure/database/migrations
 */

import { readdir, readFile } from 'node:fs/promises';
import { pathToFileURL } from 'node:url';
import {
  DatabaseOperationError,
  createLogger,
  toError,
  type DatabaseClient,
  type ServiceLogger,
} from '@chatrouter/core';

export const DEFAULT_MIGRATIONS_DIR = new URL('../../migrations/', import.meta.url);

const MIGRATION_FILE_PATTERN = /^\d{3}_[a-z0-9_]+\.sql$/;

export interface MigrationOptions {
  directory?: URL | string;
  logger?: ServiceLogger;
}

export interface MigrationReport {
  applied: string[];
  skipped: string[];
}

/**
 * Migration file names in the directory, in apply order
 */
export async function listMigrationFiles(directory: URL | string): Promise<string[]> {
  const entries = await readdir(directory);
  return entries.filter((name) => MIGRATION_FILE_PATTERN.test(name)).sort();
}

export async function runMigrations(
  db: DatabaseClient,
  options: MigrationOptions = {}
): Promise<MigrationReport> {
  const directory = options.directory ?? DEFAULT_MIGRATIONS_DIR;
  const logger = options.logger ?? createLogger({ name: 'migrations' });

  await db.query(
    `CREATE TABLE IF NOT EXISTS schema_migrations (
       name        TEXT PRIMARY KEY,
       applied_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
     )`
  );

  const appliedRows = await db.query<{ name: string }>('SELECT name FROM schema_migrations');
  const alreadyApplied = new Set(appliedRows.rows.map((row) => row.name));

  const report: MigrationReport = { applied: [], skipped: [] };

  for (const name of await listMigrationFiles(directory)) {
    if (alreadyApplied.has(name)) {
      report.skipped.push(name);
      continue;
    }

    const sql = await readFile(new URL(name, toDirectoryUrl(directory)), 'utf8');
    try {
      // name matched MIGRATION_FILE_PATTERN
      await db.query(`${sql}\nINSERT INTO schema_migrations (name) VALUES ('${name}');`);
    } catch (error) {
      const cause = toError(error);
      logger.error({ err: cause, migration: name }, 'Migration failed');
      throw new DatabaseOperationError('migrate', `${name}: ${cause.message}`, cause);
    }

    logger.info({ migration: name }, 'Migration applied');
    report.applied.push(name);
  }

  return report;
}

function toDirectoryUrl(directory: URL | string): URL {
  if (directory instanceof URL) return directory;
  return pathToFileURL(directory.endsWith('/') ? directory : `${directory}/`);
}
