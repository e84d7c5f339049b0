import type Database from 'better-sqlite3';
import { SCHEMA_SQL } from './schema.js';
import {
  getSchemaVersion,
  setSchemaVersion,
  runMigrations,
  LATEST_VERSION,
} from './migrations/index.js';
import { createLogger } from '../logger.js';

/**
 * Migrate the database to the latest schema version.
 *
 * - New database (user_version = 0, no tables): runs full schema SQL and sets version.
 * - Existing database (user_version = 0, has tables): runs incremental migrations.
 * - Already up-to-date (user_version = LATEST_VERSION): re-runs the IF NOT EXISTS schema only.
 */
export function migrateDatabase(db: Database.Database): void {
  const logger = createLogger('migrate');
  db.pragma('foreign_keys = ON');

  const currentVersion = getSchemaVersion(db);

  if (currentVersion >= LATEST_VERSION) {
    db.exec(SCHEMA_SQL);
    return;
  }

  if (currentVersion === 0) {
    const tableCount = (
      db
        .prepare(
          "SELECT COUNT(*) AS cnt FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'",
        )
        .get() as { cnt: number }
    ).cnt;

    if (tableCount === 0) {
      db.exec(SCHEMA_SQL);
      setSchemaVersion(db, LATEST_VERSION);
      logger.info({ version: LATEST_VERSION }, 'Created fresh schema');
      return;
    }
  }

  const applied = runMigrations(db, currentVersion);
  logger.info(
    { from: currentVersion, to: LATEST_VERSION, applied: applied.map((m) => m.description) },
    'Applied schema migrations',
  );
}
