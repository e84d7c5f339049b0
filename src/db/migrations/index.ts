/**
 * threatreg — Database migration registry
 *
 * Manages versioned migrations using SQLite's PRAGMA user_version.
 * v0 is the base schema and is never run by runMigrations(): a database
 * at user_version 0 either is empty (full schema) or already has it.
 */

import type Database from 'better-sqlite3';
import v1 from './v1.js';

export interface Migration {
  version: number;
  description: string;
  up(db: Database.Database): void;
}

/** All incremental migrations, sorted by version ascending. */
const migrations: Migration[] = [v1];

/** The latest schema version (after all migrations applied). */
export const LATEST_VERSION: number = migrations.reduce(
  (latest, migration) => Math.max(latest, migration.version),
  0,
);

export function getSchemaVersion(db: Database.Database): number {
  return db.pragma('user_version', { simple: true }) as number;
}

export function setSchemaVersion(db: Database.Database, version: number): void {
  db.pragma(`user_version = ${version}`);
}

/** Migrations newer than currentVersion, in the order they must run. */
export function pendingMigrations(currentVersion: number): Migration[] {
  return migrations.filter((m) => m.version > currentVersion);
}

/**
 * Run all pending migrations from currentVersion to LATEST_VERSION.
 * Each migration and its version bump commit together.
 *
 * @returns the migrations that were applied
 */
export function runMigrations(db: Database.Database, currentVersion: number): Migration[] {
  const pending = pendingMigrations(currentVersion);
  for (const migration of pending) {
    const runMigration = db.transaction(() => {
      migration.up(db);
      setSchemaVersion(db, migration.version);
    });
    runMigration();
  }
  return pending;
}
