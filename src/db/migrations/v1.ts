/**
 * Migration v1: Add threat pattern tables
 *
 * This migration adds threat_patterns and their ordered pattern_conditions.
 * Deleting a threat cascades to its patterns, and a pattern to its conditions.
 */

import type Database from 'better-sqlite3';
import type { Migration } from './index.js';

const migration: Migration = {
  version: 1,
  description: 'Add threat_patterns and pattern_conditions tables',
  up(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS threat_patterns (
        id            TEXT PRIMARY KEY,
        name          TEXT NOT NULL,
        description   TEXT,
        threat_id     TEXT NOT NULL,
        is_active     INTEGER NOT NULL DEFAULT 1,
        created_at    TEXT NOT NULL,
        updated_at    TEXT NOT NULL,
        FOREIGN KEY (threat_id) REFERENCES threats(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_threat_patterns_threat ON threat_patterns(threat_id);
      CREATE INDEX IF NOT EXISTS idx_threat_patterns_active ON threat_patterns(is_active);

      CREATE TABLE IF NOT EXISTS pattern_conditions (
        id                 TEXT PRIMARY KEY,
        pattern_id         TEXT NOT NULL,
        position           INTEGER NOT NULL,
        condition_type     TEXT NOT NULL,
        operator           TEXT NOT NULL,
        value              TEXT NOT NULL DEFAULT '',
        relationship_type  TEXT NOT NULL DEFAULT '',
        FOREIGN KEY (pattern_id) REFERENCES threat_patterns(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_pattern_conditions_pattern ON pattern_conditions(pattern_id, position);
    `);
  },
};

export default migration;
