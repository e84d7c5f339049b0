import { describe, it, expect, beforeEach } from 'vitest';
import Database from 'better-sqlite3';
import v0 from '../../../src/db/migrations/v0.js';
import v1 from '../../../src/db/migrations/v1.js';
import {
  getSchemaVersion,
  pendingMigrations,
  runMigrations,
} from '../../../src/db/migrations/index.js';

function columnNames(db: InstanceType<typeof Database>, table: string): string[] {
  const rows = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
  return rows.map((r) => r.name);
}

describe('Migration v1: threat pattern tables', () => {
  let db: InstanceType<typeof Database>;

  beforeEach(() => {
    db = new Database(':memory:');
    db.pragma('foreign_keys = ON');
    v0.up(db);
  });

  it('version と description を持つ', () => {
    expect(v1.version).toBe(1);
    expect(v1.description).toBe('Add threat_patterns and pattern_conditions tables');
  });

  it('pendingMigrations — v0 からは v1 のみ、v1 からは空', () => {
    expect(pendingMigrations(0).map((m) => m.version)).toEqual([1]);
    expect(pendingMigrations(1)).toEqual([]);
  });

  it('runMigrations — v1 を適用して user_version を 1 にする', () => {
    const applied = runMigrations(db, 0);

    expect(applied.map((m) => m.version)).toEqual([1]);
    expect(getSchemaVersion(db)).toBe(1);
  });

  it('threat_patterns のカラム構成', () => {
    v1.up(db);

    expect(columnNames(db, 'threat_patterns')).toEqual([
      'id',
      'name',
      'description',
      'threat_id',
      'is_active',
      'created_at',
      'updated_at',
    ]);
  });

  it('pattern_conditions のカラム構成', () => {
    v1.up(db);

    expect(columnNames(db, 'pattern_conditions')).toEqual([
      'id',
      'pattern_id',
      'position',
      'condition_type',
      'operator',
      'value',
      'relationship_type',
    ]);
  });

  it('脅威の削除がパターンと条件に CASCADE する', () => {
    v1.up(db);
    const ts = new Date().toISOString();
    db.prepare("INSERT INTO threats (id, title, created_at) VALUES ('t1', 'XSS', ?)").run(ts);
    db.prepare(
      `INSERT INTO threat_patterns (id, name, threat_id, is_active, created_at, updated_at)
       VALUES ('p1', 'reflected', 't1', 1, ?, ?)`,
    ).run(ts, ts);
    db.prepare(
      `INSERT INTO pattern_conditions (id, pattern_id, position, condition_type, operator)
       VALUES ('c1', 'p1', 0, 'TAG', 'EXISTS')`,
    ).run();

    db.prepare("DELETE FROM threats WHERE id = 't1'").run();

    const patterns = db.prepare('SELECT COUNT(*) AS cnt FROM threat_patterns').get() as {
      cnt: number;
    };
    const conditions = db.prepare('SELECT COUNT(*) AS cnt FROM pattern_conditions').get() as {
      cnt: number;
    };
    expect(patterns.cnt).toBe(0);
    expect(conditions.cnt).toBe(0);
  });
});
