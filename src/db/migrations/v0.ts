/**
 * Migration v0: Base schema
 *
 * 脅威カタログとインベントリ（products / instances / tags / relationships）。
 * v1 の threat_patterns 追加前の状態を再現するための基盤。
 */

import type Database from 'better-sqlite3';
import type { Migration } from './index.js';

const migration: Migration = {
  version: 0,
  description: 'Base schema (threats, products, instances, tags, relationships)',
  up(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS threats (
        id            TEXT PRIMARY KEY,
        title         TEXT NOT NULL,
        description   TEXT,
        created_at    TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS products (
        id            TEXT PRIMARY KEY,
        name          TEXT NOT NULL,
        description   TEXT,
        created_at    TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS instances (
        id            TEXT PRIMARY KEY,
        name          TEXT NOT NULL,
        instance_of   TEXT NOT NULL,
        created_at    TEXT NOT NULL,
        FOREIGN KEY (instance_of) REFERENCES products(id) ON DELETE CASCADE
      );
      CREATE INDEX IF NOT EXISTS idx_instances_instance_of ON instances(instance_of);

      CREATE TABLE IF NOT EXISTS tags (
        id            TEXT PRIMARY KEY,
        name          TEXT NOT NULL UNIQUE,
        description   TEXT,
        color         TEXT,
        created_at    TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS instance_tags (
        tag_id        TEXT NOT NULL,
        instance_id   TEXT NOT NULL,
        PRIMARY KEY (tag_id, instance_id),
        FOREIGN KEY (tag_id)      REFERENCES tags(id)      ON DELETE CASCADE,
        FOREIGN KEY (instance_id) REFERENCES instances(id) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS product_tags (
        tag_id        TEXT NOT NULL,
        product_id    TEXT NOT NULL,
        PRIMARY KEY (tag_id, product_id),
        FOREIGN KEY (tag_id)     REFERENCES tags(id)     ON DELETE CASCADE,
        FOREIGN KEY (product_id) REFERENCES products(id) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS relationships (
        id                TEXT PRIMARY KEY,
        type              TEXT NOT NULL,
        from_instance_id  TEXT NOT NULL,
        to_instance_id    TEXT,
        to_product_id     TEXT,
        created_at        TEXT NOT NULL,
        CHECK ((to_instance_id IS NULL) <> (to_product_id IS NULL)),
        FOREIGN KEY (from_instance_id) REFERENCES instances(id) ON DELETE CASCADE,
        FOREIGN KEY (to_instance_id)   REFERENCES instances(id) ON DELETE CASCADE,
        FOREIGN KEY (to_product_id)    REFERENCES products(id)  ON DELETE CASCADE
      );
      CREATE INDEX IF NOT EXISTS idx_relationships_from_instance ON relationships(from_instance_id);
      CREATE INDEX IF NOT EXISTS idx_relationships_type ON relationships(type);
    `);
  },
};

export default migration;
