/**
 * threatreg — SQLite schema
 *
 * This schema is the single source of truth for the database structure.
 * Incremental migrations in ./migrations must arrive at the same shape.
 */

export const SCHEMA_SQL = `
PRAGMA foreign_keys = ON;

-- ============================================================
-- 脅威カタログ
-- ============================================================
CREATE TABLE IF NOT EXISTS threats (
  id            TEXT PRIMARY KEY,
  title         TEXT NOT NULL,
  description   TEXT,
  created_at    TEXT NOT NULL
);

-- ============================================================
-- プロダクト
-- ============================================================
CREATE TABLE IF NOT EXISTS products (
  id            TEXT PRIMARY KEY,
  name          TEXT NOT NULL,
  description   TEXT,
  created_at    TEXT NOT NULL
);

-- ============================================================
-- インスタンス（評価対象エンティティ）
-- ============================================================
CREATE TABLE IF NOT EXISTS instances (
  id            TEXT PRIMARY KEY,
  name          TEXT NOT NULL,
  instance_of   TEXT NOT NULL,
  created_at    TEXT NOT NULL,
  FOREIGN KEY (instance_of) REFERENCES products(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_instances_instance_of ON instances(instance_of);

-- ============================================================
-- タグ
-- ============================================================
CREATE TABLE IF NOT EXISTS tags (
  id            TEXT PRIMARY KEY,
  name          TEXT NOT NULL UNIQUE,
  description   TEXT,
  color         TEXT,                       -- "#RRGGBB"
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

-- ============================================================
-- リレーション（インスタンス → インスタンス | プロダクト）
-- ============================================================
CREATE TABLE IF NOT EXISTS relationships (
  id                TEXT PRIMARY KEY,
  type              TEXT NOT NULL,          -- "connects_to" 等（自由形式）
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

-- ============================================================
-- 脅威パターン
-- ============================================================
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
  condition_type     TEXT NOT NULL,         -- "TAG" | "RELATIONSHIP_TARGET_TAG" 等
  operator           TEXT NOT NULL,         -- "EQUALS" | "HAS_RELATIONSHIP_WITH" 等
  value              TEXT NOT NULL DEFAULT '',
  relationship_type  TEXT NOT NULL DEFAULT '',
  FOREIGN KEY (pattern_id) REFERENCES threat_patterns(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_pattern_conditions_pattern ON pattern_conditions(pattern_id, position);
`;
