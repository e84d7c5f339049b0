import type Database from 'better-sqlite3';
import crypto from 'node:crypto';
import type { Tag } from '../../types/entities.js';
import type { CreateTagInput } from '../../types/repository.js';

/** Raw row shape returned by better-sqlite3 for the `tags` table. */
interface TagRow {
  id: string;
  name: string;
  description: string | null;
  color: string | null;
  created_at: string;
}

function rowToTag(row: TagRow): Tag {
  return {
    id: row.id,
    name: row.name,
    ...(row.description !== null ? { description: row.description } : {}),
    ...(row.color !== null ? { color: row.color } : {}),
    createdAt: row.created_at,
  };
}

const TAG_COLUMNS = 't.id, t.name, t.description, t.color, t.created_at';

/**
 * Repository for `tags` and its two join tables.
 *
 * Assignment is idempotent: assigning a tag twice leaves one link.
 */
export class TagRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Insert a new Tag and return the full entity.
   *
   * Throws if a tag with the same name already exists.
   */
  create(input: CreateTagInput): Tag {
    const id = crypto.randomUUID();
    const createdAt = new Date().toISOString();

    this.db
      .prepare<[string, string, string | null, string | null, string]>(
        'INSERT INTO tags (id, name, description, color, created_at) VALUES (?, ?, ?, ?, ?)',
      )
      .run(id, input.name, input.description ?? null, input.color ?? null, createdAt);

    return {
      id,
      name: input.name,
      ...(input.description !== undefined ? { description: input.description } : {}),
      ...(input.color !== undefined ? { color: input.color } : {}),
      createdAt,
    };
  }

  findById(id: string): Tag | undefined {
    const row = this.db
      .prepare<[string], TagRow>(`SELECT ${TAG_COLUMNS} FROM tags t WHERE t.id = ?`)
      .get(id);
    return row ? rowToTag(row) : undefined;
  }

  findByName(name: string): Tag | undefined {
    const row = this.db
      .prepare<[string], TagRow>(`SELECT ${TAG_COLUMNS} FROM tags t WHERE t.name = ?`)
      .get(name);
    return row ? rowToTag(row) : undefined;
  }

  /** Return all Tags ordered by name. */
  findAll(): Tag[] {
    return this.db
      .prepare<[], TagRow>(`SELECT ${TAG_COLUMNS} FROM tags t ORDER BY t.name`)
      .all()
      .map(rowToTag);
  }

  assignToInstance(tagId: string, instanceId: string): void {
    this.db
      .prepare<[string, string]>(
        'INSERT OR IGNORE INTO instance_tags (tag_id, instance_id) VALUES (?, ?)',
      )
      .run(tagId, instanceId);
  }

  /** Returns true if a link was removed. */
  unassignFromInstance(tagId: string, instanceId: string): boolean {
    const result = this.db
      .prepare<[string, string]>('DELETE FROM instance_tags WHERE tag_id = ? AND instance_id = ?')
      .run(tagId, instanceId);
    return result.changes > 0;
  }

  assignToProduct(tagId: string, productId: string): void {
    this.db
      .prepare<[string, string]>(
        'INSERT OR IGNORE INTO product_tags (tag_id, product_id) VALUES (?, ?)',
      )
      .run(tagId, productId);
  }

  /** Returns true if a link was removed. */
  unassignFromProduct(tagId: string, productId: string): boolean {
    const result = this.db
      .prepare<[string, string]>('DELETE FROM product_tags WHERE tag_id = ? AND product_id = ?')
      .run(tagId, productId);
    return result.changes > 0;
  }

  /** Tags assigned directly to an instance, ordered by name. */
  findByInstance(instanceId: string): Tag[] {
    return this.db
      .prepare<[string], TagRow>(
        `SELECT ${TAG_COLUMNS} FROM tags t
         JOIN instance_tags it ON it.tag_id = t.id
         WHERE it.instance_id = ?
         ORDER BY t.name`,
      )
      .all(instanceId)
      .map(rowToTag);
  }

  /** Tags assigned to a product, ordered by name. */
  findByProduct(productId: string): Tag[] {
    return this.db
      .prepare<[string], TagRow>(
        `SELECT ${TAG_COLUMNS} FROM tags t
         JOIN product_tags pt ON pt.tag_id = t.id
         WHERE pt.product_id = ?
         ORDER BY t.name`,
      )
      .all(productId)
      .map(rowToTag);
  }

  /** Delete a Tag and all of its assignments. */
  delete(id: string): boolean {
    return this.db.prepare<[string]>('DELETE FROM tags WHERE id = ?').run(id).changes > 0;
  }
}
