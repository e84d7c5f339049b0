import type Database from 'better-sqlite3';
import crypto from 'node:crypto';
import type { Relationship } from '../../types/entities.js';
import type { CreateRelationshipInput } from '../../types/repository.js';

/** Row shape returned by better-sqlite3 for the relationships table. */
interface RelationshipRow {
  id: string;
  type: string;
  from_instance_id: string;
  to_instance_id: string | null;
  to_product_id: string | null;
  created_at: string;
}

/** Maps a snake_case DB row to a camelCase Relationship entity. */
function rowToRelationship(row: RelationshipRow): Relationship {
  return {
    id: row.id,
    type: row.type,
    fromInstanceId: row.from_instance_id,
    ...(row.to_instance_id !== null ? { toInstanceId: row.to_instance_id } : {}),
    ...(row.to_product_id !== null ? { toProductId: row.to_product_id } : {}),
    createdAt: row.created_at,
  };
}

const SELECT_COLUMNS =
  'SELECT id, type, from_instance_id, to_instance_id, to_product_id, created_at FROM relationships';

/**
 * Repository for the `relationships` table.
 *
 * A relationship always starts at an instance and points at exactly one
 * of another instance or a product.
 */
export class RelationshipRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Create a new relationship.
   *
   * @throws Error when both or neither of toInstanceId / toProductId are given
   */
  create(input: CreateRelationshipInput): Relationship {
    if ((input.toInstanceId === undefined) === (input.toProductId === undefined)) {
      throw new Error('Relationship needs exactly one of toInstanceId or toProductId');
    }

    const id = crypto.randomUUID();
    const createdAt = new Date().toISOString();

    this.db
      .prepare<[string, string, string, string | null, string | null, string]>(
        `INSERT INTO relationships (id, type, from_instance_id, to_instance_id, to_product_id, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        input.type,
        input.fromInstanceId,
        input.toInstanceId ?? null,
        input.toProductId ?? null,
        createdAt,
      );

    return {
      id,
      type: input.type,
      fromInstanceId: input.fromInstanceId,
      ...(input.toInstanceId !== undefined ? { toInstanceId: input.toInstanceId } : {}),
      ...(input.toProductId !== undefined ? { toProductId: input.toProductId } : {}),
      createdAt,
    };
  }

  findById(id: string): Relationship | undefined {
    const row = this.db
      .prepare<[string], RelationshipRow>(`${SELECT_COLUMNS} WHERE id = ?`)
      .get(id);
    return row ? rowToRelationship(row) : undefined;
  }

  /** Outbound relationships of an instance, in creation order. */
  findByFromInstance(instanceId: string): Relationship[] {
    return this.db
      .prepare<[string], RelationshipRow>(
        `${SELECT_COLUMNS} WHERE from_instance_id = ? ORDER BY created_at, rowid`,
      )
      .all(instanceId)
      .map(rowToRelationship);
  }

  delete(id: string): boolean {
    return this.db.prepare<[string]>('DELETE FROM relationships WHERE id = ?').run(id).changes > 0;
  }
}
