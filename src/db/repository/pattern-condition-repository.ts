import type Database from 'better-sqlite3';
import crypto from 'node:crypto';
import type { PatternCondition } from '../../types/entities.js';
import type {
  CreatePatternConditionInput,
  UpdatePatternConditionInput,
} from '../../types/repository.js';

/**
 * Raw row shape returned by better-sqlite3 for the `pattern_conditions` table.
 */
interface PatternConditionRow {
  id: string;
  pattern_id: string;
  position: number;
  condition_type: string;
  operator: string;
  value: string;
  relationship_type: string;
}

/** Maps a snake_case DB row to a camelCase PatternCondition entity. */
function rowToPatternCondition(row: PatternConditionRow): PatternCondition {
  return {
    id: row.id,
    patternId: row.pattern_id,
    position: row.position,
    conditionType: row.condition_type,
    operator: row.operator,
    value: row.value,
    relationshipType: row.relationship_type,
  };
}

const SELECT_COLUMNS = `SELECT id, pattern_id, position, condition_type, operator, value, relationship_type
   FROM pattern_conditions`;

/**
 * Repository for the `pattern_conditions` table.
 *
 * Stores conditionType / operator as given; validation happens in the
 * pattern catalog before anything reaches this layer.
 */
export class PatternConditionRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Insert a condition at the end of its pattern's condition list. */
  create(input: CreatePatternConditionInput): PatternCondition {
    const id = crypto.randomUUID();
    const { next } = this.db
      .prepare<[string], { next: number }>(
        'SELECT COALESCE(MAX(position) + 1, 0) AS next FROM pattern_conditions WHERE pattern_id = ?',
      )
      .get(input.patternId) ?? { next: 0 };

    const condition: PatternCondition = {
      id,
      patternId: input.patternId,
      position: next,
      conditionType: input.conditionType,
      operator: input.operator,
      value: input.value ?? '',
      relationshipType: input.relationshipType ?? '',
    };

    this.db
      .prepare<[string, string, number, string, string, string, string]>(
        `INSERT INTO pattern_conditions (id, pattern_id, position, condition_type, operator, value, relationship_type)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        condition.id,
        condition.patternId,
        condition.position,
        condition.conditionType,
        condition.operator,
        condition.value,
        condition.relationshipType,
      );

    return condition;
  }

  /** Find a PatternCondition by its primary key. */
  findById(id: string): PatternCondition | undefined {
    const row = this.db
      .prepare<[string], PatternConditionRow>(`${SELECT_COLUMNS} WHERE id = ?`)
      .get(id);
    return row ? rowToPatternCondition(row) : undefined;
  }

  /** Conditions of one pattern in evaluation order. */
  findByPattern(patternId: string): PatternCondition[] {
    return this.db
      .prepare<[string], PatternConditionRow>(
        `${SELECT_COLUMNS} WHERE pattern_id = ? ORDER BY position`,
      )
      .all(patternId)
      .map(rowToPatternCondition);
  }

  /** Return all conditions, grouped by pattern and ordered by position. */
  findAll(): PatternCondition[] {
    return this.db
      .prepare<[], PatternConditionRow>(`${SELECT_COLUMNS} ORDER BY pattern_id, position`)
      .all()
      .map(rowToPatternCondition);
  }

  /**
   * Overwrite the supplied fields of a condition.
   *
   * @returns the updated condition, or undefined if the id does not exist
   */
  update(id: string, input: UpdatePatternConditionInput): PatternCondition | undefined {
    const existing = this.findById(id);
    if (existing === undefined) {
      return undefined;
    }

    const updated: PatternCondition = {
      ...existing,
      conditionType: input.conditionType ?? existing.conditionType,
      operator: input.operator ?? existing.operator,
      value: input.value ?? existing.value,
      relationshipType: input.relationshipType ?? existing.relationshipType,
    };

    this.db
      .prepare<[string, string, string, string, string]>(
        `UPDATE pattern_conditions
         SET condition_type = ?, operator = ?, value = ?, relationship_type = ?
         WHERE id = ?`,
      )
      .run(updated.conditionType, updated.operator, updated.value, updated.relationshipType, id);

    return updated;
  }

  /** Delete a PatternCondition by id. Returns true if a row was deleted. */
  delete(id: string): boolean {
    return this.db.prepare<[string]>('DELETE FROM pattern_conditions WHERE id = ?').run(id).changes > 0;
  }

  /** Delete every condition of a pattern. Returns the number of rows removed. */
  deleteByPattern(patternId: string): number {
    return this.db
      .prepare<[string]>('DELETE FROM pattern_conditions WHERE pattern_id = ?')
      .run(patternId).changes;
  }
}
