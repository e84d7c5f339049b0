import type Database from 'better-sqlite3';
import crypto from 'node:crypto';
import type { Threat } from '../../types/entities.js';
import type { CreateThreatInput } from '../../types/repository.js';

/** Raw row shape returned by better-sqlite3 for the `threats` table. */
interface ThreatRow {
  id: string;
  title: string;
  description: string | null;
  created_at: string;
}

/** Maps a snake_case DB row to a camelCase Threat entity. */
function rowToThreat(row: ThreatRow): Threat {
  return {
    id: row.id,
    title: row.title,
    ...(row.description !== null ? { description: row.description } : {}),
    createdAt: row.created_at,
  };
}

const SELECT_COLUMNS = 'SELECT id, title, description, created_at FROM threats';

/**
 * Repository for the `threats` table.
 *
 * The pattern catalog only reads from it to check that a pattern's
 * threat exists; the MCP surface uses create() for seeding.
 */
export class ThreatRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Insert a new Threat and return the full entity. */
  create(input: CreateThreatInput): Threat {
    const id = crypto.randomUUID();
    const createdAt = new Date().toISOString();

    this.db
      .prepare<[string, string, string | null, string]>(
        'INSERT INTO threats (id, title, description, created_at) VALUES (?, ?, ?, ?)',
      )
      .run(id, input.title, input.description ?? null, createdAt);

    return {
      id,
      title: input.title,
      ...(input.description !== undefined ? { description: input.description } : {}),
      createdAt,
    };
  }

  /** Find a Threat by its primary key. */
  findById(id: string): Threat | undefined {
    const row = this.db.prepare<[string], ThreatRow>(`${SELECT_COLUMNS} WHERE id = ?`).get(id);
    return row ? rowToThreat(row) : undefined;
  }

  /** Return all Threats in creation order. */
  findAll(): Threat[] {
    return this.db
      .prepare<[], ThreatRow>(`${SELECT_COLUMNS} ORDER BY created_at, rowid`)
      .all()
      .map(rowToThreat);
  }

  /** Delete a Threat by id. Its patterns are removed by cascade. */
  delete(id: string): boolean {
    const result = this.db.prepare<[string]>('DELETE FROM threats WHERE id = ?').run(id);
    return result.changes > 0;
  }
}
