import type Database from 'better-sqlite3';
import crypto from 'node:crypto';
import type { Product } from '../../types/entities.js';
import type { CreateProductInput } from '../../types/repository.js';

/** Raw row shape returned by better-sqlite3 for the `products` table. */
interface ProductRow {
  id: string;
  name: string;
  description: string | null;
  created_at: string;
}

/** Maps a snake_case DB row to a camelCase Product entity. */
function rowToProduct(row: ProductRow): Product {
  return {
    id: row.id,
    name: row.name,
    ...(row.description !== null ? { description: row.description } : {}),
    createdAt: row.created_at,
  };
}

/**
 * Repository for the `products` table.
 */
export class ProductRepository {
  private readonly db: Database.Database;

  private readonly insertStmt: Database.Statement<[string, string, string | null, string]>;
  private readonly selectByIdStmt: Database.Statement<[string], ProductRow>;
  private readonly selectAllStmt: Database.Statement<[], ProductRow>;
  private readonly deleteStmt: Database.Statement<[string]>;

  constructor(db: Database.Database) {
    this.db = db;

    this.insertStmt = this.db.prepare<[string, string, string | null, string]>(
      'INSERT INTO products (id, name, description, created_at) VALUES (?, ?, ?, ?)',
    );
    this.selectByIdStmt = this.db.prepare<[string], ProductRow>(
      'SELECT id, name, description, created_at FROM products WHERE id = ?',
    );
    this.selectAllStmt = this.db.prepare<[], ProductRow>(
      'SELECT id, name, description, created_at FROM products ORDER BY created_at, rowid',
    );
    this.deleteStmt = this.db.prepare<[string]>('DELETE FROM products WHERE id = ?');
  }

  /** Insert a new Product and return the full entity. */
  create(input: CreateProductInput): Product {
    const id = crypto.randomUUID();
    const createdAt = new Date().toISOString();

    this.insertStmt.run(id, input.name, input.description ?? null, createdAt);

    return {
      id,
      name: input.name,
      ...(input.description !== undefined ? { description: input.description } : {}),
      createdAt,
    };
  }

  findById(id: string): Product | undefined {
    const row = this.selectByIdStmt.get(id);
    return row ? rowToProduct(row) : undefined;
  }

  findAll(): Product[] {
    return this.selectAllStmt.all().map(rowToProduct);
  }

  /** Delete a Product. Its instances, tags links and inbound relationships cascade. */
  delete(id: string): boolean {
    return this.deleteStmt.run(id).changes > 0;
  }
}
