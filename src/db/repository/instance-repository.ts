/**
 * threatreg — InstanceRepository
 *
 * instances テーブル（評価対象エンティティ）の CRUD。
 * InstanceSource を満たすため、マッチングエンジンにそのまま渡せる。
 */

import type Database from 'better-sqlite3';
import crypto from 'node:crypto';
import type { Instance } from '../../types/entities.js';
import type { CreateInstanceInput } from '../../types/repository.js';
import type { InstanceSource } from '../../types/pattern.js';

/** better-sqlite3 から返る instances テーブルの行形状 */
interface InstanceRow {
  id: string;
  name: string;
  instance_of: string;
  created_at: string;
}

function rowToInstance(row: InstanceRow): Instance {
  return {
    id: row.id,
    name: row.name,
    instanceOf: row.instance_of,
    createdAt: row.created_at,
  };
}

const SELECT_COLUMNS = 'SELECT id, name, instance_of, created_at FROM instances';

export class InstanceRepository implements InstanceSource {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * インスタンスを新規作成して返す。
   *
   * @throws instanceOf のプロダクトが存在しない場合（FK 制約違反）
   */
  create(input: CreateInstanceInput): Instance {
    const id = crypto.randomUUID();
    const createdAt = new Date().toISOString();

    this.db
      .prepare<[string, string, string, string]>(
        'INSERT INTO instances (id, name, instance_of, created_at) VALUES (?, ?, ?, ?)',
      )
      .run(id, input.name, input.instanceOf, createdAt);

    return { id, name: input.name, instanceOf: input.instanceOf, createdAt };
  }

  findById(id: string): Instance | undefined {
    const row = this.db
      .prepare<[string], InstanceRow>(`${SELECT_COLUMNS} WHERE id = ?`)
      .get(id);
    return row ? rowToInstance(row) : undefined;
  }

  /** 全インスタンスを作成順で返す。 */
  findAll(): Instance[] {
    return this.db
      .prepare<[], InstanceRow>(`${SELECT_COLUMNS} ORDER BY created_at, rowid`)
      .all()
      .map(rowToInstance);
  }

  /** 指定プロダクトのインスタンス一覧 */
  findByProduct(productId: string): Instance[] {
    return this.db
      .prepare<[string], InstanceRow>(
        `${SELECT_COLUMNS} WHERE instance_of = ? ORDER BY created_at, rowid`,
      )
      .all(productId)
      .map(rowToInstance);
  }

  /**
   * インスタンスを削除する。タグ割り当てとリレーションは CASCADE で消える。
   *
   * @returns 削除成功時 true、id が存在しない場合 false。
   */
  delete(id: string): boolean {
    return this.db.prepare<[string]>('DELETE FROM instances WHERE id = ?').run(id).changes > 0;
  }
}
