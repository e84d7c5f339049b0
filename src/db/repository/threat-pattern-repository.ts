/**
 * threatreg — ThreatPatternRepository
 *
 * threat_patterns テーブルの CRUD。パターンは常に条件（position 順）と
 * 一緒に返す。snake_case (DB) ↔ camelCase (TypeScript) の変換を内部で行う。
 */

import type Database from 'better-sqlite3';
import crypto from 'node:crypto';
import type { PatternCondition, ThreatPattern } from '../../types/entities.js';
import type {
  CreateThreatPatternInput,
  UpdateThreatPatternInput,
} from '../../types/repository.js';
import type { PatternSource } from '../../types/pattern.js';
import { PatternConditionRepository } from './pattern-condition-repository.js';

// ---------------------------------------------------------------------------
// DB row 型
// ---------------------------------------------------------------------------

/** better-sqlite3 から返る threat_patterns テーブルの行形状 */
interface ThreatPatternRow {
  id: string;
  name: string;
  description: string | null;
  threat_id: string;
  is_active: number;
  created_at: string;
  updated_at: string;
}

// ---------------------------------------------------------------------------
// Row → ThreatPattern 変換
// ---------------------------------------------------------------------------

function rowToThreatPattern(row: ThreatPatternRow, conditions: PatternCondition[]): ThreatPattern {
  return {
    id: row.id,
    name: row.name,
    ...(row.description !== null ? { description: row.description } : {}),
    threatId: row.threat_id,
    isActive: row.is_active === 1,
    conditions,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

const SELECT_COLUMNS = `SELECT id, name, description, threat_id, is_active, created_at, updated_at
   FROM threat_patterns`;

const ORDER_BY = 'ORDER BY created_at, rowid';

// ---------------------------------------------------------------------------
// ThreatPatternRepository
// ---------------------------------------------------------------------------

/**
 * threat_patterns テーブルのリポジトリ。
 *
 * - 一覧系は作成順（安定順序）で返す
 * - threatId の存在確認はここでは行わない（PatternCatalog の責務）
 */
export class ThreatPatternRepository implements PatternSource {
  private readonly db: Database.Database;
  private readonly conditionRepo: PatternConditionRepository;

  constructor(db: Database.Database) {
    this.db = db;
    this.conditionRepo = new PatternConditionRepository(db);
  }

  /**
   * パターンを新規作成して返す（条件は空）。
   *
   * @throws threatId が存在しない場合（FK 制約違反）
   */
  create(input: CreateThreatPatternInput): ThreatPattern {
    const id = crypto.randomUUID();
    const timestamp = new Date().toISOString();

    this.db
      .prepare<[string, string, string | null, string, number, string, string]>(
        `INSERT INTO threat_patterns (id, name, description, threat_id, is_active, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        input.name,
        input.description ?? null,
        input.threatId,
        input.isActive ? 1 : 0,
        timestamp,
        timestamp,
      );

    return {
      id,
      name: input.name,
      ...(input.description !== undefined ? { description: input.description } : {}),
      threatId: input.threatId,
      isActive: input.isActive,
      conditions: [],
      createdAt: timestamp,
      updatedAt: timestamp,
    };
  }

  /** ID でパターンを取得する（条件込み）。存在しなければ undefined。 */
  findById(id: string): ThreatPattern | undefined {
    const row = this.db
      .prepare<[string], ThreatPatternRow>(`${SELECT_COLUMNS} WHERE id = ?`)
      .get(id);
    if (row === undefined) {
      return undefined;
    }
    return rowToThreatPattern(row, this.conditionRepo.findByPattern(row.id));
  }

  /** 全パターン */
  findAll(): ThreatPattern[] {
    const rows = this.db.prepare<[], ThreatPatternRow>(`${SELECT_COLUMNS} ${ORDER_BY}`).all();
    return this.attachConditions(rows);
  }

  /** is_active = 1 のパターンのみ */
  findActive(): ThreatPattern[] {
    const rows = this.db
      .prepare<[], ThreatPatternRow>(`${SELECT_COLUMNS} WHERE is_active = 1 ${ORDER_BY}`)
      .all();
    return this.attachConditions(rows);
  }

  /** 指定脅威に紐づくパターン */
  findByThreat(threatId: string): ThreatPattern[] {
    const rows = this.db
      .prepare<[string], ThreatPatternRow>(`${SELECT_COLUMNS} WHERE threat_id = ? ${ORDER_BY}`)
      .all(threatId);
    return this.attachConditions(rows);
  }

  /**
   * 指定されたフィールドのみ更新する。updated_at も自動更新される。
   *
   * @returns 更新後のパターン。id が存在しなければ undefined。
   */
  update(id: string, input: UpdateThreatPatternInput): ThreatPattern | undefined {
    const existing = this.findById(id);
    if (existing === undefined) {
      return undefined;
    }

    const description =
      input.description !== undefined ? input.description : existing.description;

    this.db
      .prepare<[string, string | null, string, number, string, string]>(
        `UPDATE threat_patterns
         SET name = ?, description = ?, threat_id = ?, is_active = ?, updated_at = ?
         WHERE id = ?`,
      )
      .run(
        input.name ?? existing.name,
        description ?? null,
        input.threatId ?? existing.threatId,
        (input.isActive ?? existing.isActive) ? 1 : 0,
        new Date().toISOString(),
        id,
      );

    return this.findById(id);
  }

  /** is_active だけを切り替える。id が存在すれば true。 */
  setActive(id: string, isActive: boolean): boolean {
    const result = this.db
      .prepare<[number, string, string]>(
        'UPDATE threat_patterns SET is_active = ?, updated_at = ? WHERE id = ?',
      )
      .run(isActive ? 1 : 0, new Date().toISOString(), id);
    return result.changes > 0;
  }

  /**
   * パターンを削除する。条件は CASCADE で削除される。
   *
   * @returns 削除成功時 true、id が存在しない場合 false。
   */
  delete(id: string): boolean {
    return this.db.prepare<[string]>('DELETE FROM threat_patterns WHERE id = ?').run(id).changes > 0;
  }

  /** 条件を 1 クエリでまとめて読み、各パターンに割り当てる。 */
  private attachConditions(rows: ThreatPatternRow[]): ThreatPattern[] {
    if (rows.length === 0) {
      return [];
    }

    const byPattern = new Map<string, PatternCondition[]>();
    for (const condition of this.conditionRepo.findAll()) {
      const list = byPattern.get(condition.patternId);
      if (list) {
        list.push(condition);
      } else {
        byPattern.set(condition.patternId, [condition]);
      }
    }

    return rows.map((row) => rowToThreatPattern(row, byPattern.get(row.id) ?? []));
  }
}
