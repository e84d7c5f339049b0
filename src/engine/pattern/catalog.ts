/**
 * threatreg — Pattern catalog
 *
 * パターンと条件の CRUD にトランザクション境界と参照チェック・
 * 条件バリデーションを加えるサービス層。
 *
 * 複数レコードに触れる書き込み（参照チェック + 挿入、パターン + 条件）は
 * db.transaction() で包み、失敗時は何も残さない。
 */

import type Database from 'better-sqlite3';
import { createLogger } from '../../logger.js';
import type { Logger } from '../../logger.js';
import type { PatternCondition, ThreatPattern } from '../../types/entities.js';
import type {
  CreatePatternConditionInput,
  CreateThreatPatternInput,
  PatternConditionDraft,
  UpdatePatternConditionInput,
  UpdateThreatPatternInput,
} from '../../types/repository.js';
import {
  ConditionValidationError,
  RecordNotFoundError,
  ReferenceNotFoundError,
} from '../../types/errors.js';
import { ThreatRepository } from '../../db/repository/threat-repository.js';
import { ThreatPatternRepository } from '../../db/repository/threat-pattern-repository.js';
import { PatternConditionRepository } from '../../db/repository/pattern-condition-repository.js';
import { validateCondition } from './condition-validator.js';
import type { ConditionShape } from './condition-validator.js';

/**
 * 条件を検証し、不正なら ConditionValidationError を投げる。
 *
 * @param index createPatternWithConditions() 内での条件の位置（0 始まり）
 */
export function assertValidCondition(condition: ConditionShape, index?: number): void {
  const result = validateCondition(condition);
  if (!result.ok) {
    throw new ConditionValidationError(result.code, result.field, result.message, index);
  }
}

export class PatternCatalog {
  private readonly db: Database.Database;
  private readonly threatRepo: ThreatRepository;
  private readonly patternRepo: ThreatPatternRepository;
  private readonly conditionRepo: PatternConditionRepository;
  private readonly logger: Logger;

  constructor(db: Database.Database, logger?: Logger) {
    this.db = db;
    this.threatRepo = new ThreatRepository(db);
    this.patternRepo = new ThreatPatternRepository(db);
    this.conditionRepo = new PatternConditionRepository(db);
    this.logger = logger ?? createLogger('catalog');
  }

  // =========================================================
  // Patterns
  // =========================================================

  /**
   * パターンを作成する（条件なし）。
   *
   * @throws ReferenceNotFoundError threatId の脅威が存在しない場合
   */
  createPattern(input: CreateThreatPatternInput): ThreatPattern {
    const pattern = this.db.transaction(() => {
      this.requireThreat(input.threatId);
      return this.patternRepo.create(input);
    })();

    this.logger.info({ patternId: pattern.id, threatId: pattern.threatId }, 'Created threat pattern');
    return pattern;
  }

  /**
   * パターンと条件を 1 トランザクションで作成する。
   * 条件は渡された順に検証・挿入され、1 つでも失敗すればパターンごと
   * ロールバックされる。
   *
   * @throws ReferenceNotFoundError 脅威が存在しない場合
   * @throws ConditionValidationError conditionIndex に失敗した条件の位置
   */
  createPatternWithConditions(
    input: CreateThreatPatternInput,
    conditions: PatternConditionDraft[],
  ): ThreatPattern {
    const created = this.db.transaction(() => {
      this.requireThreat(input.threatId);
      const pattern = this.patternRepo.create(input);

      conditions.forEach((draft, index) => {
        assertValidCondition(draft, index);
        this.conditionRepo.create({ ...draft, patternId: pattern.id });
      });

      return this.requirePattern(pattern.id);
    })();

    this.logger.info(
      { patternId: created.id, threatId: created.threatId, conditions: created.conditions.length },
      'Created threat pattern with conditions',
    );
    return created;
  }

  /** @throws RecordNotFoundError */
  getPattern(id: string): ThreatPattern {
    return this.requirePattern(id);
  }

  /**
   * 指定フィールドのみ更新する。threatId が指定された場合は再検証する。
   *
   * @throws RecordNotFoundError パターンが存在しない場合
   * @throws ReferenceNotFoundError 新しい threatId の脅威が存在しない場合
   */
  updatePattern(id: string, input: UpdateThreatPatternInput): ThreatPattern {
    return this.db.transaction(() => {
      this.requirePattern(id);
      if (input.threatId !== undefined) {
        this.requireThreat(input.threatId);
      }
      const updated = this.patternRepo.update(id, input);
      if (updated === undefined) {
        throw new RecordNotFoundError('pattern', id);
      }
      return updated;
    })();
  }

  /** @throws RecordNotFoundError */
  setPatternActive(id: string, isActive: boolean): void {
    if (!this.patternRepo.setActive(id, isActive)) {
      throw new RecordNotFoundError('pattern', id);
    }
  }

  /** 存在しない id の削除はエラーにしない（冪等）。 */
  deletePattern(id: string): void {
    if (this.patternRepo.delete(id)) {
      this.logger.info({ patternId: id }, 'Deleted threat pattern');
    }
  }

  listPatterns(): ThreatPattern[] {
    return this.patternRepo.findAll();
  }

  listActivePatterns(): ThreatPattern[] {
    return this.patternRepo.findActive();
  }

  listPatternsByThreat(threatId: string): ThreatPattern[] {
    return this.patternRepo.findByThreat(threatId);
  }

  // =========================================================
  // Conditions
  // =========================================================

  /**
   * 既存パターンに条件を追加する。参照チェック・検証・挿入は同一トランザクション。
   *
   * @throws ReferenceNotFoundError パターンが存在しない場合
   * @throws ConditionValidationError
   */
  createCondition(input: CreatePatternConditionInput): PatternCondition {
    return this.db.transaction(() => {
      if (this.patternRepo.findById(input.patternId) === undefined) {
        throw new ReferenceNotFoundError('pattern', input.patternId);
      }
      assertValidCondition(input);
      return this.conditionRepo.create(input);
    })();
  }

  /** @throws RecordNotFoundError */
  getCondition(id: string): PatternCondition {
    const condition = this.conditionRepo.findById(id);
    if (condition === undefined) {
      throw new RecordNotFoundError('condition', id);
    }
    return condition;
  }

  /**
   * 指定フィールドを上書きした後の条件全体を検証してから保存する。
   *
   * @throws RecordNotFoundError
   * @throws ConditionValidationError
   */
  updateCondition(id: string, input: UpdatePatternConditionInput): PatternCondition {
    return this.db.transaction(() => {
      const existing = this.getCondition(id);
      assertValidCondition({
        conditionType: input.conditionType ?? existing.conditionType,
        operator: input.operator ?? existing.operator,
        value: input.value ?? existing.value,
        relationshipType: input.relationshipType ?? existing.relationshipType,
      });
      const updated = this.conditionRepo.update(id, input);
      if (updated === undefined) {
        throw new RecordNotFoundError('condition', id);
      }
      return updated;
    })();
  }

  /** 存在しない id の削除はエラーにしない（冪等）。 */
  deleteCondition(id: string): void {
    this.conditionRepo.delete(id);
  }

  listConditionsByPattern(patternId: string): PatternCondition[] {
    return this.conditionRepo.findByPattern(patternId);
  }

  /** @returns 削除した条件数 */
  deleteConditionsByPattern(patternId: string): number {
    return this.conditionRepo.deleteByPattern(patternId);
  }

  listAllConditions(): PatternCondition[] {
    return this.conditionRepo.findAll();
  }

  // =========================================================
  // Internal
  // =========================================================

  private requireThreat(threatId: string): void {
    if (this.threatRepo.findById(threatId) === undefined) {
      throw new ReferenceNotFoundError('threat', threatId);
    }
  }

  private requirePattern(id: string): ThreatPattern {
    const pattern = this.patternRepo.findById(id);
    if (pattern === undefined) {
      throw new RecordNotFoundError('pattern', id);
    }
    return pattern;
  }
}
