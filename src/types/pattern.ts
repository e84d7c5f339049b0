/**
 * threatreg — Pattern condition type system
 *
 * 条件種別 / 演算子の列挙、Zod スキーマ、
 * コンパイル済み条件（判別共用体）、評価エンジンが参照する
 * コラボレータ・インターフェースの型定義。
 */

import { z } from 'zod';
import type {
  Instance,
  PatternCondition,
  Product,
  Relationship,
  Tag,
  ThreatPattern,
} from './entities.js';

// ============================================================
// ConditionType / PatternOperator 列挙
// ============================================================

export const CONDITION_TYPES = [
  'PRODUCT',
  'PRODUCT_ID',
  'PRODUCT_TAG',
  'TAG',
  'RELATIONSHIP',
  'RELATIONSHIP_TARGET_ID',
  'RELATIONSHIP_TARGET_TAG',
] as const;
export type ConditionType = (typeof CONDITION_TYPES)[number];

export const PATTERN_OPERATORS = [
  'EQUALS',
  'NOT_EQUALS',
  'CONTAINS',
  'NOT_CONTAINS',
  'EXISTS',
  'NOT_EXISTS',
  'HAS_RELATIONSHIP_WITH',
  'NOT_HAS_RELATIONSHIP_WITH',
] as const;
export type PatternOperator = (typeof PATTERN_OPERATORS)[number];

export const ConditionTypeSchema = z.enum(CONDITION_TYPES);
export const PatternOperatorSchema = z.enum(PATTERN_OPERATORS);

/** relationshipType が必須の条件種別 */
export const RELATIONSHIP_CONDITION_TYPES: ReadonlySet<ConditionType> = new Set([
  'RELATIONSHIP',
  'RELATIONSHIP_TARGET_ID',
  'RELATIONSHIP_TARGET_TAG',
]);

/**
 * EXISTS / NOT_EXISTS 以外の演算子で value が必須の条件種別。
 * PRODUCT / PRODUCT_ID / PRODUCT_TAG は空の value を受け付ける。
 */
export const VALUE_CONDITION_TYPES: ReadonlySet<ConditionType> = new Set([
  'TAG',
  'RELATIONSHIP_TARGET_ID',
  'RELATIONSHIP_TARGET_TAG',
]);

/** 文字列を ConditionType に変換する。未知の値は undefined。 */
export function parseConditionType(value: string): ConditionType | undefined {
  const result = ConditionTypeSchema.safeParse(value);
  return result.success ? result.data : undefined;
}

/** 文字列を PatternOperator に変換する。未知の値は undefined。 */
export function parsePatternOperator(value: string): PatternOperator | undefined {
  const result = PatternOperatorSchema.safeParse(value);
  return result.success ? result.data : undefined;
}

// ============================================================
// コンパイル済み条件
// ============================================================

/**
 * 永続化形式の PatternCondition をパースした結果。
 * relationshipType はリレーション系の種別にのみ存在する。
 */
export type CompiledCondition =
  | { kind: 'PRODUCT'; operator: PatternOperator; value: string }
  | { kind: 'PRODUCT_ID'; operator: PatternOperator; value: string }
  | { kind: 'PRODUCT_TAG'; operator: PatternOperator; value: string }
  | { kind: 'TAG'; operator: PatternOperator; value: string }
  | { kind: 'RELATIONSHIP'; operator: PatternOperator; relationshipType: string; value: string }
  | {
      kind: 'RELATIONSHIP_TARGET_ID';
      operator: PatternOperator;
      relationshipType: string;
      targetId: string;
    }
  | {
      kind: 'RELATIONSHIP_TARGET_TAG';
      operator: PatternOperator;
      relationshipType: string;
      tag: string;
    };

/**
 * 1 パターン分のコンパイル結果。
 * パースできなかった条件は undefined として残る（評価は常に false）。
 */
export interface CompiledPattern {
  pattern: ThreatPattern;
  conditions: Array<CompiledCondition | undefined>;
}

// ============================================================
// 評価結果
// ============================================================

/** インスタンスがアクティブなパターンに一致したという導出事実。永続化しない。 */
export interface ThreatPatternMatch {
  instanceId: string;
  threatId: string;
  patternId: string;
  pattern: ThreatPattern;
}

// ============================================================
// コラボレータ・インターフェース
// ============================================================

/**
 * 条件評価が使う読み取り専用ルックアップ。
 * 例外を投げても評価側で非一致として扱われる。
 */
export interface EvaluationLookups {
  getProduct(productId: string): Product | undefined;
  listTagsByProduct(productId: string): Tag[];
  listTagsByInstance(instanceId: string): Tag[];
  /** 指定インスタンスから出ていくリレーションのみ */
  listRelationshipsByInstance(instanceId: string): Relationship[];
}

/** インスタンス一覧の取得元 */
export interface InstanceSource {
  findAll(): Instance[];
  findById(id: string): Instance | undefined;
}

/** パターン一覧の取得元。条件は常にパターンと一緒に読み込まれる。 */
export interface PatternSource {
  findActive(): ThreatPattern[];
  findById(id: string): ThreatPattern | undefined;
}

/** 永続化済み条件の型エイリアス（エンジン側の入力） */
export type ConditionRecord = Pick<
  PatternCondition,
  'conditionType' | 'operator' | 'value' | 'relationshipType'
>;
