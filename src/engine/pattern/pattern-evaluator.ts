/**
 * threatreg — Pattern evaluator
 *
 * パターン = 条件の AND 結合。
 * - 非アクティブなパターンは常に不一致
 * - 条件が空のアクティブなパターンは全インスタンスに一致する（意図した仕様）
 * - OR / グルーピングは存在しない
 */

import type { Instance, ThreatPattern } from '../../types/entities.js';
import type { CompiledPattern } from '../../types/pattern.js';
import { compileCondition, evaluateCondition } from './condition-evaluator.js';
import type { EvaluationContext } from './condition-evaluator.js';

/** パターンの全条件を一度だけパースする。 */
export function compilePattern(pattern: ThreatPattern): CompiledPattern {
  return {
    pattern,
    conditions: pattern.conditions.map(compileCondition),
  };
}

/**
 * コンパイル済みパターンにインスタンスが一致するかを判定する。
 * 最初に false となった条件で評価を打ち切る。
 */
export function matchesCompiled(
  instance: Instance,
  compiled: CompiledPattern,
  ctx: EvaluationContext,
): boolean {
  if (!compiled.pattern.isActive) {
    return false;
  }
  return compiled.conditions.every((condition) => evaluateCondition(instance, condition, ctx));
}

/** 未コンパイルのパターンに対する matchesCompiled() の薄いラッパー。 */
export function matchesPattern(
  instance: Instance,
  pattern: ThreatPattern,
  ctx: EvaluationContext,
): boolean {
  return matchesCompiled(instance, compilePattern(pattern), ctx);
}
