import { describe, it, expect } from 'vitest';
import {
  compilePattern,
  matchesCompiled,
  matchesPattern,
} from '../../../src/engine/pattern/pattern-evaluator.js';
import type { EvaluationContext } from '../../../src/engine/pattern/condition-evaluator.js';
import { createLogger } from '../../../src/logger.js';
import type { PatternCondition, ThreatPattern } from '../../../src/types/entities.js';
import { createFakeLookups, instance, product } from '../../helpers/fake-lookups.js';

// ---------------------------------------------------------------------------
// ヘルパー
// ---------------------------------------------------------------------------

const web = instance('web-1', 'prod-nginx');
const bare = instance('bare-1', 'prod-nginx');

const ctx: EvaluationContext = {
  lookups: createFakeLookups({
    products: [product('prod-nginx', 'nginx')],
    instanceTags: { 'web-1': ['internet-facing', 'pci'] },
  }),
  logger: createLogger('test'),
};

function condition(
  conditionType: string,
  operator: string,
  value = '',
  position = 0,
): PatternCondition {
  return {
    id: `c-${position}`,
    patternId: 'p-1',
    position,
    conditionType,
    operator,
    value,
    relationshipType: '',
  };
}

function pattern(conditions: PatternCondition[], isActive = true): ThreatPattern {
  return {
    id: 'p-1',
    name: 'test pattern',
    threatId: 't-1',
    isActive,
    conditions,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
  };
}

// ---------------------------------------------------------------------------
// テスト
// ---------------------------------------------------------------------------

describe('compilePattern', () => {
  it('条件を順序通りにコンパイルし、不正な条件は undefined で残す', () => {
    const compiled = compilePattern(
      pattern([condition('TAG', 'EXISTS'), condition('BOGUS', 'EXISTS', '', 1)]),
    );

    expect(compiled.conditions).toEqual([{ kind: 'TAG', operator: 'EXISTS', value: '' }, undefined]);
  });
});

describe('matchesPattern', () => {
  it('非アクティブなパターンは条件に関わらず不一致', () => {
    expect(matchesPattern(web, pattern([], false), ctx)).toBe(false);
    expect(matchesPattern(web, pattern([condition('TAG', 'EXISTS')], false), ctx)).toBe(false);
  });

  it('条件が空のアクティブなパターンは全インスタンスに一致', () => {
    expect(matchesPattern(web, pattern([]), ctx)).toBe(true);
    expect(matchesPattern(bare, pattern([]), ctx)).toBe(true);
  });

  it('全条件が true なら一致', () => {
    const p = pattern([
      condition('TAG', 'CONTAINS', 'internet-facing'),
      condition('TAG', 'CONTAINS', 'pci', 1),
      condition('PRODUCT', 'EQUALS', 'nginx', 2),
    ]);

    expect(matchesPattern(web, p, ctx)).toBe(true);
  });

  it('1 つでも false の条件があれば不一致', () => {
    const p = pattern([
      condition('TAG', 'CONTAINS', 'internet-facing'),
      condition('TAG', 'CONTAINS', 'privileged', 1),
    ]);

    expect(matchesPattern(web, p, ctx)).toBe(false);
  });

  it('不正な条件を含むパターンは不一致', () => {
    const p = pattern([condition('TAG', 'EXISTS'), condition('TAG', 'SOUNDS_LIKE', 'x', 1)]);

    expect(matchesPattern(web, p, ctx)).toBe(false);
  });
});

describe('matchesCompiled', () => {
  it('コンパイル済みパターンを再利用しても結果は同じ', () => {
    const compiled = compilePattern(pattern([condition('TAG', 'EXISTS')]));

    expect(matchesCompiled(web, compiled, ctx)).toBe(true);
    expect(matchesCompiled(web, compiled, ctx)).toBe(true);
    expect(matchesCompiled(bare, compiled, ctx)).toBe(false);
  });
});
