import { describe, it, expect } from 'vitest';
import {
  applyStringOperator,
  compileCondition,
  evaluateCondition,
  evaluateTagCondition,
} from '../../../src/engine/pattern/condition-evaluator.js';
import type { EvaluationContext } from '../../../src/engine/pattern/condition-evaluator.js';
import { createLogger } from '../../../src/logger.js';
import type { ConditionRecord } from '../../../src/types/pattern.js';
import type { FakeInventory } from '../../helpers/fake-lookups.js';
import {
  createFakeLookups,
  instance,
  product,
  relationship,
} from '../../helpers/fake-lookups.js';

// ---------------------------------------------------------------------------
// ヘルパー
// ---------------------------------------------------------------------------

const web = instance('web-1', 'prod-nginx');

function ctxFor(inventory: FakeInventory): EvaluationContext {
  return { lookups: createFakeLookups(inventory), logger: createLogger('test') };
}

function record(
  conditionType: string,
  operator: string,
  value = '',
  relationshipType = '',
): ConditionRecord {
  return { conditionType, operator, value, relationshipType };
}

function evaluate(inventory: FakeInventory, condition: ConditionRecord): boolean {
  return evaluateCondition(web, compileCondition(condition), ctxFor(inventory));
}

const baseInventory: FakeInventory = {
  products: [product('prod-nginx', 'nginx 1.18')],
  productTags: { 'prod-nginx': ['eol'] },
  instanceTags: { 'web-1': ['internet-facing'], 'db-1': ['database'], 'cache-1': [] },
  relationships: [
    relationship('r1', 'connects_to', 'web-1', { toInstanceId: 'db-1' }),
    relationship('r2', 'uses', 'web-1', { toProductId: 'prod-openssl' }),
  ],
};

// ---------------------------------------------------------------------------
// compileCondition
// ---------------------------------------------------------------------------

describe('compileCondition', () => {
  it('RELATIONSHIP_TARGET_TAG — value を tag として保持する', () => {
    expect(
      compileCondition(record('RELATIONSHIP_TARGET_TAG', 'HAS_RELATIONSHIP_WITH', 'db', 'uses')),
    ).toEqual({
      kind: 'RELATIONSHIP_TARGET_TAG',
      operator: 'HAS_RELATIONSHIP_WITH',
      relationshipType: 'uses',
      tag: 'db',
    });
  });

  it('RELATIONSHIP_TARGET_ID — value を targetId として保持する', () => {
    expect(
      compileCondition(record('RELATIONSHIP_TARGET_ID', 'HAS_RELATIONSHIP_WITH', 'db-1', 'uses')),
    ).toEqual({
      kind: 'RELATIONSHIP_TARGET_ID',
      operator: 'HAS_RELATIONSHIP_WITH',
      relationshipType: 'uses',
      targetId: 'db-1',
    });
  });

  it('TAG — relationshipType を持たない', () => {
    expect(compileCondition(record('TAG', 'EXISTS', '', 'ignored'))).toEqual({
      kind: 'TAG',
      operator: 'EXISTS',
      value: '',
    });
  });

  it('未知の種別・演算子は undefined', () => {
    expect(compileCondition(record('COLOR', 'EQUALS', 'red'))).toBeUndefined();
    expect(compileCondition(record('TAG', 'LIKE', 'x'))).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// evaluateCondition
// ---------------------------------------------------------------------------

describe('evaluateCondition', () => {
  it('コンパイルできなかった条件は常に false', () => {
    expect(evaluateCondition(web, undefined, ctxFor(baseInventory))).toBe(false);
    expect(evaluate(baseInventory, record('COLOR', 'EXISTS'))).toBe(false);
  });

  describe('PRODUCT', () => {
    it('EQUALS / NOT_EQUALS はプロダクト名の完全一致', () => {
      expect(evaluate(baseInventory, record('PRODUCT', 'EQUALS', 'nginx 1.18'))).toBe(true);
      expect(evaluate(baseInventory, record('PRODUCT', 'EQUALS', 'nginx'))).toBe(false);
      expect(evaluate(baseInventory, record('PRODUCT', 'NOT_EQUALS', 'apache'))).toBe(true);
    });

    it('CONTAINS / NOT_CONTAINS は部分文字列', () => {
      expect(evaluate(baseInventory, record('PRODUCT', 'CONTAINS', 'nginx'))).toBe(true);
      expect(evaluate(baseInventory, record('PRODUCT', 'NOT_CONTAINS', 'nginx'))).toBe(false);
    });

    it('EXISTS など文字列演算子以外は false', () => {
      expect(evaluate(baseInventory, record('PRODUCT', 'EXISTS'))).toBe(false);
    });

    it('プロダクトが見つからなければ NOT_EQUALS でも false', () => {
      const inventory: FakeInventory = { ...baseInventory, products: [] };

      expect(evaluate(inventory, record('PRODUCT', 'NOT_EQUALS', 'apache'))).toBe(false);
    });

    it('getProduct が例外を投げたら false（例外は伝播しない）', () => {
      const inventory: FakeInventory = {
        ...baseInventory,
        failing: { getProduct: ['prod-nginx'] },
      };

      expect(evaluate(inventory, record('PRODUCT', 'NOT_EQUALS', 'apache'))).toBe(false);
    });
  });

  describe('PRODUCT_ID', () => {
    it('instanceOf を文字列比較する（ルックアップ不要）', () => {
      const inventory: FakeInventory = { failing: { getProduct: ['prod-nginx'] } };

      expect(evaluate(inventory, record('PRODUCT_ID', 'EQUALS', 'prod-nginx'))).toBe(true);
      expect(evaluate(inventory, record('PRODUCT_ID', 'CONTAINS', 'nginx'))).toBe(true);
      expect(evaluate(inventory, record('PRODUCT_ID', 'NOT_EQUALS', 'prod-nginx'))).toBe(false);
    });
  });

  describe('PRODUCT_TAG', () => {
    it('プロダクトのタグに対するメンバーシップ', () => {
      expect(evaluate(baseInventory, record('PRODUCT_TAG', 'CONTAINS', 'eol'))).toBe(true);
      expect(evaluate(baseInventory, record('PRODUCT_TAG', 'NOT_CONTAINS', 'eol'))).toBe(false);
      expect(evaluate(baseInventory, record('PRODUCT_TAG', 'EXISTS'))).toBe(true);
    });

    it('listTagsByProduct 失敗時は NOT_EXISTS でも false', () => {
      const inventory: FakeInventory = {
        ...baseInventory,
        failing: { listTagsByProduct: ['prod-nginx'] },
      };

      expect(evaluate(inventory, record('PRODUCT_TAG', 'NOT_EXISTS'))).toBe(false);
    });
  });

  describe('TAG', () => {
    it('CONTAINS / NOT_CONTAINS はタグ名の完全一致メンバーシップ', () => {
      expect(evaluate(baseInventory, record('TAG', 'CONTAINS', 'internet-facing'))).toBe(true);
      expect(evaluate(baseInventory, record('TAG', 'CONTAINS', 'internet'))).toBe(false);
      expect(evaluate(baseInventory, record('TAG', 'NOT_CONTAINS', 'privileged'))).toBe(true);
    });

    it('EXISTS / NOT_EXISTS はタグ集合の空判定', () => {
      const untagged: FakeInventory = { ...baseInventory, instanceTags: {} };

      expect(evaluate(baseInventory, record('TAG', 'EXISTS'))).toBe(true);
      expect(evaluate(untagged, record('TAG', 'EXISTS'))).toBe(false);
      expect(evaluate(untagged, record('TAG', 'NOT_EXISTS'))).toBe(true);
    });

    it('EQUALS はタグ条件では常に false', () => {
      expect(evaluate(baseInventory, record('TAG', 'EQUALS', 'internet-facing'))).toBe(false);
    });

    it('listTagsByInstance 失敗時は NOT_CONTAINS でも false', () => {
      const inventory: FakeInventory = {
        ...baseInventory,
        failing: { listTagsByInstance: ['web-1'] },
      };

      expect(evaluate(inventory, record('TAG', 'NOT_CONTAINS', 'privileged'))).toBe(false);
    });
  });

  describe('RELATIONSHIP', () => {
    it('EXISTS / NOT_EXISTS はリレーション種別の有無', () => {
      expect(evaluate(baseInventory, record('RELATIONSHIP', 'EXISTS', '', 'connects_to'))).toBe(
        true,
      );
      expect(evaluate(baseInventory, record('RELATIONSHIP', 'NOT_EXISTS', '', 'backs_up'))).toBe(
        true,
      );
      expect(
        evaluate(baseInventory, record('RELATIONSHIP', 'NOT_EXISTS', '', 'connects_to')),
      ).toBe(false);
    });

    it('EQUALS は宛先 ID（インスタンス / プロダクト）との一致', () => {
      expect(
        evaluate(baseInventory, record('RELATIONSHIP', 'EQUALS', 'db-1', 'connects_to')),
      ).toBe(true);
      expect(
        evaluate(baseInventory, record('RELATIONSHIP', 'EQUALS', 'prod-openssl', 'uses')),
      ).toBe(true);
      expect(
        evaluate(baseInventory, record('RELATIONSHIP', 'EQUALS', 'db-1', 'uses')),
      ).toBe(false);
    });

    it('listRelationshipsByInstance 失敗時は NOT_EXISTS でも false', () => {
      const inventory: FakeInventory = {
        ...baseInventory,
        failing: { listRelationshipsByInstance: ['web-1'] },
      };

      expect(evaluate(inventory, record('RELATIONSHIP', 'NOT_EXISTS', '', 'backs_up'))).toBe(
        false,
      );
    });
  });

  describe('RELATIONSHIP_TARGET_ID', () => {
    it('HAS / NOT_HAS は宛先 ID の有無とその否定', () => {
      const has = record('RELATIONSHIP_TARGET_ID', 'HAS_RELATIONSHIP_WITH', 'db-1', 'connects_to');
      const notHas = record(
        'RELATIONSHIP_TARGET_ID',
        'NOT_HAS_RELATIONSHIP_WITH',
        'db-1',
        'connects_to',
      );

      expect(evaluate(baseInventory, has)).toBe(true);
      expect(evaluate(baseInventory, notHas)).toBe(false);
    });

    it('プロダクト宛てのリレーションは宛先 ID の一致に数えない', () => {
      expect(
        evaluate(
          baseInventory,
          record('RELATIONSHIP_TARGET_ID', 'HAS_RELATIONSHIP_WITH', 'prod-openssl', 'uses'),
        ),
      ).toBe(false);
      expect(
        evaluate(
          baseInventory,
          record('RELATIONSHIP_TARGET_ID', 'NOT_HAS_RELATIONSHIP_WITH', 'prod-openssl', 'uses'),
        ),
      ).toBe(true);
    });

    it('HAS / NOT_HAS 以外の演算子は false', () => {
      expect(
        evaluate(baseInventory, record('RELATIONSHIP_TARGET_ID', 'EQUALS', 'db-1', 'connects_to')),
      ).toBe(false);
    });
  });

  describe('RELATIONSHIP_TARGET_TAG', () => {
    it('HAS — 宛先インスタンスのタグに含まれれば true', () => {
      expect(
        evaluate(
          baseInventory,
          record('RELATIONSHIP_TARGET_TAG', 'HAS_RELATIONSHIP_WITH', 'database', 'connects_to'),
        ),
      ).toBe(true);
    });

    it('HAS — 種別が違うリレーションは見ない', () => {
      expect(
        evaluate(
          baseInventory,
          record('RELATIONSHIP_TARGET_TAG', 'HAS_RELATIONSHIP_WITH', 'database', 'uses'),
        ),
      ).toBe(false);
    });

    it('NOT_HAS — どの宛先もタグを持たなければ true', () => {
      expect(
        evaluate(
          baseInventory,
          record('RELATIONSHIP_TARGET_TAG', 'NOT_HAS_RELATIONSHIP_WITH', 'pci', 'connects_to'),
        ),
      ).toBe(true);
    });

    it('NOT_HAS — 最初の宛先がタグを持ち、次が持たない場合は false', () => {
      const inventory: FakeInventory = {
        ...baseInventory,
        relationships: [
          relationship('r1', 'connects_to', 'web-1', { toInstanceId: 'db-1' }),
          relationship('r2', 'connects_to', 'web-1', { toInstanceId: 'cache-1' }),
        ],
      };

      expect(
        evaluate(
          inventory,
          record('RELATIONSHIP_TARGET_TAG', 'NOT_HAS_RELATIONSHIP_WITH', 'database', 'connects_to'),
        ),
      ).toBe(false);
    });

    it('プロダクト宛てのリレーションはスキップされる', () => {
      const inventory: FakeInventory = {
        ...baseInventory,
        productTags: { 'prod-openssl': ['crypto'] },
      };

      expect(
        evaluate(
          inventory,
          record('RELATIONSHIP_TARGET_TAG', 'HAS_RELATIONSHIP_WITH', 'crypto', 'uses'),
        ),
      ).toBe(false);
    });

    it('宛先のタグ取得に失敗したリレーションはスキップして走査を続ける', () => {
      const inventory: FakeInventory = {
        ...baseInventory,
        instanceTags: { 'web-1': [], 'cache-1': ['database'] },
        relationships: [
          relationship('r1', 'connects_to', 'web-1', { toInstanceId: 'db-1' }),
          relationship('r2', 'connects_to', 'web-1', { toInstanceId: 'cache-1' }),
        ],
        failing: { listTagsByInstance: ['db-1'] },
      };

      expect(
        evaluate(
          inventory,
          record('RELATIONSHIP_TARGET_TAG', 'HAS_RELATIONSHIP_WITH', 'database', 'connects_to'),
        ),
      ).toBe(true);
    });

    it('HAS / NOT_HAS 以外の演算子は false', () => {
      expect(
        evaluate(
          baseInventory,
          record('RELATIONSHIP_TARGET_TAG', 'CONTAINS', 'database', 'connects_to'),
        ),
      ).toBe(false);
    });
  });

  it('同じ入力で 2 回評価しても結果は同じ', () => {
    const condition = record('TAG', 'CONTAINS', 'internet-facing');

    expect(evaluate(baseInventory, condition)).toBe(evaluate(baseInventory, condition));
  });
});

// ---------------------------------------------------------------------------
// 演算子ヘルパー
// ---------------------------------------------------------------------------

describe('applyStringOperator', () => {
  it('HAS_RELATIONSHIP_WITH は文字列演算子ではない', () => {
    expect(applyStringOperator('a', 'HAS_RELATIONSHIP_WITH', 'a')).toBe(false);
  });

  it('空文字の CONTAINS は常に true', () => {
    expect(applyStringOperator('nginx', 'CONTAINS', '')).toBe(true);
  });
});

describe('evaluateTagCondition', () => {
  it('NOT_EXISTS は空集合で true', () => {
    expect(evaluateTagCondition([], 'NOT_EXISTS', '')).toBe(true);
    expect(evaluateTagCondition(['x'], 'NOT_EXISTS', '')).toBe(false);
  });
});
