import { describe, it, expect, beforeEach } from 'vitest';
import Database from 'better-sqlite3';
import crypto from 'node:crypto';
import { migrateDatabase } from '../../../src/db/migrate.js';
import { ThreatRepository } from '../../../src/db/repository/threat-repository.js';
import { ThreatPatternRepository } from '../../../src/db/repository/threat-pattern-repository.js';
import { PatternConditionRepository } from '../../../src/db/repository/pattern-condition-repository.js';

describe('PatternConditionRepository', () => {
  let db: InstanceType<typeof Database>;
  let repo: PatternConditionRepository;
  let patternId: string;

  beforeEach(() => {
    db = new Database(':memory:');
    migrateDatabase(db);
    repo = new PatternConditionRepository(db);
    const threatId = new ThreatRepository(db).create({ title: 'XSS' }).id;
    patternId = new ThreatPatternRepository(db).create({
      name: 'public web',
      threatId,
      isActive: true,
    }).id;
  });

  it('create - position は 0 から追加順に振られる', () => {
    const first = repo.create({ patternId, conditionType: 'TAG', operator: 'EXISTS' });
    const second = repo.create({
      patternId,
      conditionType: 'PRODUCT',
      operator: 'EQUALS',
      value: 'nginx',
    });

    expect(first.position).toBe(0);
    expect(second.position).toBe(1);
  });

  it('create - value / relationshipType は既定で空文字', () => {
    const condition = repo.create({ patternId, conditionType: 'TAG', operator: 'EXISTS' });

    expect(condition.value).toBe('');
    expect(condition.relationshipType).toBe('');
    expect(repo.findById(condition.id)).toEqual(condition);
  });

  it('create - 存在しないパターンは FK 制約違反', () => {
    expect(() =>
      repo.create({ patternId: crypto.randomUUID(), conditionType: 'TAG', operator: 'EXISTS' }),
    ).toThrow();
  });

  it('findByPattern - position 順、削除後も残りの順序を保つ', () => {
    const a = repo.create({ patternId, conditionType: 'TAG', operator: 'CONTAINS', value: 'a' });
    repo.create({ patternId, conditionType: 'TAG', operator: 'CONTAINS', value: 'b' });
    repo.create({ patternId, conditionType: 'TAG', operator: 'CONTAINS', value: 'c' });

    repo.delete(a.id);
    const d = repo.create({ patternId, conditionType: 'TAG', operator: 'CONTAINS', value: 'd' });

    expect(repo.findByPattern(patternId).map((c) => c.value)).toEqual(['b', 'c', 'd']);
    expect(d.position).toBe(3);
  });

  it('update - 指定フィールドのみ上書きし、position は変わらない', () => {
    const condition = repo.create({
      patternId,
      conditionType: 'TAG',
      operator: 'CONTAINS',
      value: 'pci',
    });

    const updated = repo.update(condition.id, { value: 'hipaa' });

    expect(updated).toEqual({ ...condition, value: 'hipaa' });
    expect(repo.findById(condition.id)).toEqual({ ...condition, value: 'hipaa' });
  });

  it('update - 存在しない id は undefined', () => {
    expect(repo.update(crypto.randomUUID(), { value: 'x' })).toBeUndefined();
  });

  it('deleteByPattern - 削除件数を返す', () => {
    repo.create({ patternId, conditionType: 'TAG', operator: 'EXISTS' });
    repo.create({ patternId, conditionType: 'TAG', operator: 'NOT_EXISTS' });

    expect(repo.deleteByPattern(patternId)).toBe(2);
    expect(repo.findAll()).toEqual([]);
  });
});
