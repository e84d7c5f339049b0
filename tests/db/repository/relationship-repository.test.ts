import { describe, it, expect, beforeEach } from 'vitest';
import Database from 'better-sqlite3';
import { migrateDatabase } from '../../../src/db/migrate.js';
import { ProductRepository } from '../../../src/db/repository/product-repository.js';
import { InstanceRepository } from '../../../src/db/repository/instance-repository.js';
import { RelationshipRepository } from '../../../src/db/repository/relationship-repository.js';

describe('RelationshipRepository', () => {
  let db: InstanceType<typeof Database>;
  let repo: RelationshipRepository;
  let productId: string;
  let webId: string;
  let dbInstanceId: string;

  beforeEach(() => {
    db = new Database(':memory:');
    migrateDatabase(db);
    repo = new RelationshipRepository(db);
    productId = new ProductRepository(db).create({ name: 'nginx' }).id;
    const instances = new InstanceRepository(db);
    webId = instances.create({ name: 'web-1', instanceOf: productId }).id;
    dbInstanceId = instances.create({ name: 'db-1', instanceOf: productId }).id;
  });

  it('create - インスタンス宛てのリレーション', () => {
    const rel = repo.create({ type: 'connects_to', fromInstanceId: webId, toInstanceId: dbInstanceId });

    expect(rel.toInstanceId).toBe(dbInstanceId);
    expect('toProductId' in rel).toBe(false);
    expect(repo.findById(rel.id)).toEqual(rel);
  });

  it('create - プロダクト宛てのリレーション', () => {
    const rel = repo.create({ type: 'uses', fromInstanceId: webId, toProductId: productId });

    expect(repo.findById(rel.id)?.toProductId).toBe(productId);
    expect(repo.findById(rel.id)?.toInstanceId).toBeUndefined();
  });

  it('create - 宛先が両方 / どちらも無い場合はエラー', () => {
    expect(() =>
      repo.create({
        type: 'uses',
        fromInstanceId: webId,
        toInstanceId: dbInstanceId,
        toProductId: productId,
      }),
    ).toThrow('Relationship needs exactly one of toInstanceId or toProductId');
    expect(() => repo.create({ type: 'uses', fromInstanceId: webId })).toThrow(
      'Relationship needs exactly one of toInstanceId or toProductId',
    );
  });

  it('findByFromInstance - 出ていくリレーションのみ、作成順', () => {
    repo.create({ type: 'connects_to', fromInstanceId: webId, toInstanceId: dbInstanceId });
    repo.create({ type: 'uses', fromInstanceId: webId, toProductId: productId });
    repo.create({ type: 'connects_to', fromInstanceId: dbInstanceId, toInstanceId: webId });

    expect(repo.findByFromInstance(webId).map((r) => r.type)).toEqual(['connects_to', 'uses']);
    expect(repo.findByFromInstance(dbInstanceId)).toHaveLength(1);
  });

  it('delete - 削除成功で true', () => {
    const rel = repo.create({ type: 'uses', fromInstanceId: webId, toProductId: productId });

    expect(repo.delete(rel.id)).toBe(true);
    expect(repo.findByFromInstance(webId)).toEqual([]);
  });
});
