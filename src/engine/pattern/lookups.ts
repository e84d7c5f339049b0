/**
 * threatreg — SQLite-backed evaluation lookups
 *
 * Adapts the inventory repositories to the read-only EvaluationLookups
 * interface the condition evaluator consumes.
 */

import type Database from 'better-sqlite3';
import type { EvaluationLookups } from '../../types/pattern.js';
import { ProductRepository } from '../../db/repository/product-repository.js';
import { TagRepository } from '../../db/repository/tag-repository.js';
import { RelationshipRepository } from '../../db/repository/relationship-repository.js';

export function createSqliteLookups(db: Database.Database): EvaluationLookups {
  const productRepo = new ProductRepository(db);
  const tagRepo = new TagRepository(db);
  const relationshipRepo = new RelationshipRepository(db);

  return {
    getProduct: (productId) => productRepo.findById(productId),
    listTagsByProduct: (productId) => tagRepo.findByProduct(productId),
    listTagsByInstance: (instanceId) => tagRepo.findByInstance(instanceId),
    listRelationshipsByInstance: (instanceId) => relationshipRepo.findByFromInstance(instanceId),
  };
}
