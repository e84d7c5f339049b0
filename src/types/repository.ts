/**
 * threatreg - Repository input / update type definitions
 *
 * Create types use `Omit` to strip auto-generated columns (id, createdAt, updatedAt).
 * Update types use `Partial<Pick<...>>` to allow selective field updates.
 */

import type {
  Instance,
  PatternCondition,
  Product,
  Relationship,
  Tag,
  Threat,
  ThreatPattern,
} from './entities.js';

// ============================================================
// Create input types
// ============================================================

/** Input for creating a new Threat. */
export type CreateThreatInput = Omit<Threat, 'id' | 'createdAt'>;

/** Input for creating a new Product. */
export type CreateProductInput = Omit<Product, 'id' | 'createdAt'>;

/** Input for creating a new Instance. */
export type CreateInstanceInput = Omit<Instance, 'id' | 'createdAt'>;

/** Input for creating a new Tag. */
export type CreateTagInput = Omit<Tag, 'id' | 'createdAt'>;

/** Input for creating a new Relationship. */
export type CreateRelationshipInput = Omit<Relationship, 'id' | 'createdAt'>;

/** Input for creating a new ThreatPattern (conditions are created separately). */
export type CreateThreatPatternInput = Omit<
  ThreatPattern,
  'id' | 'conditions' | 'createdAt' | 'updatedAt'
>;

/**
 * Input for creating a new PatternCondition.
 * value and relationshipType default to the empty string.
 */
export type CreatePatternConditionInput = Pick<
  PatternCondition,
  'patternId' | 'conditionType' | 'operator'
> &
  Partial<Pick<PatternCondition, 'value' | 'relationshipType'>>;

/** A condition supplied together with a new pattern; patternId is assigned on insert. */
export type PatternConditionDraft = Omit<CreatePatternConditionInput, 'patternId'>;

// ============================================================
// Update input types
// ============================================================

/** Input for updating an existing ThreatPattern. */
export type UpdateThreatPatternInput = Partial<
  Pick<ThreatPattern, 'name' | 'description' | 'threatId' | 'isActive'>
>;

/** Input for updating an existing PatternCondition. */
export type UpdatePatternConditionInput = Partial<
  Pick<PatternCondition, 'conditionType' | 'operator' | 'value' | 'relationshipType'>
>;
