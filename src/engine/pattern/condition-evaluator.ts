/**
 * threatreg — Condition evaluator
 *
 * Decides whether one instance satisfies one compiled condition.
 *
 * FAIL-CLOSED: evaluateCondition() never throws for a lookup failure.
 * If a product, tag or relationship lookup throws (or a product is
 * missing), the condition evaluates to false, including for negative
 * operators such as NOT_EXISTS. A single broken reference therefore
 * cannot abort a batch; it only removes that instance's matches.
 */

import type { Logger } from '../../logger.js';
import type { Instance, Relationship } from '../../types/entities.js';
import type {
  CompiledCondition,
  ConditionRecord,
  EvaluationLookups,
  PatternOperator,
} from '../../types/pattern.js';
import { parseConditionType, parsePatternOperator } from '../../types/pattern.js';

/** Collaborators shared by every condition evaluated in one run. */
export interface EvaluationContext {
  lookups: EvaluationLookups;
  logger: Logger;
}

// ============================================================
// Compilation
// ============================================================

/**
 * Parse a persisted condition into its typed form.
 * Returns undefined when conditionType or operator is not recognised.
 */
export function compileCondition(record: ConditionRecord): CompiledCondition | undefined {
  const kind = parseConditionType(record.conditionType);
  const operator = parsePatternOperator(record.operator);
  if (kind === undefined || operator === undefined) {
    return undefined;
  }

  switch (kind) {
    case 'PRODUCT':
    case 'PRODUCT_ID':
    case 'PRODUCT_TAG':
    case 'TAG':
      return { kind, operator, value: record.value };
    case 'RELATIONSHIP':
      return { kind, operator, relationshipType: record.relationshipType, value: record.value };
    case 'RELATIONSHIP_TARGET_ID':
      return {
        kind,
        operator,
        relationshipType: record.relationshipType,
        targetId: record.value,
      };
    case 'RELATIONSHIP_TARGET_TAG':
      return { kind, operator, relationshipType: record.relationshipType, tag: record.value };
    default: {
      const _exhaustive: never = kind;
      throw new Error(`Unknown condition type: ${String(_exhaustive)}`);
    }
  }
}

// ============================================================
// Evaluation
// ============================================================

/**
 * Evaluate one condition against one instance.
 * An undefined condition (unparseable record) never matches.
 */
export function evaluateCondition(
  instance: Instance,
  condition: CompiledCondition | undefined,
  ctx: EvaluationContext,
): boolean {
  if (condition === undefined) {
    return false;
  }

  switch (condition.kind) {
    case 'PRODUCT': {
      const product = lookup(ctx, instance, 'getProduct', () =>
        ctx.lookups.getProduct(instance.instanceOf),
      );
      if (product === undefined) {
        return false;
      }
      return applyStringOperator(product.name, condition.operator, condition.value);
    }

    case 'PRODUCT_ID':
      return applyStringOperator(instance.instanceOf, condition.operator, condition.value);

    case 'PRODUCT_TAG': {
      const tags = lookup(ctx, instance, 'listTagsByProduct', () =>
        ctx.lookups.listTagsByProduct(instance.instanceOf).map((t) => t.name),
      );
      if (tags === undefined) {
        return false;
      }
      return evaluateTagCondition(tags, condition.operator, condition.value);
    }

    case 'TAG': {
      const tags = lookup(ctx, instance, 'listTagsByInstance', () =>
        ctx.lookups.listTagsByInstance(instance.id).map((t) => t.name),
      );
      if (tags === undefined) {
        return false;
      }
      return evaluateTagCondition(tags, condition.operator, condition.value);
    }

    case 'RELATIONSHIP': {
      const relationships = outboundRelationships(instance, ctx);
      if (relationships === undefined) {
        return false;
      }
      switch (condition.operator) {
        case 'EXISTS':
          return hasRelationshipType(relationships, condition.relationshipType);
        case 'NOT_EXISTS':
          return !hasRelationshipType(relationships, condition.relationshipType);
        case 'EQUALS':
          return hasRelationshipToTarget(relationships, condition.relationshipType, condition.value);
        default:
          return false;
      }
    }

    case 'RELATIONSHIP_TARGET_ID': {
      const relationships = outboundRelationships(instance, ctx);
      if (relationships === undefined) {
        return false;
      }
      const found = hasRelationshipToInstance(
        relationships,
        condition.relationshipType,
        condition.targetId,
      );
      switch (condition.operator) {
        case 'HAS_RELATIONSHIP_WITH':
          return found;
        case 'NOT_HAS_RELATIONSHIP_WITH':
          return !found;
        default:
          return false;
      }
    }

    case 'RELATIONSHIP_TARGET_TAG': {
      const relationships = outboundRelationships(instance, ctx);
      if (relationships === undefined) {
        return false;
      }
      return evaluateTargetTag(instance, relationships, condition, ctx);
    }

    default: {
      const _exhaustive: never = condition;
      throw new Error(`Unknown condition: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Scan relationships of the condition's type in order, looking at the tags
 * of each instance target (product targets are skipped, as are targets
 * whose tags cannot be read).
 *
 * HAS_RELATIONSHIP_WITH returns true at the first tagged target.
 * NOT_HAS_RELATIONSHIP_WITH returns false at the first tagged target and
 * true when the scan finishes without finding one.
 *
 * TODO: confirm with the catalog owners that NOT_HAS_RELATIONSHIP_WITH
 * should mean "no matching target has the tag" before documenting it as
 * a stable contract.
 */
function evaluateTargetTag(
  instance: Instance,
  relationships: Relationship[],
  condition: Extract<CompiledCondition, { kind: 'RELATIONSHIP_TARGET_TAG' }>,
  ctx: EvaluationContext,
): boolean {
  if (
    condition.operator !== 'HAS_RELATIONSHIP_WITH' &&
    condition.operator !== 'NOT_HAS_RELATIONSHIP_WITH'
  ) {
    return false;
  }

  for (const rel of relationships) {
    if (rel.type !== condition.relationshipType || rel.toInstanceId === undefined) {
      continue;
    }
    const targetId = rel.toInstanceId;

    const targetTags = lookup(ctx, instance, 'listTagsByInstance', () =>
      ctx.lookups.listTagsByInstance(targetId).map((t) => t.name),
    );
    if (targetTags === undefined) {
      continue;
    }

    if (targetTags.includes(condition.tag)) {
      return condition.operator === 'HAS_RELATIONSHIP_WITH';
    }
  }

  return condition.operator === 'NOT_HAS_RELATIONSHIP_WITH';
}

// ============================================================
// Helpers
// ============================================================

/**
 * Run a collaborator lookup. A thrown error is logged at debug and
 * reported as undefined so the caller can fail closed.
 */
function lookup<T>(
  ctx: EvaluationContext,
  instance: Instance,
  operation: keyof EvaluationLookups,
  fn: () => T,
): T | undefined {
  try {
    return fn();
  } catch (err) {
    ctx.logger.debug(
      { err, instanceId: instance.id, operation },
      'Lookup failed during condition evaluation; treating as non-match',
    );
    return undefined;
  }
}

function outboundRelationships(
  instance: Instance,
  ctx: EvaluationContext,
): Relationship[] | undefined {
  return lookup(ctx, instance, 'listRelationshipsByInstance', () =>
    ctx.lookups.listRelationshipsByInstance(instance.id),
  );
}

/** EQUALS / NOT_EQUALS compare whole strings, CONTAINS / NOT_CONTAINS test substrings. */
export function applyStringOperator(
  actual: string,
  operator: PatternOperator,
  expected: string,
): boolean {
  switch (operator) {
    case 'EQUALS':
      return actual === expected;
    case 'NOT_EQUALS':
      return actual !== expected;
    case 'CONTAINS':
      return actual.includes(expected);
    case 'NOT_CONTAINS':
      return !actual.includes(expected);
    default:
      return false;
  }
}

/** CONTAINS / NOT_CONTAINS test membership, EXISTS / NOT_EXISTS test emptiness. */
export function evaluateTagCondition(
  tags: string[],
  operator: PatternOperator,
  value: string,
): boolean {
  switch (operator) {
    case 'CONTAINS':
      return tags.includes(value);
    case 'NOT_CONTAINS':
      return !tags.includes(value);
    case 'EXISTS':
      return tags.length > 0;
    case 'NOT_EXISTS':
      return tags.length === 0;
    default:
      return false;
  }
}

function hasRelationshipType(relationships: Relationship[], relationshipType: string): boolean {
  return relationships.some((rel) => rel.type === relationshipType);
}

/** True when a relationship of the given type points at targetId (instance or product). Used by RELATIONSHIP EQUALS. */
function hasRelationshipToTarget(
  relationships: Relationship[],
  relationshipType: string,
  targetId: string,
): boolean {
  return relationships.some(
    (rel) =>
      rel.type === relationshipType &&
      (rel.toInstanceId === targetId || rel.toProductId === targetId),
  );
}

/** True when a relationship of the given type points at the instance targetId. Product targets never count. */
function hasRelationshipToInstance(
  relationships: Relationship[],
  relationshipType: string,
  instanceId: string,
): boolean {
  return relationships.some((rel) => rel.type === relationshipType && rel.toInstanceId === instanceId);
}
