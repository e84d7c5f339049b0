/**
 * threatreg — Condition validator
 *
 * Checks one condition's shape before it is persisted. Rules run in order
 * and the first failure wins:
 *   1. conditionType / operator present and recognised      -> InvalidEnum
 *   2. relationship kinds carry a relationshipType          -> MissingRelationshipType
 *   3. value-bearing kinds carry a value, unless the operator
 *      is EXISTS / NOT_EXISTS                               -> MissingValue
 */

import {
  CONDITION_TYPES,
  PATTERN_OPERATORS,
  RELATIONSHIP_CONDITION_TYPES,
  VALUE_CONDITION_TYPES,
  parseConditionType,
  parsePatternOperator,
} from '../../types/pattern.js';
import type { ConditionType, PatternOperator } from '../../types/pattern.js';
import type { ConditionField, ConditionValidationCode } from '../../types/errors.js';

export interface ConditionShape {
  conditionType: string;
  operator: string;
  value?: string;
  relationshipType?: string;
}

export type ConditionValidationResult =
  | { ok: true; conditionType: ConditionType; operator: PatternOperator }
  | { ok: false; code: ConditionValidationCode; field: ConditionField; message: string };

function fail(
  code: ConditionValidationCode,
  field: ConditionField,
  message: string,
): ConditionValidationResult {
  return { ok: false, code, field, message };
}

/** Validate a condition without side effects. */
export function validateCondition(condition: ConditionShape): ConditionValidationResult {
  if (condition.conditionType === '') {
    return fail('InvalidEnum', 'conditionType', 'condition_type is required');
  }
  if (condition.operator === '') {
    return fail('InvalidEnum', 'operator', 'operator is required');
  }

  const conditionType = parseConditionType(condition.conditionType);
  if (conditionType === undefined) {
    return fail(
      'InvalidEnum',
      'conditionType',
      `invalid condition_type: ${condition.conditionType} (valid: ${CONDITION_TYPES.join(', ')})`,
    );
  }

  const operator = parsePatternOperator(condition.operator);
  if (operator === undefined) {
    return fail(
      'InvalidEnum',
      'operator',
      `invalid operator: ${condition.operator} (valid: ${PATTERN_OPERATORS.join(', ')})`,
    );
  }

  if (RELATIONSHIP_CONDITION_TYPES.has(conditionType) && !condition.relationshipType) {
    return fail(
      'MissingRelationshipType',
      'relationshipType',
      `relationship_type is required for ${conditionType} condition`,
    );
  }

  if (
    VALUE_CONDITION_TYPES.has(conditionType) &&
    operator !== 'EXISTS' &&
    operator !== 'NOT_EXISTS' &&
    !condition.value
  ) {
    return fail(
      'MissingValue',
      'value',
      `value is required for ${conditionType} condition with ${operator} operator`,
    );
  }

  return { ok: true, conditionType, operator };
}
