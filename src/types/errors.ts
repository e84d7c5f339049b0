/**
 * threatreg - Error types
 *
 * Write operations surface these to the caller. Lookup failures during
 * evaluation never do: they become a non-match for the condition.
 */

export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryError';
  }
}

/** A write referred to a threat or pattern that does not exist. */
export class ReferenceNotFoundError extends RegistryError {
  readonly target: 'threat' | 'pattern';
  readonly id: string;

  constructor(target: 'threat' | 'pattern', id: string) {
    super(`${target} not found: ${id}`);
    this.name = 'ReferenceNotFoundError';
    this.target = target;
    this.id = id;
  }
}

/** A read or update addressed a record by id that does not exist. */
export class RecordNotFoundError extends RegistryError {
  readonly record: 'pattern' | 'condition' | 'instance';
  readonly id: string;

  constructor(record: 'pattern' | 'condition' | 'instance', id: string) {
    super(`${record} not found: ${id}`);
    this.name = 'RecordNotFoundError';
    this.record = record;
    this.id = id;
  }
}

export type ConditionValidationCode = 'InvalidEnum' | 'MissingRelationshipType' | 'MissingValue';

export type ConditionField = 'conditionType' | 'operator' | 'relationshipType' | 'value';

export class ConditionValidationError extends RegistryError {
  readonly code: ConditionValidationCode;
  readonly field: ConditionField;
  /** Position of the condition inside a create-pattern-with-conditions call. */
  readonly conditionIndex?: number;

  constructor(
    code: ConditionValidationCode,
    field: ConditionField,
    message: string,
    conditionIndex?: number,
  ) {
    super(
      conditionIndex === undefined
        ? `invalid pattern condition: ${message}`
        : `invalid pattern condition ${conditionIndex}: ${message}`,
    );
    this.name = 'ConditionValidationError';
    this.code = code;
    this.field = field;
    this.conditionIndex = conditionIndex;
  }
}

/** An environment variable failed configuration parsing. */
export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(`Invalid ${variable}: ${message}`);
    this.name = 'ConfigError';
    this.variable = variable;
  }
}
