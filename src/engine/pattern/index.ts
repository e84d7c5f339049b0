/**
 * threatreg — Pattern engine public API
 *
 * Wires the SQLite repositories into the matching engine and re-exports
 * the catalog, validator and evaluator entry points.
 */

import type Database from 'better-sqlite3';
import type { Logger } from '../../logger.js';
import type { ThreatPatternMatch } from '../../types/pattern.js';
import { InstanceRepository } from '../../db/repository/instance-repository.js';
import { ThreatPatternRepository } from '../../db/repository/threat-pattern-repository.js';
import { createSqliteLookups } from './lookups.js';
import { PatternMatchingEngine } from './matcher.js';
import type { MatchesByInstance } from './matcher.js';

export { PatternCatalog, assertValidCondition } from './catalog.js';
export { PatternMatchingEngine } from './matcher.js';
export type { MatchesByInstance, PatternMatchingEngineDeps } from './matcher.js';
export { validateCondition } from './condition-validator.js';
export type { ConditionShape, ConditionValidationResult } from './condition-validator.js';
export { compileCondition, evaluateCondition } from './condition-evaluator.js';
export type { EvaluationContext } from './condition-evaluator.js';
export { compilePattern, matchesPattern } from './pattern-evaluator.js';
export { createSqliteLookups } from './lookups.js';

/**
 * Create a matching engine reading instances, active patterns and
 * inventory lookups from the given database.
 */
export function createMatchingEngine(
  db: Database.Database,
  logger?: Logger,
): PatternMatchingEngine {
  return new PatternMatchingEngine({
    instances: new InstanceRepository(db),
    patterns: new ThreatPatternRepository(db),
    lookups: createSqliteLookups(db),
    logger,
  });
}

/**
 * Convert a batch result into a plain object for JSON output,
 * keeping instance order.
 */
export function matchesToRecord(
  matches: MatchesByInstance,
): Record<string, ThreatPatternMatch[]> {
  return Object.fromEntries(matches);
}
