/**
 * threatreg — Pattern matching engine
 *
 * Evaluates instances against active threat patterns at three
 * granularities: one pair, one instance against every active pattern,
 * and every instance against every active pattern.
 *
 * Loading the instance inventory or the pattern set is not fail-closed:
 * an error there propagates and no partial result is returned. Only
 * lookups inside a single condition are swallowed (see condition-evaluator).
 */

import { createLogger } from '../../logger.js';
import type { Logger } from '../../logger.js';
import type { Instance, ThreatPattern } from '../../types/entities.js';
import type {
  CompiledPattern,
  EvaluationLookups,
  InstanceSource,
  PatternSource,
  ThreatPatternMatch,
} from '../../types/pattern.js';
import { RecordNotFoundError } from '../../types/errors.js';
import type { EvaluationContext } from './condition-evaluator.js';
import { compilePattern, matchesCompiled, matchesPattern } from './pattern-evaluator.js';

export interface PatternMatchingEngineDeps {
  instances: InstanceSource;
  patterns: PatternSource;
  lookups: EvaluationLookups;
  logger?: Logger;
}

/** Matches keyed by instance id. Only instances with at least one match appear. */
export type MatchesByInstance = Map<string, ThreatPatternMatch[]>;

function toMatch(instance: Instance, pattern: ThreatPattern): ThreatPatternMatch {
  return {
    instanceId: instance.id,
    threatId: pattern.threatId,
    patternId: pattern.id,
    pattern,
  };
}

export class PatternMatchingEngine {
  private readonly instances: InstanceSource;
  private readonly patterns: PatternSource;
  private readonly ctx: EvaluationContext;
  private readonly logger: Logger;

  constructor(deps: PatternMatchingEngineDeps) {
    this.instances = deps.instances;
    this.patterns = deps.patterns;
    this.logger = deps.logger ?? createLogger('matcher');
    this.ctx = { lookups: deps.lookups, logger: this.logger };
  }

  /** Evaluate one instance against one pattern. Returns zero or one match. */
  evaluate(instance: Instance, pattern: ThreatPattern): ThreatPatternMatch[] {
    return matchesPattern(instance, pattern, this.ctx) ? [toMatch(instance, pattern)] : [];
  }

  /**
   * Load an instance and a pattern by id and evaluate the pair.
   *
   * @throws RecordNotFoundError when either id does not exist
   */
  evaluateOne(instanceId: string, patternId: string): ThreatPatternMatch[] {
    const instance = this.requireInstance(instanceId);
    const pattern = this.patterns.findById(patternId);
    if (pattern === undefined) {
      throw new RecordNotFoundError('pattern', patternId);
    }
    return this.evaluate(instance, pattern);
  }

  /**
   * Evaluate one instance against every active pattern.
   * Matches keep the pattern listing order.
   */
  evaluateInstanceAgainstActivePatterns(instanceId: string): ThreatPatternMatch[] {
    const instance = this.requireInstance(instanceId);
    const compiled = this.patterns.findActive().map(compilePattern);
    return this.matchInstance(instance, compiled);
  }

  /**
   * Evaluate the full inventory against every active pattern.
   * Both sets are loaded once; patterns are compiled once.
   */
  evaluateAllAgainstActivePatterns(): MatchesByInstance {
    const instances = this.instances.findAll();
    const compiled = this.patterns.findActive().map(compilePattern);

    const result: MatchesByInstance = new Map();
    for (const instance of instances) {
      const matches = this.matchInstance(instance, compiled);
      if (matches.length > 0) {
        result.set(instance.id, matches);
      }
    }

    this.logger.info(
      { instances: instances.length, patterns: compiled.length, matchedInstances: result.size },
      'Evaluated instances against active patterns',
    );
    return result;
  }

  private matchInstance(instance: Instance, compiled: CompiledPattern[]): ThreatPatternMatch[] {
    const matches: ThreatPatternMatch[] = [];
    for (const entry of compiled) {
      if (matchesCompiled(instance, entry, this.ctx)) {
        matches.push(toMatch(instance, entry.pattern));
      }
    }
    return matches;
  }

  private requireInstance(instanceId: string): Instance {
    const instance = this.instances.findById(instanceId);
    if (instance === undefined) {
      throw new RecordNotFoundError('instance', instanceId);
    }
    return instance;
  }
}
