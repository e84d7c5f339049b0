/**
 * threatreg - Entity type definitions
 *
 * These interfaces map 1:1 to the SQL tables defined in src/db/schema.ts.
 * Property names are camelCase conversions of the snake_case column names.
 *
 * Conventions:
 *   TEXT          -> string
 *   INTEGER       -> number (booleans are 0/1 in storage)
 *   nullable col  -> optional property (?)
 *   All IDs       -> string (UUID)
 *   All timestamps -> string (ISO 8601)
 */

// ============================================================
// threats
// ============================================================

/** A catalogued threat that patterns point at. */
export interface Threat {
  id: string;
  title: string;
  description?: string;
  createdAt: string;
}

// ============================================================
// products
// ============================================================

/** A product (component type) that instances are built from. */
export interface Product {
  id: string;
  name: string;
  description?: string;
  createdAt: string;
}

// ============================================================
// instances
// ============================================================

/** A deployed instance of a product. This is the unit patterns are evaluated against. */
export interface Instance {
  id: string;
  name: string;
  instanceOf: string;
  createdAt: string;
}

// ============================================================
// tags
// ============================================================

/** A label that can be attached to instances and products. */
export interface Tag {
  id: string;
  name: string;
  description?: string;
  color?: string;
  createdAt: string;
}

// ============================================================
// relationships
// ============================================================

/**
 * A directed, typed edge from an instance.
 * Exactly one of toInstanceId / toProductId is set.
 */
export interface Relationship {
  id: string;
  type: string;
  fromInstanceId: string;
  toInstanceId?: string;
  toProductId?: string;
  createdAt: string;
}

// ============================================================
// threat_patterns / pattern_conditions
// ============================================================

/**
 * One predicate of a pattern, in its persisted string form.
 * conditionType / operator are parsed into typed values by the engine.
 */
export interface PatternCondition {
  id: string;
  patternId: string;
  position: number;
  conditionType: string;
  operator: string;
  value: string;
  relationshipType: string;
}

/** A reusable rule flagging instances exposed to a threat. */
export interface ThreatPattern {
  id: string;
  name: string;
  description?: string;
  threatId: string;
  isActive: boolean;
  conditions: PatternCondition[];
  createdAt: string;
  updatedAt: string;
}
