/**
 * Rule types and default configurations for codesweep.
 *
 * This module defines the canonical list of rule IDs, the category each rule
 * reports under, the severity scale and the default rule configuration.
 */

/**
 * The four independent analysis categories, in merge order.
 */
export type Category = "security" | "quality" | "performance" | "best_practices";

/**
 * Fixed category order used for sequential execution, merging and reporting.
 * DO NOT reorder - reports and merged rows depend on it.
 */
export const CATEGORY_ORDER: readonly Category[] = ["security", "quality", "performance", "best_practices"];

/**
 * Severity of a finding, lowest first.
 */
export type Severity = "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";

export const SEVERITIES: readonly Severity[] = ["LOW", "MEDIUM", "HIGH", "CRITICAL"];

export function isSeverity(value: unknown): value is Severity {
  return typeof value === "string" && SEVERITIES.some((severity) => severity === value);
}

export function isCategory(value: unknown): value is Category {
  return typeof value === "string" && CATEGORY_ORDER.some((category) => category === value);
}

/**
 * All supported rule IDs.
 * DO NOT rename existing IDs - suppression directives and config files refer to them.
 */
export type RuleId =
  // Security rules
  | "HARDCODED_PASSWORD"
  | "HARDCODED_API_KEY"
  | "HARDCODED_SECRET"
  | "HARDCODED_TOKEN"
  | "CLOUD_CREDENTIALS"
  | "SQL_INJECTION_FSTRING"
  | "SQL_INJECTION_TEMPLATE"
  | "SQL_INJECTION_FORMAT"
  | "SQL_INJECTION_CONCAT"
  | "SQL_INJECTION_CURSOR"
  | "DYNAMIC_EVAL"
  // Quality rules
  | "LONG_FUNCTION"
  | "LONG_LINE"
  | "MISSING_DOCSTRING"
  | "DUPLICATE_CODE"
  // Performance rules
  | "N_PLUS_ONE_QUERY"
  | "MISSING_INDEX"
  | "SELECT_STAR"
  | "NESTED_LOOP"
  | "MULTIPLE_CONNECTIONS"
  | "UNBOUNDED_FETCH"
  | "STRING_CONCAT_IN_LOOP"
  | "APPEND_IN_LOOP"
  // Best practice rules (python)
  | "PRINT_STATEMENT"
  | "BARE_EXCEPT"
  | "MUTABLE_DEFAULT"
  | "UNNECESSARY_PASS"
  | "LAMBDA_ASSIGNMENT"
  | "TYPE_COMPARISON"
  | "BOOLEAN_COMPARISON"
  | "LEN_CONDITIONAL"
  | "WILDCARD_IMPORT"
  | "MULTIPLE_STATEMENTS"
  // Best practice rules (any language)
  | "TODO_COMMENT"
  | "MAGIC_NUMBER"
  | "DEEP_NESTING"
  | "COMMENTED_CODE"
  | "INCONSISTENT_NAMING"
  | "VERY_LONG_FUNCTION";

/**
 * Category each rule reports under.
 */
export const RULE_CATEGORY: Record<RuleId, Category> = {
  HARDCODED_PASSWORD: "security",
  HARDCODED_API_KEY: "security",
  HARDCODED_SECRET: "security",
  HARDCODED_TOKEN: "security",
  CLOUD_CREDENTIALS: "security",
  SQL_INJECTION_FSTRING: "security",
  SQL_INJECTION_TEMPLATE: "security",
  SQL_INJECTION_FORMAT: "security",
  SQL_INJECTION_CONCAT: "security",
  SQL_INJECTION_CURSOR: "security",
  DYNAMIC_EVAL: "security",

  LONG_FUNCTION: "quality",
  LONG_LINE: "quality",
  MISSING_DOCSTRING: "quality",
  DUPLICATE_CODE: "quality",

  N_PLUS_ONE_QUERY: "performance",
  MISSING_INDEX: "performance",
  SELECT_STAR: "performance",
  NESTED_LOOP: "performance",
  MULTIPLE_CONNECTIONS: "performance",
  UNBOUNDED_FETCH: "performance",
  STRING_CONCAT_IN_LOOP: "performance",
  APPEND_IN_LOOP: "performance",

  PRINT_STATEMENT: "best_practices",
  BARE_EXCEPT: "best_practices",
  MUTABLE_DEFAULT: "best_practices",
  UNNECESSARY_PASS: "best_practices",
  LAMBDA_ASSIGNMENT: "best_practices",
  TYPE_COMPARISON: "best_practices",
  BOOLEAN_COMPARISON: "best_practices",
  LEN_CONDITIONAL: "best_practices",
  WILDCARD_IMPORT: "best_practices",
  MULTIPLE_STATEMENTS: "best_practices",
  TODO_COMMENT: "best_practices",
  MAGIC_NUMBER: "best_practices",
  DEEP_NESTING: "best_practices",
  COMMENTED_CODE: "best_practices",
  INCONSISTENT_NAMING: "best_practices",
  VERY_LONG_FUNCTION: "best_practices",
};

/**
 * Configuration for a single rule.
 * `severity` replaces the severity the rule table assigns.
 */
export interface RuleConfig {
  enabled?: boolean;
  severity?: Severity;
}

/**
 * A rule override that applies to specific file patterns.
 */
export interface RuleOverride {
  patterns: string[];
  rules: Partial<Record<RuleId, RuleConfig>>;
}

/**
 * Complete (resolved) rule configuration.
 */
export interface RequiredRuleConfig {
  enabled: boolean;
  severity?: Severity;
}

/**
 * Check if a string is a valid RuleId.
 */
export function isValidRuleId(id: string): id is RuleId {
  return Object.prototype.hasOwnProperty.call(RULE_CATEGORY, id);
}

/**
 * Every rule is enabled by default and keeps its table severity.
 */
export function defaultRuleConfig(): RequiredRuleConfig {
  return { enabled: true };
}
