/**
 * Types for the rule tables and the findings they produce.
 */

import { Category, RuleId, Severity } from "../rules";
import { Language, Pattern, matchesPattern } from "../patterns";
import { truncateSnippet } from "../helpers";

export type { Category, Severity } from "../rules";

/**
 * One reported defect. Findings are value objects: never updated, only created.
 */
export interface Finding {
  category: Category;
  /** Stable rule id, used by config files and suppression directives. */
  kind: RuleId;
  /** Human-readable issue label, persisted as `issue_type`. */
  issue: string;
  /** 1-based line number; file-scoped findings use line 1. */
  line: number;
  /** Offending text, trimmed and truncated. */
  snippet: string;
  severity: Severity;
  remediation: string;
}

/**
 * The text under analysis, split once and shared by every rule.
 */
export interface SourceFile {
  filename: string;
  text: string;
  lines: readonly string[];
  language: Language;
}

/**
 * A single rule match. `issue` and `remediation` override the rule's defaults.
 */
export interface RuleHit {
  line: number;
  snippet: string;
  issue?: string;
  remediation?: string;
}

/**
 * A declarative detection rule. Severity is fixed per rule.
 */
export interface Rule {
  id: RuleId;
  issue: string;
  severity: Severity;
  remediation: string;
  /** Restrict the rule to these languages. Applies to every language when omitted. */
  languages?: readonly Language[];
  detect(file: SourceFile): RuleHit[];
}

/**
 * Per-line predicate. Receives the 0-based line index for look-behind/look-ahead windows.
 */
export type LinePredicate = (line: string, index: number, file: SourceFile) => boolean;

export interface LineRuleDefinition extends Omit<Rule, "detect"> {
  test: Pattern | LinePredicate;
  /** Defaults to the trimmed line. */
  snippet?: (line: string) => string;
  /** Per-hit label, e.g. to name the matched primitive. */
  describe?: (line: string) => Pick<RuleHit, "issue" | "remediation">;
}

/**
 * Build a rule that is evaluated independently on every line, top to bottom.
 */
export function lineRule(definition: LineRuleDefinition): Rule {
  const { test, snippet, describe, ...rule } = definition;

  return {
    ...rule,
    detect(file: SourceFile): RuleHit[] {
      const hits: RuleHit[] = [];

      file.lines.forEach((line, index) => {
        const matched = typeof test === "function" ? test(line, index, file) : matchesPattern(line, test);
        if (!matched) {
          return;
        }
        hits.push({
          line: index + 1,
          snippet: snippet ? snippet(line) : truncateSnippet(line.trim()),
          ...(describe ? describe(line) : {}),
        });
      });

      return hits;
    },
  };
}
