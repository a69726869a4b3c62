/**
 * Rule tables and the evaluation loop shared by every analyzer.
 */

import { AnalyzerLogicError, describeError } from "../../errors";
import { Category } from "../rules";
import { detectLanguage, splitLines } from "../helpers";
import { SECURITY_RULES } from "./security";
import { QUALITY_RULES } from "./quality";
import { PERFORMANCE_RULES } from "./performance";
import { BEST_PRACTICE_RULES } from "./best-practices";
import { Finding, Rule, RuleHit, SourceFile } from "./types";

export type { Finding, Rule, RuleHit, SourceFile } from "./types";
export { lineRule } from "./types";
export { SECURITY_RULES } from "./security";
export { QUALITY_RULES } from "./quality";
export { PERFORMANCE_RULES } from "./performance";
export { BEST_PRACTICE_RULES } from "./best-practices";

export const RULE_TABLES: Record<Category, readonly Rule[]> = {
  security: SECURITY_RULES,
  quality: QUALITY_RULES,
  performance: PERFORMANCE_RULES,
  best_practices: BEST_PRACTICE_RULES,
};

export function createSourceFile(text: string, filename: string): SourceFile {
  return {
    filename,
    text,
    lines: splitLines(text),
    language: detectLanguage(filename),
  };
}

/**
 * Evaluate a rule table against a source file, in table order.
 *
 * A rule that throws is reported as an AnalyzerLogicError naming the rule.
 */
export function evaluateRules(category: Category, rules: readonly Rule[], file: SourceFile): Finding[] {
  const findings: Finding[] = [];

  for (const rule of rules) {
    if (rule.languages && !rule.languages.includes(file.language)) {
      continue;
    }

    let hits: RuleHit[];
    try {
      hits = rule.detect(file);
    } catch (err) {
      throw new AnalyzerLogicError(category, `Rule failed on ${file.filename}: ${describeError(err)}`, rule.id, err);
    }

    for (const hit of hits) {
      findings.push({
        category,
        kind: rule.id,
        issue: hit.issue ?? rule.issue,
        line: hit.line,
        snippet: hit.snippet,
        severity: rule.severity,
        remediation: hit.remediation ?? rule.remediation,
      });
    }
  }

  return findings;
}
