/**
 * Inline suppression directives.
 *
 * Recognized in any comment syntax:
 * - codesweep-ignore-file ALL|RULE_ID[,RULE_ID...]
 * - codesweep-ignore-line ALL|RULE_ID[,RULE_ID...]
 * - codesweep-ignore-next-line ALL|RULE_ID[,RULE_ID...]
 */

import { RuleId, isValidRuleId } from "../analysis/rules";
import { splitLines } from "../analysis/helpers";

export type SuppressionScope = "file" | "line" | "next-line";

export interface SuppressionDirective {
  scope: SuppressionScope;
  /** True for `ALL`; `rules` is then empty. */
  allRules: boolean;
  rules: RuleId[];
  /** 1-based line of the directive. */
  line: number;
}

function toScope(value: string): SuppressionScope | null {
  switch (value.toLowerCase()) {
    case "file":
      return "file";
    case "line":
      return "line";
    case "next-line":
      return "next-line";
    default:
      return null;
  }
}

export function parseSuppressionDirectives(source: string): SuppressionDirective[] {
  const directives: SuppressionDirective[] = [];
  const lines = splitLines(source);

  lines.forEach((text, index) => {
    // fresh regex per line: the global flag carries lastIndex
    const directiveRegex = /codesweep-ignore-(file|next-line|line)\s+([A-Z0-9_,\s]+)/gi;

    let match: RegExpExecArray | null;
    while ((match = directiveRegex.exec(text)) !== null) {
      const scope = toScope(match[1]);
      if (!scope) {
        continue;
      }

      const tokens = match[2]
        .split(/[,\s]+/)
        .map((token) => token.trim())
        .filter((token) => token.length > 0);

      if (tokens.some((token) => token.toUpperCase() === "ALL")) {
        directives.push({ scope, allRules: true, rules: [], line: index + 1 });
        continue;
      }

      const rules = tokens.filter(isValidRuleId);
      if (rules.length > 0) {
        directives.push({ scope, allRules: false, rules, line: index + 1 });
      }
    }
  });

  return directives;
}

export function isSuppressed(ruleId: RuleId, line: number, directives: readonly SuppressionDirective[]): boolean {
  return directives.some((directive) => {
    if (!directive.allRules && !directive.rules.includes(ruleId)) {
      return false;
    }
    switch (directive.scope) {
      case "file":
        return true;
      case "line":
        return directive.line === line;
      case "next-line":
        return directive.line + 1 === line;
    }
  });
}

/**
 * Drop findings suppressed by directives in the same source text.
 */
export function filterSuppressedFindings<T extends { kind: RuleId; line: number }>(
  findings: readonly T[],
  directives: readonly SuppressionDirective[]
): T[] {
  if (directives.length === 0) {
    return [...findings];
  }
  return findings.filter((finding) => !isSuppressed(finding.kind, finding.line, directives));
}
