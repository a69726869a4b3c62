/**
 * Quality rule table: long functions, long lines, missing documentation
 * and verbatim duplication.
 */

import {
  DOCSTRING_MARKERS,
  DOCSTRING_WINDOW,
  DUPLICATE_MIN_LENGTH,
  DUPLICATE_MIN_OCCURRENCES,
  DUPLICATE_SNIPPET_LENGTH,
  LONG_FUNCTION_THRESHOLD,
  LONG_LINE_SNIPPET_LENGTH,
  MAX_LINE_LENGTH,
} from "../patterns";
import { findFunctionSpans, isBlank, isCommentLine, matchDefinition } from "../helpers";
import { Rule, RuleHit, SourceFile, lineRule } from "./types";

/**
 * A docstring opens in the lines right after the signature, or a block
 * comment closes on the last non-blank line before it.
 */
function hasDocumentation(lines: readonly string[], index: number): boolean {
  const following = lines.slice(index + 1, index + 1 + DOCSTRING_WINDOW);
  if (following.some((line) => DOCSTRING_MARKERS.some((marker) => line.includes(marker)))) {
    return true;
  }

  for (let i = index - 1; i >= 0; i--) {
    if (!isBlank(lines[i])) {
      return lines[i].trim().endsWith("*/");
    }
  }
  return false;
}

function detectDuplicates(file: SourceFile): RuleHit[] {
  const occurrences = new Map<string, number[]>();

  file.lines.forEach((line, index) => {
    const stripped = line.trim();
    if (stripped.length <= DUPLICATE_MIN_LENGTH || isCommentLine(stripped)) {
      return;
    }
    const seen = occurrences.get(stripped);
    if (seen) {
      seen.push(index + 1);
    } else {
      occurrences.set(stripped, [index + 1]);
    }
  });

  const hits: RuleHit[] = [];
  for (const [text, lineNumbers] of occurrences) {
    if (lineNumbers.length >= DUPLICATE_MIN_OCCURRENCES) {
      hits.push({
        line: lineNumbers[0],
        snippet: `Repeated ${lineNumbers.length} times: ${text.substring(0, DUPLICATE_SNIPPET_LENGTH)}...`,
      });
    }
  }
  return hits;
}

export const QUALITY_RULES: readonly Rule[] = [
  {
    id: "LONG_FUNCTION",
    issue: "Long function",
    severity: "MEDIUM",
    remediation: "Break into smaller, focused functions",
    detect: (file) =>
      findFunctionSpans(file.lines)
        .filter((span) => span.length > LONG_FUNCTION_THRESHOLD)
        .map((span) => ({
          line: span.startLine,
          snippet: `Function is ${span.length} lines long`,
          issue: `Long function: ${span.name}()`,
        })),
  },
  lineRule({
    id: "LONG_LINE",
    issue: "Line too long",
    severity: "LOW",
    remediation: `Break into multiple lines (keep lines under ${MAX_LINE_LENGTH} characters)`,
    test: (line) => line.length > MAX_LINE_LENGTH,
    snippet: (line) => `${line.substring(0, LONG_LINE_SNIPPET_LENGTH)}...`,
  }),
  lineRule({
    id: "MISSING_DOCSTRING",
    issue: "Missing docstring",
    severity: "LOW",
    remediation: "Add docstring to explain function purpose",
    test: (line, index, file) => matchDefinition(line) !== null && !hasDocumentation(file.lines, index),
  }),
  {
    id: "DUPLICATE_CODE",
    issue: "Duplicate code detected",
    severity: "MEDIUM",
    remediation: "Extract into a reusable function",
    detect: detectDuplicates,
  },
];
