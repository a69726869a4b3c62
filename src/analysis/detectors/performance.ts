/**
 * Performance rule table.
 *
 * Window-based heuristics: queries issued from inside loops, nested loops,
 * repeated connection setup, unbounded result sets and accumulation inside
 * loops.
 */

import {
  APPEND_CALL_PATTERNS,
  APPEND_WINDOW,
  CONNECTION_CALL_PATTERN,
  EXECUTE_CALL_PATTERN,
  FILTER_OPERATOR_PATTERNS,
  NESTED_LOOP_WINDOW,
  N_PLUS_ONE_WINDOW,
  PRIMARY_KEY_PREDICATE_PATTERN,
  QUERY_KEYWORDS,
  SELECT_STAR_PATTERN,
  STRING_CONCAT_PATTERN,
  STRING_CONCAT_WINDOW,
  STRING_HINT_PATTERNS,
  UNBOUNDED_FETCH_PATTERN,
  WHERE_CLAUSE_PATTERN,
  matchesAnyPattern,
} from "../patterns";
import { hasLoopAbove, indentationOf, isLoopOpening } from "../helpers";
import { Rule, RuleHit, SourceFile, lineRule } from "./types";

/**
 * A loop line followed within N_PLUS_ONE_WINDOW lines by a query-like call.
 */
function issuesQueryInLoop(line: string, index: number, file: SourceFile): boolean {
  if (!isLoopOpening(line)) {
    return false;
  }
  const following = file.lines.slice(index + 1, index + 1 + N_PLUS_ONE_WINDOW);
  return following.some((next) => {
    const lower = next.toLowerCase();
    return QUERY_KEYWORDS.some((keyword) => lower.includes(keyword));
  });
}

function needsIndex(line: string): boolean {
  return (
    WHERE_CLAUSE_PATTERN.test(line) &&
    matchesAnyPattern(line, FILTER_OPERATOR_PATTERNS) &&
    !PRIMARY_KEY_PREDICATE_PATTERN.test(line) &&
    EXECUTE_CALL_PATTERN.test(line)
  );
}

/**
 * Every loop line is remembered with its indentation. A loop indented deeper
 * than an earlier loop less than NESTED_LOOP_WINDOW lines above it is nested.
 */
function detectNestedLoops(file: SourceFile): RuleHit[] {
  const hits: RuleHit[] = [];
  const loops: { line: number; indent: number }[] = [];

  file.lines.forEach((line, index) => {
    if (!isLoopOpening(line)) {
      return;
    }
    const lineNumber = index + 1;
    const indent = indentationOf(line);

    const enclosing = loops.find((prev) => indent > prev.indent && lineNumber - prev.line < NESTED_LOOP_WINDOW);
    if (enclosing) {
      hits.push({ line: lineNumber, snippet: line.trim() });
    }
    loops.push({ line: lineNumber, indent });
  });

  return hits;
}

function detectRepeatedConnections(file: SourceFile): RuleHit[] {
  const count = file.lines.filter((line) => CONNECTION_CALL_PATTERN.test(line)).length;
  if (count <= 1) {
    return [];
  }
  return [
    {
      line: 1,
      snippet: `Found ${count} separate connection calls`,
      issue: `Multiple connection calls detected (${count})`,
    },
  ];
}

export const PERFORMANCE_RULES: readonly Rule[] = [
  lineRule({
    id: "N_PLUS_ONE_QUERY",
    issue: "Potential N+1 query problem",
    severity: "HIGH",
    remediation: "Move query outside loop or use batch query with JOIN",
    test: issuesQueryInLoop,
  }),
  lineRule({
    id: "MISSING_INDEX",
    issue: "Query might benefit from index",
    severity: "MEDIUM",
    remediation: "Consider adding database index on queried columns",
    test: needsIndex,
  }),
  lineRule({
    id: "SELECT_STAR",
    issue: "SELECT * fetches unnecessary data",
    severity: "MEDIUM",
    remediation: "Specify only needed columns instead of SELECT *",
    test: SELECT_STAR_PATTERN,
  }),
  {
    id: "NESTED_LOOP",
    issue: "Nested loop detected (O(n²) complexity)",
    severity: "MEDIUM",
    remediation: "Consider using set/dict lookup or algorithm optimization",
    detect: detectNestedLoops,
  },
  {
    id: "MULTIPLE_CONNECTIONS",
    issue: "Multiple connection calls detected",
    severity: "HIGH",
    remediation: "Use connection pooling or context manager to reuse connections",
    detect: detectRepeatedConnections,
  },
  lineRule({
    id: "UNBOUNDED_FETCH",
    issue: "fetchall() loads all rows into memory",
    severity: "MEDIUM",
    remediation: "Use pagination (LIMIT/OFFSET) or fetchmany() for large datasets",
    test: UNBOUNDED_FETCH_PATTERN,
  }),
  lineRule({
    id: "STRING_CONCAT_IN_LOOP",
    issue: "String concatenation in loop",
    severity: "LOW",
    remediation: 'Use list.append() then "".join() for better performance',
    test: (line, index, file) =>
      line.includes(STRING_CONCAT_PATTERN) &&
      matchesAnyPattern(line, STRING_HINT_PATTERNS) &&
      hasLoopAbove(file.lines, index, STRING_CONCAT_WINDOW),
  }),
  lineRule({
    id: "APPEND_IN_LOOP",
    issue: "Consider list comprehension",
    severity: "LOW",
    remediation: "List comprehensions (or map/filter) are faster than append in loops",
    test: (line, index, file) =>
      matchesAnyPattern(line, APPEND_CALL_PATTERNS) && hasLoopAbove(file.lines, index, APPEND_WINDOW),
  }),
];
