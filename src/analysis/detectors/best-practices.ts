/**
 * Best-practice rule table.
 *
 * Python idiom rules apply only when the filename says the text is python;
 * the general rules apply to every language.
 */

import {
  BARE_EXCEPT_PATTERN,
  BOOLEAN_COMPARISON_PATTERN,
  CAMEL_CASE_PATTERN,
  COMMENTED_CODE_MIN_RUN,
  COMMENTED_CODE_PATTERN,
  INDENT_WIDTH,
  LAMBDA_ASSIGNMENT_PATTERN,
  LEN_CONDITIONAL_PATTERN,
  Language,
  MAGIC_NUMBER_EXCLUSIONS,
  MAGIC_NUMBER_PATTERN,
  MAX_NESTING_LEVEL,
  MUTABLE_DEFAULT_PATTERN,
  NAMED_CONSTANT_PATTERN,
  NAMING_STYLE_THRESHOLD,
  SNAKE_CASE_PATTERN,
  TODO_PATTERN,
  TYPE_COMPARISON_PATTERN,
  VERY_LONG_FUNCTION_THRESHOLD,
  WILDCARD_IMPORT_PATTERN,
  matchesAnyPattern,
} from "../patterns";
import { findFunctionSpans, indentationOf, isBlank, truncateSnippet } from "../helpers";
import { Rule, RuleHit, SourceFile, lineRule } from "./types";

const PYTHON: readonly Language[] = ["python"];
const HASH_COMMENT_LANGUAGES: readonly Language[] = ["python", "ruby"];

/**
 * The code part of a line, with any trailing comment removed.
 */
function codePart(line: string, language: Language): string {
  let code = line;
  if (language === "unknown" || HASH_COMMENT_LANGUAGES.includes(language)) {
    code = code.split("#")[0];
  }
  if (!HASH_COMMENT_LANGUAGES.includes(language)) {
    code = code.split("//")[0];
  }
  return code;
}

function hasMagicNumber(line: string, _index: number, file: SourceFile): boolean {
  const code = codePart(line, file.language);
  if (!MAGIC_NUMBER_PATTERN.test(code)) {
    return false;
  }
  return !matchesAnyPattern(code, MAGIC_NUMBER_EXCLUSIONS) && !NAMED_CONSTANT_PATTERN.test(code);
}

function detectDeepNesting(file: SourceFile): RuleHit[] {
  for (let i = 0; i < file.lines.length; i++) {
    const line = file.lines[i];
    if (isBlank(line)) {
      continue;
    }
    const level = Math.floor(indentationOf(line) / INDENT_WIDTH);
    if (level > MAX_NESTING_LEVEL) {
      return [{ line: i + 1, snippet: truncateSnippet(line.trim()), issue: `Deeply nested code (${level} levels)` }];
    }
  }
  return [];
}

/**
 * Body of a `#` or `//` comment line, or null for any other line.
 */
function commentBody(line: string): string | null {
  const trimmed = line.trim();
  if (trimmed.length <= 3) {
    return null;
  }
  const match = /^(?:#+|\/\/+)(.*)$/.exec(trimmed);
  return match ? match[1] : null;
}

function detectCommentedCode(file: SourceFile): RuleHit[] {
  let run = 0;

  for (let i = 0; i < file.lines.length; i++) {
    const body = commentBody(file.lines[i]);
    run = body !== null && COMMENTED_CODE_PATTERN.test(body) ? run + 1 : 0;

    if (run >= COMMENTED_CODE_MIN_RUN) {
      return [{ line: i + 1 - (COMMENTED_CODE_MIN_RUN - 1), snippet: "Multiple lines of commented code" }];
    }
  }
  return [];
}

function detectMixedNaming(file: SourceFile): RuleHit[] {
  const camel = (file.text.match(CAMEL_CASE_PATTERN) ?? []).length;
  const snake = (file.text.match(SNAKE_CASE_PATTERN) ?? []).length;

  if (Math.min(camel, snake) <= NAMING_STYLE_THRESHOLD) {
    return [];
  }
  return [{ line: 1, snippet: `Mixed camelCase (${camel}) and snake_case (${snake})` }];
}

export const BEST_PRACTICE_RULES: readonly Rule[] = [
  // Python idioms
  lineRule({
    id: "PRINT_STATEMENT",
    issue: "Print statement in production code",
    severity: "LOW",
    remediation: "Use logging module instead of print() for production code",
    languages: PYTHON,
    test: (line, _index, file) => {
      const stripped = line.trim();
      return (
        stripped.includes("print(") &&
        !stripped.startsWith("#") &&
        !stripped.toLowerCase().includes("debug") &&
        !file.text.includes("__main__")
      );
    },
  }),
  lineRule({
    id: "BARE_EXCEPT",
    issue: "Bare except clause catches all exceptions",
    severity: "MEDIUM",
    remediation: "Specify exception types (e.g., except ValueError:) or use except Exception:",
    languages: PYTHON,
    test: BARE_EXCEPT_PATTERN,
  }),
  lineRule({
    id: "MUTABLE_DEFAULT",
    issue: "Mutable default argument",
    severity: "HIGH",
    remediation: "Use None as default and initialize inside function: def func(arg=None): arg = arg or []",
    languages: PYTHON,
    test: (line) => line.includes("def ") && MUTABLE_DEFAULT_PATTERN.test(line),
  }),
  lineRule({
    id: "UNNECESSARY_PASS",
    issue: "Unnecessary pass statement",
    severity: "LOW",
    remediation: "Consider removing or adding a comment explaining why it's empty",
    languages: PYTHON,
    test: (line, index, file) => {
      if (line.trim() !== "pass" || index === 0) {
        return false;
      }
      const previous = file.lines[index - 1];
      return !previous.includes("except") && !previous.includes("class");
    },
  }),
  lineRule({
    id: "LAMBDA_ASSIGNMENT",
    issue: "Lambda assignment should be a function",
    severity: "MEDIUM",
    remediation: "Use def instead of assigning lambda to a variable",
    languages: PYTHON,
    test: LAMBDA_ASSIGNMENT_PATTERN,
  }),
  lineRule({
    id: "TYPE_COMPARISON",
    issue: "Using type() for type checking",
    severity: "MEDIUM",
    remediation: "Use isinstance() instead of type() == for type checking",
    languages: PYTHON,
    test: TYPE_COMPARISON_PATTERN,
  }),
  lineRule({
    id: "BOOLEAN_COMPARISON",
    issue: "Explicit boolean comparison",
    severity: "LOW",
    remediation: 'Use "if variable:" instead of "if variable == True:"',
    languages: PYTHON,
    test: BOOLEAN_COMPARISON_PATTERN,
  }),
  lineRule({
    id: "LEN_CONDITIONAL",
    issue: "Using len() in conditional",
    severity: "LOW",
    remediation: 'Use "if collection:" instead of "if len(collection) > 0:"',
    languages: PYTHON,
    test: LEN_CONDITIONAL_PATTERN,
  }),
  lineRule({
    id: "WILDCARD_IMPORT",
    issue: "Wildcard import",
    severity: "MEDIUM",
    remediation: 'Import specific items or use "import module" instead of "from module import *"',
    languages: PYTHON,
    test: WILDCARD_IMPORT_PATTERN,
  }),
  lineRule({
    id: "MULTIPLE_STATEMENTS",
    issue: "Multiple statements on one line",
    severity: "LOW",
    remediation: "Put each statement on its own line for better readability",
    languages: PYTHON,
    test: (line) => {
      const stripped = line.trim();
      return stripped.includes(";") && !stripped.startsWith("#");
    },
  }),

  // Any language
  lineRule({
    id: "TODO_COMMENT",
    issue: "TODO/FIXME comment found",
    severity: "LOW",
    remediation: "Address the TODO or create a tracked issue for it",
    test: TODO_PATTERN,
  }),
  lineRule({
    id: "MAGIC_NUMBER",
    issue: "Magic number detected",
    severity: "LOW",
    remediation: "Define magic numbers as named constants for better maintainability",
    test: hasMagicNumber,
  }),
  {
    id: "DEEP_NESTING",
    issue: "Deeply nested code",
    severity: "MEDIUM",
    remediation: "Refactor to reduce nesting (extract methods, use early returns)",
    detect: detectDeepNesting,
  },
  {
    id: "COMMENTED_CODE",
    issue: "Large block of commented-out code",
    severity: "LOW",
    remediation: "Remove commented code (use version control instead)",
    detect: detectCommentedCode,
  },
  {
    id: "INCONSISTENT_NAMING",
    issue: "Inconsistent naming convention",
    severity: "LOW",
    remediation: "Use one naming convention throughout the file",
    detect: detectMixedNaming,
  },
  {
    id: "VERY_LONG_FUNCTION",
    issue: "Very long function",
    severity: "MEDIUM",
    remediation: "Break down into smaller, focused functions following Single Responsibility Principle",
    detect: (file) =>
      findFunctionSpans(file.lines)
        .filter((span) => span.length > VERY_LONG_FUNCTION_THRESHOLD)
        .map((span) => ({
          line: 1,
          snippet: `Function exceeds ${VERY_LONG_FUNCTION_THRESHOLD} lines`,
          issue: `Function "${span.name}" is very long (${span.length} lines)`,
        })),
  },
];
