/**
 * Pattern constants and thresholds for the line-oriented detection rules.
 *
 * Patterns can be either:
 * - string: Simple substring matching
 * - RegExp: Flexible matching with whitespace tolerance
 *
 * Use the matchesPattern() helper to check content against patterns.
 * Patterns handed to matchesPattern() must not carry the `g` flag: test() on
 * a global regex is stateful and would break the purity of analyze().
 */

// Snippets longer than this are cut and suffixed with "..."
export const MAX_SNIPPET_LENGTH = 200;

// Pattern type that supports both string and RegExp
export type Pattern = string | RegExp;

/**
 * Check if content matches a pattern (string or RegExp).
 * For strings, uses includes(). For RegExp, uses test().
 */
export function matchesPattern(content: string, pattern: Pattern): boolean {
  if (typeof pattern === "string") {
    return content.includes(pattern);
  }
  return pattern.test(content);
}

/**
 * Check if content matches any pattern in the array.
 */
export function matchesAnyPattern(content: string, patterns: readonly Pattern[]): boolean {
  return patterns.some((pattern) => matchesPattern(content, pattern));
}

// ============================================================================
// Shared structure patterns
// ============================================================================

// Loop-opening lines: `for x in`, `for (`, `while cond`, `.forEach(`
export const LOOP_PATTERNS: Pattern[] = [/\b(?:for|while)\s*[\s(]/, /\.forEach\s*\(/];

// Function definition lines; capture group 1 is the function name
export const DEFINITION_PATTERNS: RegExp[] = [
  /^\s*(?:async\s+)?def\s+(\w+)\s*\(/,
  /^\s*(?:export\s+)?(?:default\s+)?(?:async\s+)?function\s*\*?\s*(\w+)\s*\(/,
];

// Comment line prefixes recognised across languages
export const COMMENT_PREFIXES = ["#", "//", "/*", "*"];

// ============================================================================
// Security
// ============================================================================

export const HARDCODED_PASSWORD_PATTERN = /password\s*=\s*["'][^"']+["']/i;
export const HARDCODED_API_KEY_PATTERN = /api[_-]?key\s*=\s*["'][^"']+["']/i;
export const HARDCODED_SECRET_PATTERN = /secret\s*=\s*["'][^"']+["']/i;
export const HARDCODED_TOKEN_PATTERN = /token\s*=\s*["'][^"']+["']/i;
export const CLOUD_CREDENTIALS_PATTERN = /aws[_-]?access[_-]?key/i;

export const SQL_FSTRING_PATTERN = /execute\s*\(\s*f["'].*\{.*\}.*["']/;
export const SQL_TEMPLATE_PATTERN = /execute\s*\(\s*`.*\$\{.*\}.*`/;
export const SQL_FORMAT_PATTERN = /execute\s*\(\s*["'].*%s.*["'].*%/;
export const SQL_CONCAT_PATTERN = /execute\s*\(\s*.+\s*\+\s*.+\)/;
export const SQL_CURSOR_PATTERN = /cursor\.execute\s*\([^,]+\+/;

// Dynamic evaluation primitives, each checked on its own: one line can call several
export const DYNAMIC_EVAL_PRIMITIVES: { name: string; pattern: RegExp }[] = [
  { name: "eval", pattern: /\beval\s*\(/ },
  { name: "exec", pattern: /\bexec\s*\(/ },
  { name: "__import__", pattern: /\b__import__\s*\(/ },
];

// ============================================================================
// Quality
// ============================================================================

export const LONG_FUNCTION_THRESHOLD = 50;
export const MAX_LINE_LENGTH = 120;
export const LONG_LINE_SNIPPET_LENGTH = 80;
export const DOCSTRING_WINDOW = 3;
export const DOCSTRING_MARKERS = ['"""', "'''"];
export const DUPLICATE_MIN_LENGTH = 20;
export const DUPLICATE_MIN_OCCURRENCES = 3;
export const DUPLICATE_SNIPPET_LENGTH = 50;

// ============================================================================
// Performance
// ============================================================================

export const QUERY_KEYWORDS = ["execute", "query", "select", "fetch"];
export const N_PLUS_ONE_WINDOW = 4;

export const WHERE_CLAUSE_PATTERN = /\bwhere\b/i;
export const FILTER_OPERATOR_PATTERNS: Pattern[] = ["=", /\bin\b/i, /\blike\b/i];
export const PRIMARY_KEY_PREDICATE_PATTERN = /\bwhere\s+id\b/i;
export const EXECUTE_CALL_PATTERN = /\bexecute\b/i;

export const SELECT_STAR_PATTERN = /select\s+\*\s+from/i;

export const NESTED_LOOP_WINDOW = 20;

export const CONNECTION_CALL_PATTERN = /connect\(/i;

export const UNBOUNDED_FETCH_PATTERN = /fetchall\s*\(\s*\)/i;

export const STRING_CONCAT_PATTERN = "+=";
export const STRING_HINT_PATTERNS: Pattern[] = [/str/i, /["'`]/];
export const STRING_CONCAT_WINDOW = 10;

export const APPEND_CALL_PATTERNS: Pattern[] = [".append(", ".push("];
export const APPEND_WINDOW = 3;

// ============================================================================
// Best practices
// ============================================================================

export type Language =
  | "python"
  | "javascript"
  | "typescript"
  | "java"
  | "go"
  | "ruby"
  | "cpp"
  | "c"
  | "unknown";

export const EXTENSION_LANGUAGES: Record<string, Language> = {
  py: "python",
  js: "javascript",
  ts: "typescript",
  java: "java",
  go: "go",
  rb: "ruby",
  cpp: "cpp",
  c: "c",
};

export const BARE_EXCEPT_PATTERN = /^\s*except\s*:/;
export const MUTABLE_DEFAULT_PATTERN = /=\s*\[\s*\]|=\s*\{\s*\}/;
export const LAMBDA_ASSIGNMENT_PATTERN = /^\s*\w+\s*=\s*lambda\s/;
export const TYPE_COMPARISON_PATTERN = /type\s*\([^)]+\)\s*==/;
export const BOOLEAN_COMPARISON_PATTERN = /==\s*(True|False)\b/;
export const LEN_CONDITIONAL_PATTERN = /if\s+len\s*\([^)]+\)\s*[><=]/;
export const WILDCARD_IMPORT_PATTERN = /from\s+[\w.]+\s+import\s+\*/;

export const TODO_PATTERN = /(?:#|\/\/|\/\*)\s*(TODO|FIXME|HACK|XXX)\b/i;

export const MAGIC_NUMBER_PATTERN = /\b(?!0\b|1\b|-1\b)\d{2,}\b/;
export const MAGIC_NUMBER_EXCLUSIONS: Pattern[] = ["range", "sleep"];
export const NAMED_CONSTANT_PATTERN = /^\s*(?:(?:export\s+)?(?:const|let|var|final|static)\s+)?[A-Z][A-Z0-9_]*\s*(?::[^=]+)?=/;

export const INDENT_WIDTH = 4;
export const MAX_NESTING_LEVEL = 4;

export const COMMENTED_CODE_PATTERN = /[=+\-*/(){}[\]]|def |class |import |if |for |while /;
export const COMMENTED_CODE_MIN_RUN = 3;

// Counted with String.match(), hence global
export const CAMEL_CASE_PATTERN = /\b[a-z]+[A-Z][a-zA-Z]*\b/g;
export const SNAKE_CASE_PATTERN = /\b[a-z]+_[a-z]+\b/g;
export const NAMING_STYLE_THRESHOLD = 3;

export const VERY_LONG_FUNCTION_THRESHOLD = 100;
