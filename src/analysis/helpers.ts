/**
 * Helper functions for line-oriented detection.
 *
 * These functions support the rule tables by providing line splitting,
 * indentation measurement, loop and function-boundary detection and
 * language detection. None of them keep state between calls.
 */

import {
  COMMENT_PREFIXES,
  DEFINITION_PATTERNS,
  EXTENSION_LANGUAGES,
  INDENT_WIDTH,
  Language,
  LOOP_PATTERNS,
  MAX_SNIPPET_LENGTH,
  matchesAnyPattern,
} from "./patterns";

/**
 * Split raw text into lines. Handles both LF and CRLF line endings.
 */
export function splitLines(text: string): string[] {
  return text.split("\n").map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

/**
 * Cut a snippet down to `max` characters, marking the cut with "...".
 */
export function truncateSnippet(text: string, max: number = MAX_SNIPPET_LENGTH): string {
  return text.length > max ? `${text.substring(0, max)}...` : text;
}

export function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

/**
 * Width of the leading whitespace of a line, counting a tab as INDENT_WIDTH columns.
 */
export function indentationOf(line: string): number {
  let width = 0;
  for (const ch of line) {
    if (ch === " ") {
      width += 1;
    } else if (ch === "\t") {
      width += INDENT_WIDTH;
    } else {
      break;
    }
  }
  return width;
}

/**
 * Check if a line opens a loop (`for`, `while`, `.forEach(`).
 */
export function isLoopOpening(line: string): boolean {
  return matchesAnyPattern(line, LOOP_PATTERNS);
}

/**
 * Check if any of the `windowSize` lines above `index` opens a loop.
 */
export function hasLoopAbove(lines: readonly string[], index: number, windowSize: number): boolean {
  const start = Math.max(0, index - windowSize);

  for (let i = start; i < index; i++) {
    if (isLoopOpening(lines[i])) {
      return true;
    }
  }
  return false;
}

/**
 * Check if a trimmed line is a comment in any of the supported syntaxes.
 */
export function isCommentLine(trimmed: string): boolean {
  return COMMENT_PREFIXES.some((prefix) => trimmed.startsWith(prefix));
}

/**
 * Detect the language of a file from its extension.
 */
export function detectLanguage(filename: string): Language {
  const dot = filename.lastIndexOf(".");
  if (dot === -1) {
    return "unknown";
  }
  const ext = filename.substring(dot + 1).toLowerCase();
  return Object.prototype.hasOwnProperty.call(EXTENSION_LANGUAGES, ext) ? EXTENSION_LANGUAGES[ext] : "unknown";
}

/**
 * Extract the function name from a definition line, or null if the line
 * does not define a function.
 */
export function matchDefinition(line: string): string | null {
  for (const pattern of DEFINITION_PATTERNS) {
    const match = pattern.exec(line);
    if (match) {
      return match[1];
    }
  }
  return null;
}

/**
 * A function found by indentation-reset boundary detection.
 */
export interface FunctionSpan {
  name: string;
  /** 1-based line of the definition. */
  startLine: number;
  /** Number of lines from the definition up to (not including) its terminator. */
  length: number;
}

/**
 * Find function spans by indentation reset.
 *
 * A definition line opens a span. The span closes at the next non-blank line
 * at column 0 that is not itself a definition, at the next definition line,
 * or at the end of the text (after the last non-blank line).
 */
export function findFunctionSpans(lines: readonly string[]): FunctionSpan[] {
  const spans: FunctionSpan[] = [];
  let current: { name: string; startLine: number } | null = null;
  let lastNonBlank = 0;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const lineNumber = i + 1;
    const name = matchDefinition(line);

    if (name !== null) {
      if (current) {
        spans.push({ name: current.name, startLine: current.startLine, length: lineNumber - current.startLine });
      }
      current = { name, startLine: lineNumber };
    } else if (current && !isBlank(line) && indentationOf(line) === 0) {
      spans.push({ name: current.name, startLine: current.startLine, length: lineNumber - current.startLine });
      current = null;
    }

    if (!isBlank(line)) {
      lastNonBlank = lineNumber;
    }
  }

  if (current) {
    spans.push({ name: current.name, startLine: current.startLine, length: lastNonBlank - current.startLine + 1 });
  }

  return spans;
}
