/**
 * Tests for the quality rule table and function span detection.
 */

import { RuleAnalyzer } from "../src/analysis/analyzer";
import { findFunctionSpans, splitLines } from "../src/analysis/helpers";
import { MemoryFindingStore } from "../src/store/memory";

function analyze(text: string, filename = "module.py") {
  return new RuleAnalyzer("quality", new MemoryFindingStore()).analyze(text, filename);
}

describe("findFunctionSpans", () => {
  it("should close a span at the next column-0 line", () => {
    const spans = findFunctionSpans(splitLines("def a():\n    return 1\n\nvalue = a()\n"));

    expect(spans).toEqual([{ name: "a", startLine: 1, length: 3 }]);
  });

  it("should close a span at the next definition", () => {
    const spans = findFunctionSpans(splitLines("def a():\n    pass\ndef b():\n    pass\n"));

    expect(spans).toEqual([
      { name: "a", startLine: 1, length: 2 },
      { name: "b", startLine: 3, length: 2 },
    ]);
  });

  it("should recognise JavaScript function declarations", () => {
    const spans = findFunctionSpans(splitLines("export async function load(id) {\n  return id;\n}\n"));

    expect(spans).toEqual([{ name: "load", startLine: 1, length: 2 }]);
  });
});

describe("Quality analyzer", () => {
  it("should report a long undocumented function", () => {
    const text = ["def process_items(items):", ...Array<string>(59).fill("    step()")].join("\n") + "\n";

    expect(analyze(text)).toEqual([
      {
        category: "quality",
        kind: "LONG_FUNCTION",
        issue: "Long function: process_items()",
        line: 1,
        snippet: "Function is 60 lines long",
        severity: "MEDIUM",
        remediation: "Break into smaller, focused functions",
      },
      {
        category: "quality",
        kind: "MISSING_DOCSTRING",
        issue: "Missing docstring",
        line: 1,
        snippet: "def process_items(items):",
        severity: "LOW",
        remediation: "Add docstring to explain function purpose",
      },
    ]);
  });

  it("should not report functions of 50 lines or fewer", () => {
    const text = ["def short():", '    """Fits."""', ...Array<string>(48).fill("    step()")].join("\n");

    expect(analyze(text)).toEqual([]);
  });

  it("should accept a docstring within three lines of the signature", () => {
    expect(analyze('def add(a, b):\n    """Add two numbers."""\n    return a + b\n')).toEqual([]);
  });

  it("should accept a block comment closing right above the definition", () => {
    const text = "/**\n * Adds.\n */\nfunction add(a, b) {\n  return a + b;\n}\n";

    expect(analyze(text, "math.js")).toEqual([]);
  });

  it("should report lines longer than 120 characters", () => {
    const findings = analyze(`${"x".repeat(121)}\n${"y".repeat(120)}\n`, "notes.txt");

    expect(findings).toEqual([
      {
        category: "quality",
        kind: "LONG_LINE",
        issue: "Line too long",
        line: 1,
        snippet: `${"x".repeat(80)}...`,
        severity: "LOW",
        remediation: "Break into multiple lines (keep lines under 120 characters)",
      },
    ]);
  });

  describe("duplicate code", () => {
    it("should report a line repeated three times at its first occurrence", () => {
      const text = [
        "result = compute_total(order)",
        "x = 1",
        "result = compute_total(order)",
        "y = 2",
        "    result = compute_total(order)",
      ].join("\n");

      expect(analyze(text)).toEqual([
        {
          category: "quality",
          kind: "DUPLICATE_CODE",
          issue: "Duplicate code detected",
          line: 1,
          snippet: "Repeated 3 times: result = compute_total(order)...",
          severity: "MEDIUM",
          remediation: "Extract into a reusable function",
        },
      ]);
    });

    it("should ignore comments, short lines and pairs", () => {
      const text = [
        "# this comment is long enough to count",
        "# this comment is long enough to count",
        "# this comment is long enough to count",
        "short = 1",
        "short = 1",
        "short = 1",
        "total = total + compute(value)",
        "total = total + compute(value)",
      ].join("\n");

      expect(analyze(text)).toEqual([]);
    });
  });
});
