/**
 * Tests for the analyzer contract: purity, persistence and config filtering.
 */

import { RuleAnalyzer } from "../src/analysis/analyzer";
import { Rule } from "../src/analysis/detectors";
import { CATEGORY_ORDER } from "../src/analysis/rules";
import { loadConfigFromString } from "../src/config/loader";
import { AnalyzerLogicError } from "../src/errors";
import { MemoryFindingStore } from "../src/store/memory";

const SAMPLE = [
  "import os",
  'password = "admin123"',
  "",
  "def load_users(ids):",
  "    for user_id in ids:",
  '        cursor.execute("SELECT * FROM users WHERE email = " + user_id)',
  "    try:",
  "        return cursor.fetchall()",
  "    except:",
  "        return []",
].join("\n");

describe("RuleAnalyzer", () => {
  describe("analyze", () => {
    it.each(CATEGORY_ORDER)("should return identical findings for identical input (%s)", (category) => {
      const analyzer = new RuleAnalyzer(category, new MemoryFindingStore());

      const first = analyzer.analyze(SAMPLE, "users.py");
      const second = analyzer.analyze(SAMPLE, "users.py");

      expect(first.length).toBeGreaterThan(0);
      expect(second).toEqual(first);
    });

    it("should tag every finding with the analyzer's category", () => {
      const analyzer = new RuleAnalyzer("performance", new MemoryFindingStore());

      const findings = analyzer.analyze(SAMPLE, "users.py");

      expect(new Set(findings.map((f) => f.category))).toEqual(new Set(["performance"]));
    });

    it("should reject text containing NUL characters", () => {
      const analyzer = new RuleAnalyzer("security", new MemoryFindingStore());

      expect(() => analyzer.analyze("abc\u0000def", "blob.bin")).toThrow(AnalyzerLogicError);
    });

    it("should wrap a failing rule in AnalyzerLogicError naming the rule", () => {
      const broken: Rule = {
        id: "LONG_LINE",
        issue: "Line too long",
        severity: "LOW",
        remediation: "n/a",
        detect: () => {
          throw new Error("boom");
        },
      };
      const analyzer = new RuleAnalyzer("quality", new MemoryFindingStore(), { rules: [broken] });

      let caught: unknown;
      try {
        analyzer.analyze("x = 1", "a.py");
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(AnalyzerLogicError);
      expect(caught).toMatchObject({ category: "quality", ruleId: "LONG_LINE", code: "ANALYZER_LOGIC_ERROR" });
    });
  });

  describe("persist", () => {
    it("should create the category table and append one row per finding", async () => {
      const store = new MemoryFindingStore();
      const analyzer = new RuleAnalyzer("security", store);
      const findings = analyzer.analyze('password = "admin123"', "app.py");

      const count = await analyzer.persist(findings, 7);

      expect(count).toBe(1);
      const rows = await store.query("security_findings", 7);
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({
        id: 1,
        submission_id: 7,
        issue_type: "Hardcoded password",
        line_number: 1,
        severity: "HIGH",
        description: 'password = "admin123"',
        suggested_fix: "Use environment variables or secret management system",
      });
      expect(rows[0].created_at).toBeInstanceOf(Date);
    });

    it("should append duplicate rows when persisted twice", async () => {
      const store = new MemoryFindingStore();
      const analyzer = new RuleAnalyzer("security", store);
      const findings = analyzer.analyze('password = "admin123"\ntoken = "abc"\n', "app.py");

      await analyzer.persist(findings, 3);
      await analyzer.persist(findings, 3);

      const rows = await store.query("security_findings", 3);
      expect(rows.map((row) => row.id)).toEqual([1, 2, 3, 4]);
      expect(rows.map((row) => row.issue_type)).toEqual([
        "Hardcoded password",
        "Hardcoded token",
        "Hardcoded password",
        "Hardcoded token",
      ]);
    });

    it("should create the table even with nothing to persist", async () => {
      const store = new MemoryFindingStore();
      const analyzer = new RuleAnalyzer("quality", store);

      await expect(analyzer.persist([], 1)).resolves.toBe(0);
      expect(store.hasTable("quality_findings")).toBe(true);
    });
  });

  describe("rule configuration", () => {
    const text = 'password = "admin123"';

    it("should drop findings of disabled rules", () => {
      const config = loadConfigFromString("rules:\n  HARDCODED_PASSWORD:\n    enabled: false\n");
      const analyzer = new RuleAnalyzer("security", new MemoryFindingStore(), { config });

      expect(analyzer.analyze(text, "app.py")).toEqual([]);
    });

    it("should apply severity overrides", () => {
      const config = loadConfigFromString("rules:\n  HARDCODED_PASSWORD:\n    severity: critical\n");
      const analyzer = new RuleAnalyzer("security", new MemoryFindingStore(), { config });

      expect(analyzer.analyze(text, "app.py").map((f) => f.severity)).toEqual(["CRITICAL"]);
    });

    it("should skip ignored files", () => {
      const config = loadConfigFromString('files:\n  ignore:\n    - "vendor/**"\n');
      const analyzer = new RuleAnalyzer("security", new MemoryFindingStore(), { config });

      expect(analyzer.analyze(text, "vendor/lib.py")).toEqual([]);
      expect(analyzer.analyze(text, "app.py")).toHaveLength(1);
    });

    it("should apply path overrides only to matching files", () => {
      const config = loadConfigFromString(
        ["overrides:", '  - patterns: ["tests/**"]', "    rules:", "      HARDCODED_PASSWORD:", "        enabled: false"].join(
          "\n"
        )
      );
      const analyzer = new RuleAnalyzer("security", new MemoryFindingStore(), { config });

      expect(analyzer.analyze(text, "tests/test_login.py")).toEqual([]);
      expect(analyzer.analyze(text, "app/login.py")).toHaveLength(1);
    });
  });

  describe("suppression directives", () => {
    const analyzer = new RuleAnalyzer("security", new MemoryFindingStore());

    it("should honour ignore-line", () => {
      expect(analyzer.analyze('password = "x"  # codesweep-ignore-line HARDCODED_PASSWORD', "a.py")).toEqual([]);
    });

    it("should honour ignore-next-line", () => {
      const text = '# codesweep-ignore-next-line HARDCODED_PASSWORD\npassword = "x"\ntoken = "y"\n';

      expect(analyzer.analyze(text, "a.py").map((f) => f.kind)).toEqual(["HARDCODED_TOKEN"]);
    });

    it("should honour ignore-file ALL", () => {
      const text = '# codesweep-ignore-file ALL\npassword = "x"\neval(code)\n';

      expect(analyzer.analyze(text, "a.py")).toEqual([]);
    });

    it("should leave other rules on a suppressed line alone", () => {
      const text = 'api_key = "k"; token = "t"  // codesweep-ignore-line HARDCODED_TOKEN';

      expect(analyzer.analyze(text, "a.js").map((f) => f.kind)).toEqual(["HARDCODED_API_KEY"]);
    });
  });
});
