/**
 * Tests for the security rule table.
 */

import { RuleAnalyzer } from "../src/analysis/analyzer";
import { SEVERITIES } from "../src/analysis/rules";
import { MemoryFindingStore } from "../src/store/memory";

const SECRET_FIX = "Use environment variables or secret management system";
const INJECTION_FIX = "Use parameterized queries with placeholders";

function analyze(text: string, filename = "app.py") {
  return new RuleAnalyzer("security", new MemoryFindingStore()).analyze(text, filename);
}

describe("Security analyzer", () => {
  describe("hardcoded secrets", () => {
    it("should report a hardcoded password on its line", () => {
      const findings = analyze('import os\npassword = "admin123"\n');

      expect(findings).toEqual([
        {
          category: "security",
          kind: "HARDCODED_PASSWORD",
          issue: "Hardcoded password",
          line: 2,
          snippet: 'password = "admin123"',
          severity: "HIGH",
          remediation: SECRET_FIX,
        },
      ]);
    });

    it("should match assignments case-insensitively", () => {
      const findings = analyze('DB_PASSWORD = "test-secret"');

      expect(findings.map((f) => f.kind)).toEqual(["HARDCODED_PASSWORD"]);
    });

    it("should report every pattern that matches a line", () => {
      const findings = analyze('api_key = "k"; token = "t"');

      expect(findings.map((f) => [f.kind, f.line])).toEqual([
        ["HARDCODED_API_KEY", 1],
        ["HARDCODED_TOKEN", 1],
      ]);
    });

    it("should report cloud credential references", () => {
      const findings = analyze("aws_access_key_id = os.environ.get(name)");

      expect(findings.map((f) => f.kind)).toEqual(["CLOUD_CREDENTIALS"]);
      expect(findings[0].issue).toBe("AWS credentials");
    });

    it("should not flag secrets read from the environment", () => {
      expect(analyze('password = os.environ["DB_PASSWORD"]')).toEqual([]);
    });
  });

  describe("SQL injection", () => {
    it("should detect f-string interpolation into execute", () => {
      const findings = analyze('cursor.execute(f"SELECT * FROM users WHERE id = {user_id}")');

      expect(findings).toHaveLength(1);
      expect(findings[0]).toMatchObject({
        kind: "SQL_INJECTION_FSTRING",
        issue: "SQL injection via f-string",
        severity: "CRITICAL",
        remediation: INJECTION_FIX,
      });
    });

    it("should detect template literal interpolation into execute", () => {
      const findings = analyze("db.execute(`SELECT * FROM t WHERE id = ${id}`)", "repo.ts");

      expect(findings.map((f) => f.kind)).toEqual(["SQL_INJECTION_TEMPLATE"]);
    });

    it("should detect %-formatting feeding execute", () => {
      const findings = analyze('cursor.execute("SELECT * FROM t WHERE id = %s" % user_id)');

      expect(findings.map((f) => f.kind)).toEqual(["SQL_INJECTION_FORMAT"]);
    });

    it("should detect concatenation in execute and cursor.execute", () => {
      const findings = analyze(`cursor.execute("SELECT * FROM users WHERE name = '" + name + "'")`);

      expect(findings.map((f) => f.kind)).toEqual(["SQL_INJECTION_CONCAT", "SQL_INJECTION_CURSOR"]);
      expect(findings.every((f) => f.severity === "CRITICAL")).toBe(true);
    });

    it("should not flag parameterized queries", () => {
      expect(analyze('cursor.execute("SELECT * FROM users WHERE id = %s", (user_id,))')).toEqual([]);
    });
  });

  describe("dynamic evaluation", () => {
    it("should name the primitive in the issue and remediation", () => {
      const findings = analyze("result = eval(expression)");

      expect(findings).toEqual([
        {
          category: "security",
          kind: "DYNAMIC_EVAL",
          issue: "Dangerous function: eval()",
          line: 1,
          snippet: "result = eval(expression)",
          severity: "HIGH",
          remediation: "Avoid using eval() - find safer alternatives",
        },
      ]);
    });

    it("should detect __import__ and exec", () => {
      const findings = analyze("mod = __import__(name)\nexec(code)\n");

      expect(findings.map((f) => f.issue)).toEqual(["Dangerous function: __import__()", "Dangerous function: exec()"]);
    });

    it("should report every primitive called on the same line", () => {
      const findings = analyze("exec(eval(payload))");

      expect(findings.map((f) => [f.issue, f.line, f.snippet])).toEqual([
        ["Dangerous function: eval()", 1, "exec(eval(payload))"],
        ["Dangerous function: exec()", 1, "exec(eval(payload))"],
      ]);
    });

    it("should not confuse execute() with exec()", () => {
      expect(analyze("cursor.execute(query)")).toEqual([]);
    });
  });

  it("should order findings by rule, then by line", () => {
    const findings = analyze('token = "abc"\npassword = "hunter2"\n');

    expect(findings.map((f) => [f.kind, f.line])).toEqual([
      ["HARDCODED_PASSWORD", 2],
      ["HARDCODED_TOKEN", 1],
    ]);
  });

  it("should truncate long snippets to 200 characters", () => {
    const line = `password = "${"a".repeat(250)}"`;
    const [finding] = analyze(line);

    expect(finding.snippet).toBe(`${line.substring(0, 200)}...`);
  });

  it("should only use the four severities", () => {
    const findings = analyze(
      [
        'password = "x"',
        'cursor.execute(f"DELETE FROM t WHERE id = {i}")',
        "eval(payload)",
        'secret = "y"',
      ].join("\n")
    );

    expect(findings).toHaveLength(4);
    for (const finding of findings) {
      expect(SEVERITIES).toContain(finding.severity);
    }
  });
});
