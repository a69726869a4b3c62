/**
 * Tests for rule configuration, suppression directives and coordinator config.
 */

import * as fs from "fs";
import * as path from "path";
import { loadConfig, loadConfigFromString, createDefaultConfig, parseConfig } from "../src/config/loader";
import { parseSuppressionDirectives, isSuppressed } from "../src/config/suppression";
import { resolveCoordinatorConfig } from "../src/config/coordinator";
import { ConfigurationError } from "../src/errors";

const FIXTURES_DIR = path.join(__dirname, "fixtures/codesweep-config");

describe("Config Loading", () => {
  describe("loadConfig", () => {
    it("should load config from .codesweep.yml", () => {
      const config = loadConfig(FIXTURES_DIR);

      expect(config.raw.version).toBe(1);
      expect(config.raw.rules?.MAGIC_NUMBER).toEqual({ enabled: false });
      expect(config.raw.rules?.LONG_LINE).toEqual({ severity: "MEDIUM" });
    });

    it("should drop unknown rule ids and invalid values", () => {
      const config = loadConfig(FIXTURES_DIR);

      expect(Object.keys(config.raw.rules ?? {})).toEqual(["MAGIC_NUMBER", "LONG_LINE", "TODO_COMMENT"]);
      expect(config.raw.rules?.TODO_COMMENT).toEqual({});
    });

    it("should return defaults when no config file exists", () => {
      const config = loadConfig("/nonexistent/path");

      expect(config.raw).toEqual({ version: 1, rules: {}, files: { ignore: [] }, overrides: [] });
      expect(config.getRuleConfig("MAGIC_NUMBER")).toEqual({ enabled: true });
    });
  });

  describe("createDefaultConfig", () => {
    it("should enable every rule and ignore nothing", () => {
      const config = createDefaultConfig();

      expect(config.getRuleConfig("HARDCODED_PASSWORD")).toEqual({ enabled: true });
      expect(config.isFileIgnored("vendor/lib.py")).toBe(false);
    });
  });

  describe("loadConfigFromString", () => {
    it("should fall back to defaults on invalid YAML", () => {
      const config = loadConfigFromString("rules: [unclosed");

      expect(config.raw.rules).toEqual({});
    });

    it("should fall back to defaults when the root is not a mapping", () => {
      const config = loadConfigFromString("- just\n- a list\n");

      expect(config.raw.overrides).toEqual([]);
    });

    it("should read unsupported versions as version 1", () => {
      expect(parseConfig({ version: 3 }).version).toBe(1);
    });

    it("should drop overrides without patterns", () => {
      const config = parseConfig({
        overrides: [{ rules: { LONG_LINE: { enabled: false } } }, { patterns: ["a/**"], rules: {} }],
      });

      expect(config.overrides).toEqual([{ patterns: ["a/**"], rules: {} }]);
    });
  });
});

describe("File Filtering", () => {
  it("should match ignore globs against filenames", () => {
    const config = loadConfig(FIXTURES_DIR);

    expect(config.isFileIgnored("vendor/jquery.js")).toBe(true);
    expect(config.isFileIgnored("static/app.min.js")).toBe(true);
    expect(config.isFileIgnored("src/app.js")).toBe(false);
  });

  it("should normalise Windows separators", () => {
    const config = loadConfig(FIXTURES_DIR);

    expect(config.isFileIgnored("vendor\\lib\\util.py")).toBe(true);
  });
});

describe("Rule Configuration", () => {
  it("should merge defaults, rules and overrides in order", () => {
    const config = loadConfig(FIXTURES_DIR);

    expect(config.getRuleConfig("LONG_LINE")).toEqual({ enabled: true, severity: "MEDIUM" });
    expect(config.getRuleConfig("LONG_LINE", "tests/test_app.py")).toEqual({ enabled: true, severity: "LOW" });
    expect(config.getRuleConfig("HARDCODED_PASSWORD", "tests/test_app.py")).toEqual({ enabled: false });
    expect(config.getRuleConfig("HARDCODED_PASSWORD", "src/app.py")).toEqual({ enabled: true });
  });
});

describe("Suppression Directives", () => {
  describe("parseSuppressionDirectives", () => {
    it("should parse every scope from the fixture", () => {
      const source = fs.readFileSync(path.join(FIXTURES_DIR, "sample_with_suppressions.py"), "utf-8");

      expect(parseSuppressionDirectives(source)).toEqual([
        { scope: "file", allRules: false, rules: ["TODO_COMMENT"], line: 1 },
        { scope: "line", allRules: false, rules: ["HARDCODED_PASSWORD"], line: 6 },
        { scope: "next-line", allRules: false, rules: ["HARDCODED_TOKEN"], line: 8 },
      ]);
    });

    it("should accept comma-separated rule lists", () => {
      const directives = parseSuppressionDirectives("// codesweep-ignore-line SELECT_STAR,UNBOUNDED_FETCH");

      expect(directives).toEqual([
        { scope: "line", allRules: false, rules: ["SELECT_STAR", "UNBOUNDED_FETCH"], line: 1 },
      ]);
    });

    it("should skip directives naming only unknown rules", () => {
      expect(parseSuppressionDirectives("# codesweep-ignore-line NOT_A_RULE")).toEqual([]);
    });

    it("should treat ALL case-insensitively", () => {
      expect(parseSuppressionDirectives("/* codesweep-ignore-file all */")).toEqual([
        { scope: "file", allRules: true, rules: [], line: 1 },
      ]);
    });
  });

  describe("isSuppressed", () => {
    const directives = parseSuppressionDirectives(
      ["# codesweep-ignore-next-line LONG_LINE", "x = 1", "y = 2  # codesweep-ignore-line MAGIC_NUMBER"].join("\n")
    );

    it("should apply next-line directives to the following line only", () => {
      expect(isSuppressed("LONG_LINE", 2, directives)).toBe(true);
      expect(isSuppressed("LONG_LINE", 3, directives)).toBe(false);
    });

    it("should apply line directives to their own line only", () => {
      expect(isSuppressed("MAGIC_NUMBER", 3, directives)).toBe(true);
      expect(isSuppressed("MAGIC_NUMBER", 2, directives)).toBe(false);
    });

    it("should not suppress other rules", () => {
      expect(isSuppressed("HARDCODED_PASSWORD", 2, directives)).toBe(false);
    });
  });
});

describe("resolveCoordinatorConfig", () => {
  it("should require DATABASE_URL", () => {
    expect(() => resolveCoordinatorConfig({})).toThrow(ConfigurationError);
  });

  it("should use the fallback primary URL when DATABASE_URL is unset", () => {
    expect(resolveCoordinatorConfig({}, "memory://cli").primaryStoreUrl).toBe("memory://cli");
  });

  it("should read fork URLs and default to all-or-nothing", () => {
    const config = resolveCoordinatorConfig({
      DATABASE_URL: "postgres://localhost/main",
      SECURITY_FORK_URL: "postgres://localhost/security",
      QUALITY_FORK_URL: "postgres://localhost/quality",
      PERFORMANCE_FORK_URL: "  ",
    });

    expect(config).toEqual({
      primaryStoreUrl: "postgres://localhost/main",
      forks: {
        security: "postgres://localhost/security",
        quality: "postgres://localhost/quality",
      },
      partialFailurePolicy: "all-or-nothing",
    });
  });

  it("should accept best-effort and reject unknown policies", () => {
    const base = { DATABASE_URL: "memory://main" };

    expect(resolveCoordinatorConfig({ ...base, PARTIAL_FAILURE_POLICY: "best-effort" }).partialFailurePolicy).toBe(
      "best-effort"
    );
    expect(() => resolveCoordinatorConfig({ ...base, PARTIAL_FAILURE_POLICY: "sometimes" })).toThrow(
      ConfigurationError
    );
  });

  it("should reject an unsupported fork store scheme before any store is opened", () => {
    expect(() =>
      resolveCoordinatorConfig({
        DATABASE_URL: "memory://main",
        SECURITY_FORK_URL: "mysql://db/findings",
        QUALITY_FORK_URL: "memory://quality",
      })
    ).toThrow('Unsupported store scheme "mysql:" in mysql://db/findings');
  });

  it("should reject an unsupported or malformed primary store URL", () => {
    expect(() => resolveCoordinatorConfig({ DATABASE_URL: "mongodb://db/main" })).toThrow(ConfigurationError);
    expect(() => resolveCoordinatorConfig({ DATABASE_URL: "not a url" })).toThrow("Invalid store URL: <invalid url>");
  });
});
