import { Finding } from "../src/analysis/detectors";
import { buildReport, rebuildReport, summarizeFailure } from "../src/analysis/report";
import { AnalyzerLogicError } from "../src/errors";
import { MemoryFindingStore } from "../src/store/memory";
import { MERGED_FINDING_COLUMNS, MERGED_FINDINGS_TABLE } from "../src/store/types";

const secret: Finding = {
  category: "security",
  kind: "HARDCODED_SECRET",
  issue: "Hardcoded secret",
  line: 3,
  snippet: 'secret = "test-secret"',
  severity: "HIGH",
  remediation: "Load secrets from the environment",
};

const longLine: Finding = {
  category: "quality",
  kind: "LONG_LINE",
  issue: "Line too long",
  line: 7,
  snippet: "x = 1",
  severity: "LOW",
  remediation: "Wrap the line",
};

describe("buildReport", () => {
  it("should count every category and total them", () => {
    const report = buildReport({
      submissionId: 4,
      filename: "app.py",
      mode: "sequential",
      findings: { security: [secret], quality: [longLine, longLine], performance: [], best_practices: [] },
    });

    expect(report.submissionId).toBe(4);
    expect(report.filename).toBe("app.py");
    expect(report.categories.security).toEqual({ count: 1, issues: [secret] });
    expect(report.categories.quality.count).toBe(2);
    expect(report.categories.performance).toEqual({ count: 0, issues: [] });
    expect(report.totalIssues).toBe(3);
    expect(report.complete).toBe(true);
    expect(report.failures).toEqual([]);
  });

  it("should report zero issues for categories without findings", () => {
    const report = buildReport({
      submissionId: 1,
      filename: "app.py",
      mode: "forked",
      findings: { security: [secret] },
      failures: [{ category: "quality", error: new Error("timeout") }],
    });

    expect(report.categories.quality).toEqual({ count: 0, issues: [] });
    expect(report.categories.best_practices).toEqual({ count: 0, issues: [] });
    expect(report.totalIssues).toBe(1);
    expect(report.complete).toBe(false);
    expect(report.failures).toEqual([{ category: "quality", code: "UNKNOWN_ERROR", message: "timeout" }]);
  });
});

describe("summarizeFailure", () => {
  it("should carry the error code of codesweep errors", () => {
    const summary = summarizeFailure({
      category: "performance",
      error: new AnalyzerLogicError("performance", "bad input", "N_PLUS_ONE_QUERY"),
    });

    expect(summary).toEqual({
      category: "performance",
      code: "ANALYZER_LOGIC_ERROR",
      message: "[performance:N_PLUS_ONE_QUERY] bad input",
    });
  });

  it("should describe non-error values", () => {
    expect(summarizeFailure({ category: "security", error: "offline" }).message).toBe("offline");
  });
});

describe("rebuildReport", () => {
  it("should group merged rows by agent type", async () => {
    const store = new MemoryFindingStore();
    await store.ensureSchema(MERGED_FINDINGS_TABLE, MERGED_FINDING_COLUMNS);
    await store.insert(MERGED_FINDINGS_TABLE, [
      {
        submission_id: 2,
        issue_type: "Hardcoded secret",
        line_number: 3,
        severity: "HIGH",
        description: 'secret = "test-secret"',
        suggested_fix: "Load secrets from the environment",
        agent_type: "security",
      },
      {
        submission_id: 2,
        issue_type: "Line too long",
        line_number: 7,
        severity: "LOW",
        description: "x = 1",
        suggested_fix: "Wrap the line",
        agent_type: "quality",
      },
      {
        submission_id: 3,
        issue_type: "Line too long",
        line_number: 1,
        severity: "LOW",
        description: "y = 2",
        suggested_fix: "Wrap the line",
        agent_type: "quality",
      },
    ]);

    const totals = await rebuildReport(store, 2);

    expect(totals.submissionId).toBe(2);
    expect(totals.totalIssues).toBe(2);
    expect(totals.categories.security.issues).toEqual([
      {
        category: "security",
        issue: "Hardcoded secret",
        line: 3,
        snippet: 'secret = "test-secret"',
        severity: "HIGH",
        remediation: "Load secrets from the environment",
      },
    ]);
    expect(totals.categories.quality.count).toBe(1);
    expect(totals.categories.performance.count).toBe(0);
  });

  it("should return empty totals when nothing was merged", async () => {
    const totals = await rebuildReport(new MemoryFindingStore(), 9);

    expect(totals.totalIssues).toBe(0);
    expect(totals.categories.security).toEqual({ count: 0, issues: [] });
  });
});
