/**
 * Report assembly: per-category counts and findings plus the grand total.
 */

import { AnalyzerFailure, CodesweepError, describeError } from "../errors";
import { FindingStore, MERGED_FINDINGS_TABLE, StoredFindingRow } from "../store/types";
import { Finding } from "./detectors";
import { ExecutionMode } from "./events";
import { CATEGORY_ORDER, Category } from "./rules";

/**
 * A finding as reported. Rebuilt reports carry no rule id: the merged table
 * does not store it.
 */
export type ReportIssue = Omit<Finding, "kind"> & Partial<Pick<Finding, "kind">>;

export interface CategorySummary {
  count: number;
  issues: ReportIssue[];
}

export interface ReportTotals {
  submissionId: number;
  categories: Record<Category, CategorySummary>;
  /** Always the sum of the four category counts. */
  totalIssues: number;
}

export interface AnalyzerFailureSummary {
  category: Category;
  code: string;
  message: string;
}

export interface Report extends ReportTotals {
  filename: string;
  mode: ExecutionMode;
  /** False only under the best-effort policy when an analyzer failed. */
  complete: boolean;
  failures: AnalyzerFailureSummary[];
}

export function summarizeFailure(failure: AnalyzerFailure): AnalyzerFailureSummary {
  return {
    category: failure.category,
    code: failure.error instanceof CodesweepError ? failure.error.code : "UNKNOWN_ERROR",
    message: describeError(failure.error),
  };
}

function summarize(
  submissionId: number,
  issuesFor: (category: Category) => ReportIssue[]
): ReportTotals {
  const summaryOf = (category: Category): CategorySummary => {
    const issues = issuesFor(category);
    return { count: issues.length, issues };
  };
  const categories: Record<Category, CategorySummary> = {
    security: summaryOf("security"),
    quality: summaryOf("quality"),
    performance: summaryOf("performance"),
    best_practices: summaryOf("best_practices"),
  };
  const totalIssues = CATEGORY_ORDER.reduce((sum, category) => sum + categories[category].count, 0);
  return { submissionId, categories, totalIssues };
}

/**
 * Assemble the report of a submission. Categories missing from `findings`
 * (failed analyzers) report zero issues.
 */
export function buildReport(input: {
  submissionId: number;
  filename: string;
  mode: ExecutionMode;
  findings: Partial<Record<Category, readonly Finding[]>>;
  failures?: readonly AnalyzerFailure[];
}): Report {
  const failures = (input.failures ?? []).map(summarizeFailure);
  return {
    ...summarize(input.submissionId, (category) => [...(input.findings[category] ?? [])]),
    filename: input.filename,
    mode: input.mode,
    complete: failures.length === 0,
    failures,
  };
}

function rowToIssue(row: StoredFindingRow, category: Category): ReportIssue {
  return {
    category,
    issue: row.issue_type,
    line: row.line_number,
    snippet: row.description,
    severity: row.severity,
    remediation: row.suggested_fix,
  };
}

/**
 * Rebuild the totals of a submission from its merged-findings rows.
 */
export async function rebuildReport(store: FindingStore, submissionId: number): Promise<ReportTotals> {
  const rows = await store.query(MERGED_FINDINGS_TABLE, submissionId);
  return summarize(submissionId, (category) =>
    rows.filter((row) => row.agent_type === category).map((row) => rowToIssue(row, category))
  );
}
