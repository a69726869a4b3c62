/**
 * Finding store contract shared by the analyzers and the coordinator.
 */

import { Category, Severity, isCategory, isSeverity } from "../analysis/rules";

export type ColumnType = "integer" | "text" | "timestamp";

export interface ColumnDefinition {
  name: string;
  type: ColumnType;
}

/**
 * A row as written by an analyzer or by the merge step. `agent_type` is only
 * present in the merged-findings table.
 */
export interface FindingRow {
  submission_id: number;
  agent_type?: Category;
  issue_type: string;
  line_number: number;
  severity: Severity;
  description: string;
  suggested_fix: string;
}

/**
 * A row read back from a store. `id` and `created_at` are filled in by the store.
 */
export interface StoredFindingRow extends FindingRow {
  id: number;
  created_at: Date;
}

/**
 * Durable, append-only store keyed by submission id.
 *
 * Every table also gets an auto-increment `id` and a `created_at` timestamp
 * defaulting to now; callers never pass either.
 */
export interface FindingStore {
  /** Label used in logs and errors. Never contains credentials. */
  readonly label: string;

  /** Create the table if absent. Idempotent. */
  ensureSchema(table: string, columns: readonly ColumnDefinition[]): Promise<void>;

  /** Append rows. No uniqueness beyond the generated id. Returns rows appended. */
  insert(table: string, rows: readonly FindingRow[]): Promise<number>;

  /** Register a submission and return its id. Ids strictly increase. */
  newSubmissionId(filename: string, content: string): Promise<number>;

  /** Rows of one submission, in insertion order. */
  query(table: string, submissionId: number): Promise<StoredFindingRow[]>;

  ping(): Promise<void>;

  close(): Promise<void>;
}

export const FINDING_COLUMNS: readonly ColumnDefinition[] = [
  { name: "submission_id", type: "integer" },
  { name: "issue_type", type: "text" },
  { name: "line_number", type: "integer" },
  { name: "severity", type: "text" },
  { name: "description", type: "text" },
  { name: "suggested_fix", type: "text" },
];

export const MERGED_FINDING_COLUMNS: readonly ColumnDefinition[] = [
  { name: "submission_id", type: "integer" },
  { name: "agent_type", type: "text" },
  { name: "issue_type", type: "text" },
  { name: "line_number", type: "integer" },
  { name: "severity", type: "text" },
  { name: "description", type: "text" },
  { name: "suggested_fix", type: "text" },
];

export const MERGED_FINDINGS_TABLE = "merged_findings";
export const SUBMISSIONS_TABLE = "code_submissions";

export function findingsTable(category: Category): string {
  return `${category}_findings`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function toInteger(value: unknown): number | null {
  const n = typeof value === "string" ? Number(value) : value;
  return typeof n === "number" && Number.isInteger(n) ? n : null;
}

/**
 * Validate a row read back from a backend. Backends hand rows over untyped
 * (pg result rows, JSON from Redis), so every field is checked here.
 */
export function parseStoredRow(value: unknown): StoredFindingRow {
  if (!isRecord(value)) {
    throw new Error("Stored finding row is not an object");
  }

  const id = toInteger(value.id);
  const submissionId = toInteger(value.submission_id);
  const lineNumber = toInteger(value.line_number);
  const createdAt =
    value.created_at instanceof Date
      ? value.created_at
      : typeof value.created_at === "string"
        ? new Date(value.created_at)
        : null;

  if (id === null || submissionId === null || lineNumber === null || createdAt === null) {
    throw new Error("Stored finding row has invalid numeric or timestamp fields");
  }
  if (!isSeverity(value.severity)) {
    throw new Error(`Stored finding row has invalid severity: ${String(value.severity)}`);
  }
  if (
    typeof value.issue_type !== "string" ||
    typeof value.description !== "string" ||
    typeof value.suggested_fix !== "string"
  ) {
    throw new Error("Stored finding row has invalid text fields");
  }

  const row: StoredFindingRow = {
    id,
    submission_id: submissionId,
    issue_type: value.issue_type,
    line_number: lineNumber,
    severity: value.severity,
    description: value.description,
    suggested_fix: value.suggested_fix,
    created_at: createdAt,
  };
  if (value.agent_type !== undefined && value.agent_type !== null) {
    if (!isCategory(value.agent_type)) {
      throw new Error(`Stored finding row has invalid agent_type: ${String(value.agent_type)}`);
    }
    row.agent_type = value.agent_type;
  }
  return row;
}

const IDENTIFIER_PATTERN = /^[a-z_][a-z0-9_]*$/;

/**
 * Table and column names are interpolated into SQL and Redis keys, so they
 * must be plain lower-case identifiers.
 */
export function isSafeIdentifier(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name);
}

/**
 * Strip credentials from a store URL for use as a label.
 */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    parsed.username = "";
    parsed.password = "";
    return parsed.toString();
  } catch {
    return "<invalid url>";
  }
}
