/**
 * In-process finding store.
 *
 * Behaves like the SQL backends: inserting into a table that was never
 * created fails, ids are per-table sequences starting at 1.
 */

import { StoreConnectivityError } from "../errors";
import {
  ColumnDefinition,
  FindingRow,
  FindingStore,
  StoredFindingRow,
  isSafeIdentifier,
} from "./types";

interface MemoryTable {
  columns: readonly ColumnDefinition[];
  rows: StoredFindingRow[];
  nextId: number;
}

export interface SubmissionRecord {
  id: number;
  filename: string;
  content: string;
  createdAt: Date;
}

export class MemoryFindingStore implements FindingStore {
  private readonly tables = new Map<string, MemoryTable>();
  private readonly submissions: SubmissionRecord[] = [];
  private closed = false;

  constructor(public readonly label: string = "memory://default") {}

  async ensureSchema(table: string, columns: readonly ColumnDefinition[]): Promise<void> {
    this.assertOpen("ensureSchema");
    if (!isSafeIdentifier(table)) {
      throw new StoreConnectivityError(this.label, "ensureSchema", new Error(`Invalid table name: ${table}`));
    }
    if (!this.tables.has(table)) {
      this.tables.set(table, { columns: [...columns], rows: [], nextId: 1 });
    }
  }

  async insert(table: string, rows: readonly FindingRow[]): Promise<number> {
    this.assertOpen("insert");
    const target = this.tables.get(table);
    if (!target) {
      throw new StoreConnectivityError(this.label, "insert", new Error(`relation "${table}" does not exist`));
    }
    for (const row of rows) {
      target.rows.push({ ...row, id: target.nextId++, created_at: new Date() });
    }
    return rows.length;
  }

  async newSubmissionId(filename: string, content: string): Promise<number> {
    this.assertOpen("newSubmissionId");
    const id = this.submissions.length + 1;
    this.submissions.push({ id, filename, content, createdAt: new Date() });
    return id;
  }

  async query(table: string, submissionId: number): Promise<StoredFindingRow[]> {
    this.assertOpen("query");
    const target = this.tables.get(table);
    if (!target) {
      return [];
    }
    return target.rows.filter((row) => row.submission_id === submissionId).map((row) => ({ ...row }));
  }

  async ping(): Promise<void> {
    this.assertOpen("ping");
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /**
   * Whether `ensureSchema` has created the table.
   */
  hasTable(table: string): boolean {
    return this.tables.has(table);
  }

  getSubmission(id: number): SubmissionRecord | undefined {
    return this.submissions.find((submission) => submission.id === id);
  }

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new StoreConnectivityError(this.label, operation, new Error("store is closed"));
    }
  }
}
