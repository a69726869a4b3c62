/**
 * PostgreSQL finding store.
 *
 * One pool per store URL. Tables are created on demand with
 * CREATE TABLE IF NOT EXISTS. Rows are appended with multi-row INSERTs of at
 * most INSERT_BATCH_ROWS rows; several statements share one transaction so a
 * call is written atomically.
 */

import { Pool } from "pg";
import { StoreConnectivityError, describeError } from "../errors";
import { logger } from "../logger";
import {
  ColumnDefinition,
  ColumnType,
  FindingRow,
  FindingStore,
  StoredFindingRow,
  SUBMISSIONS_TABLE,
  isSafeIdentifier,
  parseStoredRow,
  redactUrl,
} from "./types";

const SQL_TYPES: Record<ColumnType, string> = {
  integer: "INTEGER",
  text: "TEXT",
  timestamp: "TIMESTAMP",
};

// Postgres "undefined_table"
const UNDEFINED_TABLE = "42P01";

const ROW_COLUMNS = [
  "submission_id",
  "issue_type",
  "line_number",
  "severity",
  "description",
  "suggested_fix",
] as const;

// A statement carries at most 65535 bind parameters; 1000 rows of 7 columns stays well below
export const INSERT_BATCH_ROWS = 1000;

export interface InsertStatement {
  text: string;
  values: (string | number | null)[];
}

/**
 * Multi-row INSERT statements for `rows`, at most `batchRows` rows each.
 * The `agent_type` column is included when any row carries it.
 */
export function buildInsertStatements(
  table: string,
  rows: readonly FindingRow[],
  batchRows: number = INSERT_BATCH_ROWS
): InsertStatement[] {
  assertIdentifier(table);
  if (!Number.isInteger(batchRows) || batchRows < 1) {
    throw new Error(`Invalid batch size: ${batchRows}`);
  }

  const tagged = rows.some((row) => row.agent_type !== undefined);
  const columns: string[] = tagged ? ["submission_id", "agent_type", ...ROW_COLUMNS.slice(1)] : [...ROW_COLUMNS];

  const statements: InsertStatement[] = [];
  for (let offset = 0; offset < rows.length; offset += batchRows) {
    const values: (string | number | null)[] = [];
    const tuples = rows.slice(offset, offset + batchRows).map((row) => {
      const cells: (string | number | null)[] = [row.submission_id];
      if (tagged) {
        cells.push(row.agent_type ?? null);
      }
      cells.push(row.issue_type, row.line_number, row.severity, row.description, row.suggested_fix);

      const placeholders = cells.map((cell) => {
        values.push(cell);
        return `$${values.length}`;
      });
      return `(${placeholders.join(", ")})`;
    });
    statements.push({
      text: `INSERT INTO ${table} (${columns.join(", ")}) VALUES ${tuples.join(", ")}`,
      values,
    });
  }
  return statements;
}

function assertIdentifier(name: string): void {
  if (!isSafeIdentifier(name)) {
    throw new Error(`Invalid SQL identifier: ${name}`);
  }
}

function hasErrorCode(err: unknown, code: string): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === code;
}

export class PostgresFindingStore implements FindingStore {
  readonly label: string;
  private readonly pool: Pool;
  private submissionsReady: Promise<void> | null = null;

  constructor(connectionString: string) {
    this.label = redactUrl(connectionString);
    this.pool = new Pool({
      connectionString,
      connectionTimeoutMillis: 5000,
      max: 4,
    });
  }

  async ensureSchema(table: string, columns: readonly ColumnDefinition[]): Promise<void> {
    await this.run("ensureSchema", async () => {
      assertIdentifier(table);
      const columnSql = columns.map((column) => {
        assertIdentifier(column.name);
        return `${column.name} ${SQL_TYPES[column.type]}`;
      });
      await this.pool.query(
        `CREATE TABLE IF NOT EXISTS ${table} (
          id SERIAL PRIMARY KEY,
          ${columnSql.join(",\n          ")},
          created_at TIMESTAMP DEFAULT NOW()
        )`
      );
    });
  }

  async insert(table: string, rows: readonly FindingRow[]): Promise<number> {
    if (rows.length === 0) {
      return 0;
    }

    return this.run("insert", async () => {
      const statements = buildInsertStatements(table, rows);
      if (statements.length === 1) {
        const result = await this.pool.query(statements[0]);
        return result.rowCount ?? rows.length;
      }

      const client = await this.pool.connect();
      try {
        await client.query("BEGIN");
        let inserted = 0;
        for (const statement of statements) {
          const result = await client.query(statement);
          inserted += result.rowCount ?? 0;
        }
        await client.query("COMMIT");
        return inserted;
      } catch (err) {
        await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
          logger.warn("[Postgres] Rollback failed", { store: this.label, error: describeError(rollbackErr) });
        });
        throw err;
      } finally {
        client.release();
      }
    });
  }

  async newSubmissionId(filename: string, content: string): Promise<number> {
    return this.run("newSubmissionId", async () => {
      if (!this.submissionsReady) {
        this.submissionsReady = this.pool
          .query(
            `CREATE TABLE IF NOT EXISTS ${SUBMISSIONS_TABLE} (
              id SERIAL PRIMARY KEY,
              filename TEXT,
              code_content TEXT,
              created_at TIMESTAMP DEFAULT NOW()
            )`
          )
          .then(() => undefined);
      }
      try {
        await this.submissionsReady;
      } catch (err) {
        this.submissionsReady = null;
        throw err;
      }

      const result = await this.pool.query(
        `INSERT INTO ${SUBMISSIONS_TABLE} (filename, code_content) VALUES ($1, $2) RETURNING id`,
        [filename, content]
      );
      const id = Number(result.rows[0]?.id);
      if (!Number.isInteger(id)) {
        throw new Error("INSERT ... RETURNING id returned no id");
      }
      return id;
    });
  }

  async query(table: string, submissionId: number): Promise<StoredFindingRow[]> {
    return this.run("query", async () => {
      assertIdentifier(table);
      try {
        const result = await this.pool.query(`SELECT * FROM ${table} WHERE submission_id = $1 ORDER BY id`, [
          submissionId,
        ]);
        return result.rows.map(parseStoredRow);
      } catch (err) {
        if (hasErrorCode(err, UNDEFINED_TABLE)) {
          return [];
        }
        throw err;
      }
    });
  }

  async ping(): Promise<void> {
    await this.run("ping", async () => {
      await this.pool.query("SELECT 1");
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StoreConnectivityError(this.label, operation, err);
    }
  }
}
