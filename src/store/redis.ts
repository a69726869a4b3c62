/**
 * Redis finding store.
 *
 * Key layout (all under the `codesweep:` prefix):
 *   schema:<table>               hash of column name -> type
 *   <table>:seq                  row id sequence
 *   <table>:rows:<submissionId>  list of JSON rows, in insertion order
 *   submissions:seq              submission id sequence
 *   submission:<id>              hash with filename, content and created_at
 */

import Redis, { ChainableCommander } from "ioredis";
import { logger } from "../logger";
import { StoreConnectivityError } from "../errors";
import {
  ColumnDefinition,
  FindingRow,
  FindingStore,
  StoredFindingRow,
  isSafeIdentifier,
  parseStoredRow,
  redactUrl,
} from "./types";

const KEY_PREFIX = "codesweep:";

function schemaKey(table: string): string {
  return `${KEY_PREFIX}schema:${table}`;
}

function sequenceKey(table: string): string {
  return `${KEY_PREFIX}${table}:seq`;
}

function rowsKey(table: string, submissionId: number): string {
  return `${KEY_PREFIX}${table}:rows:${submissionId}`;
}

export class RedisFindingStore implements FindingStore {
  readonly label: string;
  private readonly client: Redis;

  constructor(url: string) {
    this.label = redactUrl(url);
    this.client = new Redis(url, {
      lazyConnect: true,
      maxRetriesPerRequest: 3,
      retryStrategy: (times) => {
        if (times > 3) {
          logger.error("[Redis] Max retries reached", { store: this.label });
          return null;
        }
        return Math.min(times * 1000, 5000);
      },
    });

    this.client.on("connect", () => {
      logger.debug("[Redis] Connected", { store: this.label });
    });

    this.client.on("error", (err: Error) => {
      logger.error("[Redis] Error", { store: this.label, error: err.message });
    });
  }

  async ensureSchema(table: string, columns: readonly ColumnDefinition[]): Promise<void> {
    await this.run("ensureSchema", async () => {
      this.assertIdentifier(table);
      const key = schemaKey(table);
      // HSETNX per column keeps the first definition, like CREATE TABLE IF NOT EXISTS
      const pipeline = this.client.pipeline();
      for (const column of columns) {
        pipeline.hsetnx(key, column.name, column.type);
      }
      pipeline.hsetnx(key, "created_at", "timestamp");
      await this.exec(pipeline);
    });
  }

  async insert(table: string, rows: readonly FindingRow[]): Promise<number> {
    if (rows.length === 0) {
      return 0;
    }

    return this.run("insert", async () => {
      this.assertIdentifier(table);
      const exists = await this.client.exists(schemaKey(table));
      if (exists === 0) {
        throw new Error(`relation "${table}" does not exist`);
      }

      const lastId = await this.client.incrby(sequenceKey(table), rows.length);
      const firstId = lastId - rows.length + 1;
      const createdAt = new Date().toISOString();

      const transaction = this.client.multi();
      rows.forEach((row, index) => {
        const stored = { ...row, id: firstId + index, created_at: createdAt };
        transaction.rpush(rowsKey(table, row.submission_id), JSON.stringify(stored));
      });
      await this.exec(transaction);
      return rows.length;
    });
  }

  async newSubmissionId(filename: string, content: string): Promise<number> {
    return this.run("newSubmissionId", async () => {
      const id = await this.client.incr(`${KEY_PREFIX}submissions:seq`);
      await this.client.hset(`${KEY_PREFIX}submission:${id}`, {
        filename,
        code_content: content,
        created_at: new Date().toISOString(),
      });
      return id;
    });
  }

  async query(table: string, submissionId: number): Promise<StoredFindingRow[]> {
    return this.run("query", async () => {
      this.assertIdentifier(table);
      const raw = await this.client.lrange(rowsKey(table, submissionId), 0, -1);
      return raw.map((entry): StoredFindingRow => parseStoredRow(JSON.parse(entry)));
    });
  }

  async ping(): Promise<void> {
    await this.run("ping", async () => {
      await this.client.ping();
    });
  }

  async close(): Promise<void> {
    if (this.client.status === "wait" || this.client.status === "end") {
      this.client.disconnect();
      return;
    }
    await this.client.quit();
  }

  private assertIdentifier(table: string): void {
    if (!isSafeIdentifier(table)) {
      throw new Error(`Invalid table name: ${table}`);
    }
  }

  /**
   * Pipelines resolve with per-command errors instead of rejecting.
   */
  private async exec(pipeline: ChainableCommander): Promise<void> {
    const results = await pipeline.exec();
    for (const [err] of results ?? []) {
      if (err) {
        throw err;
      }
    }
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StoreConnectivityError(this.label, operation, err);
    }
  }
}
