/**
 * Target-database access using Knex.js over SQLite.
 *
 * Every query runs inside a transaction that is always rolled back, so an
 * accidental write never reaches the file. A query that exceeds its timeout
 * is interrupted on the driver connection and the whole Knex instance is
 * retired; the next query gets a fresh connection.
 */

import knex from 'knex';
import type { Knex } from 'knex';
import type { Database } from 'sqlite3';
import { logger } from '../utils/logger.js';
import { describeError } from '../types/errors.js';
import { toJsonCell } from '../types/utils.js';
import type { JsonValue } from '../types/utils.js';

export type QueryOutcome =
  | {
      kind: 'rows';
      columns: string[];
      rows: JsonValue[][];
      elapsedMs: number;
    }
  | {
      kind: 'error';
      reason: string;
      timeout: boolean;
      elapsedMs: number;
    };

/**
 * Read-only query execution against one database.
 */
export interface QueryRunner {
  run(sql: string, timeoutMs: number): Promise<QueryOutcome>;
  /** Drop the current connection; the next `run` opens a new one. */
  reset(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Turn a driver result into column names plus positional rows.
 */
export function toRows(result: unknown): { columns: string[]; rows: JsonValue[][] } {
  if (!Array.isArray(result) || result.length === 0) {
    return { columns: [], rows: [] };
  }
  const columns: string[] = [];
  const rows: JsonValue[][] = [];
  for (const row of result) {
    if (typeof row !== 'object' || row === null) {
      rows.push([toJsonCell(row)]);
      continue;
    }
    const entries = Object.entries(row);
    if (columns.length === 0) {
      columns.push(...entries.map(([key]) => key));
    }
    rows.push(entries.map(([, value]) => toJsonCell(value)));
  }
  return { columns, rows };
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && error.name === 'KnexTimeoutError';
}

interface Instance {
  db: Knex;
  /** Raw driver connection, captured when the pool creates it */
  connection: Database | null;
}

/**
 * Query runner for one SQLite file.
 */
export class SqliteQueryRunner implements QueryRunner {
  private current: Instance | null = null;
  private readonly retiring: Promise<void>[] = [];

  constructor(private readonly filename: string) {}

  private instance(): Knex {
    if (!this.current) {
      const instance: Instance = {
        db: knex({
          client: 'sqlite3',
          connection: { filename: this.filename },
          useNullAsDefault: true,
          pool: {
            min: 1,
            max: 1,
            afterCreate: (connection: Database, done: (error: Error | null, connection: Database) => void) => {
              instance.connection = connection;
              done(null, connection);
            },
          },
        }),
        connection: null,
      };
      this.current = instance;
    }
    return this.current.db;
  }

  /**
   * Interrupt whatever the current connection is running and hand the
   * instance off for background teardown.
   */
  private retire(trx: Knex.Transaction | null): void {
    const stale = this.current;
    this.current = null;
    if (!stale) return;

    stale.connection?.interrupt();
    const teardown = (trx && !trx.isCompleted() ? trx.rollback().then(() => undefined) : Promise.resolve())
      .catch((error: unknown) => {
        logger.debug(`Rollback after interrupt on ${this.filename}: ${describeError(error)}`);
      })
      .then(() => stale.db.destroy())
      .catch((error: unknown) => {
        logger.warn(`Failed to close retired connection to ${this.filename}: ${describeError(error)}`);
      });
    this.retiring.push(teardown);
  }

  async run(sql: string, timeoutMs: number): Promise<QueryOutcome> {
    const started = Date.now();
    let trx: Knex.Transaction | null = null;

    try {
      trx = await this.instance().transaction();
      const result: unknown = await trx.raw(sql).timeout(timeoutMs);
      await trx.rollback();
      return { kind: 'rows', ...toRows(result), elapsedMs: Date.now() - started };
    } catch (error) {
      const timeout = isTimeout(error);
      if (timeout) {
        logger.warn(`Query exceeded ${timeoutMs}ms on ${this.filename}; interrupting and resetting connection`);
        this.retire(trx);
      } else if (trx && !trx.isCompleted()) {
        await trx.rollback();
      }
      return {
        kind: 'error',
        reason: timeout ? 'timeout' : error instanceof Error ? error.message : String(error),
        timeout,
        elapsedMs: Date.now() - started,
      };
    }
  }

  async reset(): Promise<void> {
    this.retire(null);
    await Promise.all(this.retiring);
  }

  async close(): Promise<void> {
    if (this.current) {
      const { db } = this.current;
      this.current = null;
      await db.destroy();
    }
    await Promise.all(this.retiring);
  }
}
