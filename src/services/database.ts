/**
 * Query executor for the embedded SQLite store, using Knex.js.
 *
 * A connection is opened for each call and destroyed afterwards; the store
 * sees little concurrency and nothing is shared between requests.
 */

import knex, { type Knex } from 'knex';
import type Database from 'better-sqlite3';
import { existsSync } from 'fs';
import { logger } from '../utils/logger.js';
import { SQLExecutionError } from '../types/errors.js';
import { isPlainObject, type ResultRow, type SqlScalar } from '../types/utils.js';

export function createKnexConfig(databasePath: string): Knex.Config {
  return {
    client: 'better-sqlite3',
    connection: {
      filename: databasePath,
    },
    useNullAsDefault: true,
    pool: {
      afterCreate: (
        conn: Database.Database,
        done: (err: Error | null, conn: Database.Database) => void
      ) => {
        // connections never write
        conn.pragma('query_only = ON');
        done(null, conn);
      },
    },
  };
}

export class SqlStore {
  constructor(private readonly databasePath: string) {}

  get path(): string {
    return this.databasePath;
  }

  /**
   * Execute a validated SELECT and materialize every row.
   *
   * @throws SQLExecutionError when the file is missing or the engine rejects the SQL
   */
  async executeQuery(sql: string): Promise<ResultRow[]> {
    // better-sqlite3 would silently create an empty file
    if (!existsSync(this.databasePath)) {
      throw new SQLExecutionError(`Database file not found: ${this.databasePath}`, sql);
    }

    const db = knex(createKnexConfig(this.databasePath));
    try {
      const result: unknown = await db.raw(sql);
      const rows = toResultRows(result);
      logger.info(`SQL executed: ${rows.length} rows`);
      return rows;
    } catch (error) {
      logger.error(`SQL execution failed: ${error}`);
      throw new SQLExecutionError(`Query execution failed: ${error}`, sql);
    } finally {
      await db.destroy();
    }
  }

  /**
   * Run a count statement and read its scalar total.
   */
  async executeCount(sql: string): Promise<number | null> {
    const rows = await this.executeQuery(sql);
    return rows.length > 0 ? extractTotal(rows[0]) : null;
  }
}

/**
 * Read the total from a count row: `total`, then `count`, then the first
 * numeric column.
 */
export function extractTotal(row: ResultRow): number | null {
  for (const key of ['total', 'count']) {
    const value = toNumber(row[key]);
    if (value !== null) {
      return value;
    }
  }
  for (const value of Object.values(row)) {
    const n = toNumber(value);
    if (n !== null) {
      return n;
    }
  }
  return null;
}

function toNumber(value: SqlScalar | undefined): number | null {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  return null;
}

/**
 * better-sqlite3 returns the row array directly from `raw`.
 */
function toResultRows(result: unknown): ResultRow[] {
  if (!Array.isArray(result)) {
    return [];
  }
  return result.filter(isPlainObject).map(toResultRow);
}

function toResultRow(raw: Record<string, unknown>): ResultRow {
  const row: ResultRow = {};
  for (const [key, value] of Object.entries(raw)) {
    row[key] = toSqlScalar(value);
  }
  return row;
}

function toSqlScalar(value: unknown): SqlScalar {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint'
  ) {
    return value;
  }
  if (value === undefined) return null;
  if (Buffer.isBuffer(value)) return value.toString('base64');
  return String(value);
}
