/**
 * SQL Table Sink
 * Inserts rows into a relational table inside a transaction.
 * Any client exposing `query(text, values)` works; createPgClient() wraps node-postgres.
 */

import { Client } from 'pg';
import { createLogger } from '../logger';
import { alignRow } from './row.utils';
import { Row, RowSink, StorageError } from './storage.types';

const logger = createLogger('SqlSink');

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<unknown>;
  end?(): Promise<void>;
}

export interface SqlTableSinkOptions {
  /** Issue CREATE TABLE IF NOT EXISTS before the first insert */
  createTable?: boolean;
  ignoreExtraColumns?: boolean;
  /** Call client.end() on close */
  closeClient?: boolean;
}

export function quoteIdentifier(name: string): string {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new StorageError(`Invalid SQL identifier "${name}"`);
  }
  return `"${name}"`;
}

export function buildCreateTableSql(table: string, columns: string[]): string {
  const definitions = columns.map((column) => `${quoteIdentifier(column)} TEXT`).join(', ');
  return `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(table)} (${definitions})`;
}

export function buildInsertSql(table: string, columns: string[]): string {
  const names = columns.map(quoteIdentifier).join(', ');
  const placeholders = columns.map((_, index) => `$${index + 1}`).join(', ');
  return `INSERT INTO ${quoteIdentifier(table)} (${names}) VALUES (${placeholders})`;
}

export class SqlTableSink implements RowSink {
  private readonly client: SqlClient;
  private readonly table: string;
  private readonly columns: string[];
  private readonly options: SqlTableSinkOptions;
  private readonly insertSql: string;
  private tableReady = false;
  private rowsWritten = 0;

  constructor(client: SqlClient, table: string, columns: string[], options: SqlTableSinkOptions = {}) {
    if (columns.length === 0) {
      throw new StorageError('SqlTableSink needs at least one column');
    }
    this.client = client;
    this.table = table;
    this.columns = columns;
    this.options = options;
    // Validates every identifier up front
    this.insertSql = buildInsertSql(table, columns);
  }

  get count(): number {
    return this.rowsWritten;
  }

  async write(rows: Row[]): Promise<void> {
    if (rows.length === 0) return;

    const records = rows.map((row) => alignRow(row, this.columns, this.options.ignoreExtraColumns));

    if (!this.tableReady && this.options.createTable !== false) {
      await this.client.query(buildCreateTableSql(this.table, this.columns));
    }
    this.tableReady = true;

    await this.client.query('BEGIN');
    try {
      for (const values of records) {
        await this.client.query(this.insertSql, values);
      }
      await this.client.query('COMMIT');
    } catch (error: unknown) {
      await this.client.query('ROLLBACK');
      const reason = error instanceof Error ? error.message : String(error);
      throw new StorageError(`Insert into ${this.table} failed: ${reason}`, { cause: error });
    }

    this.rowsWritten += records.length;
  }

  async close(): Promise<void> {
    logger.info(`Inserted ${this.rowsWritten} rows into ${this.table}`);
    if (this.options.closeClient && this.client.end) {
      await this.client.end();
    }
  }
}

/**
 * Connect a node-postgres client for use with SqlTableSink
 */
export async function createPgClient(connectionString: string): Promise<SqlClient> {
  const client = new Client({ connectionString });
  await client.connect();
  return {
    query: (text, values) => client.query(text, values),
    end: () => client.end(),
  };
}
