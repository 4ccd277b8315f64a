/**
 * CSV Sink
 * Writes rows to a CSV file with a header row and a fixed set of columns
 */

import { appendFile, mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { stringify } from 'csv-stringify/sync';
import { createLogger } from '../logger';
import { alignRow } from './row.utils';
import { ColumnOptions, Row, RowSink, StorageError } from './storage.types';

const logger = createLogger('CsvSink');

/**
 * Render rows as CSV text, header first
 */
export function toCsv(rows: Row[], options: ColumnOptions = {}): string {
  const columns = options.columns ?? (rows.length > 0 ? Object.keys(rows[0]) : []);
  if (columns.length === 0) return '';

  const records = rows.map((row) => alignRow(row, columns, options.ignoreExtraColumns));
  return stringify([columns, ...records]);
}

export class CsvSink implements RowSink {
  readonly path: string;
  private readonly options: ColumnOptions;
  private columns: string[] | null;
  private headerWritten = false;
  private closed = false;
  private rowsWritten = 0;

  constructor(path: string, options: ColumnOptions = {}) {
    this.path = path;
    this.options = options;
    this.columns = options.columns ?? null;
  }

  get count(): number {
    return this.rowsWritten;
  }

  /**
   * Append rows. The first call creates (or truncates) the file and writes the header.
   */
  async write(rows: Row[]): Promise<void> {
    if (this.closed) {
      throw new StorageError(`CSV sink for ${this.path} is closed`);
    }
    if (rows.length === 0 && this.headerWritten) return;

    const columns = this.columns ?? (rows.length > 0 ? Object.keys(rows[0]) : null);
    if (columns === null) return;
    this.columns = columns;

    const records = rows.map((row) => alignRow(row, columns, this.options.ignoreExtraColumns));

    if (!this.headerWritten) {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, stringify([columns, ...records]), 'utf-8');
      this.headerWritten = true;
    } else {
      await appendFile(this.path, stringify(records), 'utf-8');
    }

    this.rowsWritten += records.length;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    // Still produce a header-only file when columns were known up front
    if (!this.headerWritten && this.columns !== null) {
      await this.write([]);
    }
    this.closed = true;
    logger.info(`Wrote ${this.rowsWritten} rows to ${this.path}`);
  }
}
