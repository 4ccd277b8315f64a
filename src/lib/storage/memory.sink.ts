import { alignRow } from './row.utils';
import { ColumnOptions, Row, RowSink } from './storage.types';

/**
 * Keeps rows in memory; used for previews and tests
 */
export class MemorySink implements RowSink {
  readonly rows: Row[] = [];
  private columns: string[] | null;
  private readonly ignoreExtraColumns: boolean;
  closed = false;

  constructor(options: ColumnOptions = {}) {
    this.columns = options.columns ?? null;
    this.ignoreExtraColumns = options.ignoreExtraColumns ?? false;
  }

  async write(rows: Row[]): Promise<void> {
    for (const row of rows) {
      const columns = this.columns ?? Object.keys(row);
      this.columns = columns;
      const values = alignRow(row, columns, this.ignoreExtraColumns);
      this.rows.push(Object.fromEntries(columns.map((column, index) => [column, values[index]])));
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
