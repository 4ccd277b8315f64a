/**
 * Storage Types
 * Tabular rows and the sinks that persist them
 */

export type Row = Record<string, string>;

export interface RowSink {
  write(rows: Row[]): Promise<void>;
  close(): Promise<void>;
}

export interface ColumnOptions {
  /**
   * Column order. Defaults to the keys of the first row written.
   */
  columns?: string[];

  /**
   * Drop keys that are not columns instead of failing
   */
  ignoreExtraColumns?: boolean;
}

export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export class ColumnMismatchError extends StorageError {
  readonly unexpected: string[];

  constructor(unexpected: string[], columns: string[]) {
    super(`Row has columns [${unexpected.join(', ')}] not in [${columns.join(', ')}]`);
    this.name = 'ColumnMismatchError';
    this.unexpected = unexpected;
  }
}
