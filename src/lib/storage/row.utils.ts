import { ColumnMismatchError, Row } from './storage.types';

/**
 * Values of `row` in column order; missing columns become ''.
 */
export function alignRow(row: Row, columns: string[], ignoreExtraColumns: boolean = false): string[] {
  if (!ignoreExtraColumns) {
    const unexpected = Object.keys(row).filter((key) => !columns.includes(key));
    if (unexpected.length > 0) {
      throw new ColumnMismatchError(unexpected, columns);
    }
  }
  return columns.map((column) => row[column] ?? '');
}
