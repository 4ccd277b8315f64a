/**
 * SQL Sink Tests
 */

import { buildCreateTableSql, buildInsertSql, quoteIdentifier, SqlTableSink } from '../sql.sink';
import { StorageError } from '../storage.types';
import { createMockSqlClient } from '../../../__tests__/helpers/mocks';

describe('SQL builders', () => {
  it('should quote valid identifiers', () => {
    expect(quoteIdentifier('quotes')).toBe('"quotes"');
  });

  it('should reject identifiers that could inject SQL', () => {
    expect(() => quoteIdentifier('quotes; DROP TABLE x')).toThrow(StorageError);
  });

  it('should build CREATE TABLE and INSERT statements', () => {
    expect(buildCreateTableSql('quotes', ['text', 'author'])).toBe(
      'CREATE TABLE IF NOT EXISTS "quotes" ("text" TEXT, "author" TEXT)'
    );
    expect(buildInsertSql('quotes', ['text', 'author'])).toBe('INSERT INTO "quotes" ("text", "author") VALUES ($1, $2)');
  });
});

describe('SqlTableSink', () => {
  it('should create the table once and insert each page in a transaction', async () => {
    const client = createMockSqlClient();
    const sink = new SqlTableSink(client, 'quotes', ['text', 'author']);

    await sink.write([{ text: 'A', author: 'X' }]);
    await sink.write([{ text: 'B' }]);
    await sink.close();

    expect(client.queries).toEqual([
      { text: 'CREATE TABLE IF NOT EXISTS "quotes" ("text" TEXT, "author" TEXT)', values: undefined },
      { text: 'BEGIN', values: undefined },
      { text: 'INSERT INTO "quotes" ("text", "author") VALUES ($1, $2)', values: ['A', 'X'] },
      { text: 'COMMIT', values: undefined },
      { text: 'BEGIN', values: undefined },
      { text: 'INSERT INTO "quotes" ("text", "author") VALUES ($1, $2)', values: ['B', ''] },
      { text: 'COMMIT', values: undefined },
    ]);
    expect(sink.count).toBe(2);
    expect(client.end).not.toHaveBeenCalled();
  });

  it('should roll back and raise a StorageError when an insert fails', async () => {
    const client = createMockSqlClient(/^INSERT/);
    const sink = new SqlTableSink(client, 'quotes', ['text'], { createTable: false });

    await expect(sink.write([{ text: 'A' }])).rejects.toThrow(
      'Insert into quotes failed: duplicate key value violates unique constraint'
    );
    expect(client.queries.map((query) => query.text)).toEqual([
      'BEGIN',
      'INSERT INTO "quotes" ("text") VALUES ($1)',
      'ROLLBACK',
    ]);
    expect(sink.count).toBe(0);
  });

  it('should skip empty pages', async () => {
    const client = createMockSqlClient();
    const sink = new SqlTableSink(client, 'quotes', ['text']);

    await sink.write([]);

    expect(client.queries).toEqual([]);
  });

  it('should close the client when it owns it', async () => {
    const client = createMockSqlClient();
    const sink = new SqlTableSink(client, 'quotes', ['text'], { closeClient: true });

    await sink.close();

    expect(client.end).toHaveBeenCalledTimes(1);
  });

  it('should validate the table and columns up front', () => {
    const client = createMockSqlClient();
    expect(() => new SqlTableSink(client, 'bad-name', ['text'])).toThrow(StorageError);
    expect(() => new SqlTableSink(client, 'quotes', [])).toThrow('SqlTableSink needs at least one column');
  });
});
