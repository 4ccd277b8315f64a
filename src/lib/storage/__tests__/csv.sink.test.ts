/**
 * CSV Sink Tests
 */

import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { CsvSink, toCsv } from '../csv.sink';
import { ColumnMismatchError, StorageError } from '../storage.types';

describe('toCsv', () => {
  it('should write a header and quote values that need it', () => {
    const csv = toCsv([
      { name: 'Widget', note: 'small, blue' },
      { name: 'Gadget "Pro"', note: '' },
    ]);

    expect(csv).toBe('name,note\nWidget,"small, blue"\n"Gadget ""Pro""",\n');
  });

  it('should order values by the given columns and fill gaps', () => {
    expect(toCsv([{ b: '2' }], { columns: ['a', 'b'] })).toBe('a,b\n,2\n');
  });

  it('should reject rows with unknown columns', () => {
    expect(() => toCsv([{ a: '1', z: '9' }], { columns: ['a'] })).toThrow(ColumnMismatchError);
  });

  it('should drop unknown columns when asked', () => {
    expect(toCsv([{ a: '1', z: '9' }], { columns: ['a'], ignoreExtraColumns: true })).toBe('a\n1\n');
  });

  it('should return an empty string without columns', () => {
    expect(toCsv([])).toBe('');
  });
});

describe('CsvSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'csv-sink-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write the header once and append later pages', async () => {
    const path = join(dir, 'nested', 'rows.csv');
    const sink = new CsvSink(path);

    await sink.write([{ title: 'One', price: '1' }]);
    await sink.write([{ title: 'Two', price: '2' }]);
    await sink.close();

    expect(await readFile(path, 'utf-8')).toBe('title,price\nOne,1\nTwo,2\n');
    expect(sink.count).toBe(2);
  });

  it('should produce a header-only file when nothing was scraped', async () => {
    const path = join(dir, 'empty.csv');
    const sink = new CsvSink(path, { columns: ['title', 'price'] });

    await sink.close();

    expect(await readFile(path, 'utf-8')).toBe('title,price\n');
  });

  it('should refuse writes after close', async () => {
    const sink = new CsvSink(join(dir, 'closed.csv'), { columns: ['a'] });
    await sink.close();

    await expect(sink.write([{ a: '1' }])).rejects.toThrow(StorageError);
  });
});
