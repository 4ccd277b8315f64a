#!/usr/bin/env node
/**
 * scrapekit command line
 *
 *   scrapekit scrape https://example.com/list --item .card --field name=h2 --field price=.price|number --next "a.next" --out items.csv
 *   scrapekit robots https://example.com/private/page
 *   scrapekit quotes --max-pages 2
 */

import { Command, InvalidArgumentError } from 'commander';
import { join } from 'path';
import { env } from './config/env';
import { Fetcher } from './lib/fetching/fetcher';
import { HttpError, NetworkError, RobotsDisallowedError, TimeoutError } from './lib/fetching/errors';
import { RequestThrottle } from './lib/rate-limit/request-throttle';
import { RobotsPolicy } from './lib/robots/robots.policy';
import { CsvSink, toCsv } from './lib/storage/csv.sink';
import { MemorySink } from './lib/storage/memory.sink';
import { MultiSink } from './lib/storage/multi.sink';
import { createPgClient, SqlTableSink } from './lib/storage/sql.sink';
import type { RowSink } from './lib/storage/storage.types';
import { parseFieldSpec } from './modules/scraper/scraper.extractor';
import { ScraperService } from './modules/scraper/scraper.service';
import { FieldSpec, ScrapeReport } from './modules/scraper/scraper.types';
import { formatQuote, QUOTE_COLUMNS, QUOTES_START_URL, quotesJob } from './modules/scraper/presets/quotes.preset';

interface ScrapeCommandOptions {
  item: string;
  field: string[];
  next?: string;
  maxPages?: number;
  out?: string;
  table?: string;
  delay?: number;
  timeout?: number;
  robots: boolean;
}

interface QuotesCommandOptions {
  maxPages?: number;
  out?: string;
  robots: boolean;
}

function parseWholeNumber(value: string, min: number): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a whole number.');
  }
  const parsed = parseInt(value, 10);
  if (parsed < min) {
    throw new InvalidArgumentError(`Expected a number of at least ${min}.`);
  }
  return parsed;
}

export function parsePositiveInt(value: string): number {
  return parseWholeNumber(value, 1);
}

export function parseNonNegativeInt(value: string): number {
  return parseWholeNumber(value, 0);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * "name=selector@attr|transform" options into named field specs
 */
export function parseFieldOptions(values: string[]): Record<string, FieldSpec> {
  const fields: Record<string, FieldSpec> = {};
  for (const value of values) {
    const eqIndex = value.indexOf('=');
    if (eqIndex <= 0) {
      throw new InvalidArgumentError(`Field "${value}" must look like name=selector`);
    }
    const name = value.slice(0, eqIndex).trim();
    fields[name] = parseFieldSpec(value.slice(eqIndex + 1));
  }
  return fields;
}

/**
 * One-line description that tells HTTP failures apart from request failures
 */
export function describeError(error: Error): string {
  if (error instanceof HttpError) {
    return `HTTP error: ${error.statusCode}${error.statusText ? ` ${error.statusText}` : ''} for ${error.url}`;
  }
  if (error instanceof TimeoutError) {
    return `Request error: timed out after ${error.timeoutMs}ms (${error.url})`;
  }
  if (error instanceof NetworkError) {
    return `Request error: ${error.message}`;
  }
  if (error instanceof RobotsDisallowedError) {
    return `Blocked: ${error.message}`;
  }
  return `Error: ${error.message}`;
}

function createService(options: { delay?: number; timeout?: number }): ScraperService {
  const throttleDelay = options.delay ?? env.REQUEST_DELAY_MIN;
  return new ScraperService({
    fetcher: new Fetcher({ timeout: options.timeout }),
    throttle: new RequestThrottle({
      delayMin: throttleDelay,
      delayMax: options.delay ?? env.REQUEST_DELAY_MAX,
    }),
  });
}

function printReport(report: ScrapeReport): void {
  console.log(`${report.rows} rows from ${report.pages} pages (${report.status}, stopped: ${report.stoppedBecause})`);
  if (report.error) {
    console.error(describeError(report.error));
    process.exitCode = 1;
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('scrapekit')
    .description('Fetch, parse, paginate and store HTML listings')
    .version('1.0.0');

  program
    .command('scrape <url>')
    .description('Scrape repeated items from a listing, following next links')
    .requiredOption('--item <selector>', 'CSS selector of one item')
    .option('--field <name=spec>', 'Field as name=selector[@attr][|transform...] (repeatable)', collect, [])
    .option('--next <selector>', 'CSS selector of the next-page link (default: rel=next)')
    .option('--max-pages <n>', 'Stop after this many pages', parsePositiveInt)
    .option('--out <file>', 'Write rows to a CSV file')
    .option('--table <name>', 'Insert rows into this table (needs DATABASE_URL)')
    .option('--delay <ms>', 'Fixed delay between requests to one host', parseNonNegativeInt)
    .option('--timeout <ms>', 'Request timeout', parsePositiveInt)
    .option('--no-robots', 'Ignore robots.txt')
    .action(async (url: string, options: ScrapeCommandOptions) => {
      const fields = parseFieldOptions(options.field);
      const columns = Object.keys(fields);
      const preview = new MemorySink({ columns });
      const sinks: RowSink[] = [preview];

      if (options.out) {
        sinks.push(new CsvSink(options.out, { columns }));
      }
      if (options.table) {
        if (!env.DATABASE_URL) {
          throw new InvalidArgumentError('--table needs DATABASE_URL to be set');
        }
        const client = await createPgClient(env.DATABASE_URL);
        try {
          sinks.push(new SqlTableSink(client, options.table, columns, { closeClient: true }));
        } catch (error: unknown) {
          await client.end?.();
          throw error;
        }
      }

      const report = await createService(options).run(
        {
          startUrl: url,
          itemSelector: options.item,
          fields,
          nextSelector: options.next,
          maxPages: options.maxPages,
          respectRobots: options.robots,
        },
        new MultiSink(sinks)
      );

      if (!options.out && !options.table) {
        process.stdout.write(toCsv(preview.rows, { columns }));
      }
      printReport(report);
    });

  program
    .command('robots <url>')
    .description('Check whether robots.txt lets scrapekit fetch a URL')
    .action(async (url: string) => {
      const policy = new RobotsPolicy();
      const allowed = await policy.isAllowed(url);
      const crawlDelay = await policy.getCrawlDelay(url);
      console.log(`${allowed ? 'allowed' : 'disallowed'}: ${url}`);
      console.log(`crawl-delay: ${crawlDelay === null ? 'none' : `${crawlDelay}s`}`);
      if (!allowed) process.exitCode = 2;
    });

  program
    .command('quotes [url]')
    .description('Example project: print every quote of a quotes listing')
    .option('--max-pages <n>', 'Stop after this many pages', parsePositiveInt)
    .option('--out <file>', 'Also write the quotes to a CSV file', join(env.OUTPUT_DIR, 'quotes.csv'))
    .option('--no-robots', 'Ignore robots.txt')
    .action(async (url: string | undefined, options: QuotesCommandOptions) => {
      const job = { ...quotesJob(url ?? QUOTES_START_URL, options.maxPages), respectRobots: options.robots };
      const preview = new MemorySink({ columns: QUOTE_COLUMNS });
      const sinks: RowSink[] = [preview];
      if (options.out) {
        sinks.push(new CsvSink(options.out, { columns: QUOTE_COLUMNS }));
      }

      const report = await createService({}).run(job, new MultiSink(sinks));
      for (const row of preview.rows) {
        console.log(formatQuote(row));
      }
      printReport(report);
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(error instanceof Error ? describeError(error) : String(error));
      process.exitCode = 1;
    });
}
