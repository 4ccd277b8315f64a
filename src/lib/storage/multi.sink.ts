import { Row, RowSink } from './storage.types';

/**
 * Fans every write out to several sinks, in order
 */
export class MultiSink implements RowSink {
  private readonly sinks: RowSink[];

  constructor(sinks: RowSink[]) {
    this.sinks = sinks;
  }

  async write(rows: Row[]): Promise<void> {
    for (const sink of this.sinks) {
      await sink.write(rows);
    }
  }

  /**
   * Close every sink, even after one fails; the first failure is rethrown
   */
  async close(): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map((sink) => sink.close()));
    const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure) {
      throw failure.reason;
    }
  }
}
