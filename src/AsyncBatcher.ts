import type { Batch } from './domain/model/Batch.js';
import type { BatcherConfig } from './BatcherConfig.js';
import { BatcherStatus } from './domain/model/BatcherStatus.js';
import { BatcherBase } from './BatcherBase.js';

/**
 * `Batcher` for sources that produce records asynchronously: async generators,
 * Node.js readable streams in object mode, paginated API clients.
 *
 * Same windowing rules and single-pass semantics; the size function stays
 * synchronous.
 *
 * @example
 * ```typescript
 * const batcher = new AsyncBatcher(Readable.from(rows), { maxBatchLen: 100 });
 * for await (const batch of batcher) {
 *   await repository.bulkInsert(batch);
 * }
 * ```
 */
export class AsyncBatcher<T> extends BatcherBase<T> implements AsyncIterable<Batch<T>> {
  private run: AsyncGenerator<Batch<T>, void, undefined> | null = null;
  private pendingPulls = 0;

  /**
   * @param records - Source of records, async or sync. Taken over by the batcher.
   * @throws ConfigurationError if the options are invalid.
   */
  constructor(
    private readonly records: AsyncIterable<T> | Iterable<T>,
    config: BatcherConfig<T>,
  ) {
    super(config);
  }

  [Symbol.asyncIterator](): AsyncIterator<Batch<T>> {
    const run = this.getRun();
    return {
      next: async () => {
        this.pendingPulls++;
        try {
          return await run.next();
        } finally {
          this.pendingPulls--;
        }
      },
    };
  }

  /** Drain the source and resolve with every batch. Never settles for an unbounded source. */
  async batches(): Promise<Batch<T>[]> {
    const batches: Batch<T>[] = [];
    for await (const batch of this) {
      batches.push(batch);
    }
    return batches;
  }

  /**
   * Abandon the run and release the source iterator. Further iteration yields nothing.
   *
   * With a pull still waiting on the source, resolves at once: that pull
   * settles as done and the source is released when it next yields or ends.
   */
  async close(): Promise<void> {
    if (this.ctx.isFinished()) return;
    this.ctx.transitionTo(BatcherStatus.CLOSED);
    if (this.pendingPulls === 0) {
      await this.run?.return(undefined);
    }
  }

  private getRun(): AsyncGenerator<Batch<T>, void, undefined> {
    if (!this.run) {
      this.run = this.produce();
    }
    return this.run;
  }

  private async *produce(): AsyncGenerator<Batch<T>, void, undefined> {
    if (this.ctx.isFinished()) return;
    this.ctx.transitionTo(BatcherStatus.RUNNING);

    try {
      for await (const record of this.records) {
        // Closed while this record was awaited.
        if (this.ctx.isFinished()) return;
        yield* this.ctx.accept(record);
        if (this.ctx.isFinished()) return;
      }
    } catch (error) {
      this.ctx.fail(error);
      throw error;
    }

    if (this.ctx.isFinished()) return;
    const last = this.ctx.finish();
    if (last) yield last;
  }
}
