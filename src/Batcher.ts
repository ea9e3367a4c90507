import type { Batch } from './domain/model/Batch.js';
import type { BatcherConfig } from './BatcherConfig.js';
import { BatcherStatus } from './domain/model/BatcherStatus.js';
import { BatcherBase } from './BatcherBase.js';

/**
 * Groups a single-pass sequence of records into batches bounded by a record
 * count (`maxBatchLen`) and a summed size (`maxBatchSize`).
 *
 * Records are pulled lazily, one at a time, and the engine suspends once per
 * emitted batch. The source is consumed at most once: iterating again after
 * the run ended yields nothing, while a consumer that broke out early picks
 * up where it stopped.
 *
 * @example
 * ```typescript
 * const batcher = new Batcher(lines, {
 *   maxBatchLen: 500,
 *   maxBatchSize: 5 * 1024 * 1024,
 *   sizeCalcFn: byteLength,
 *   whenRecordSizeExceeded: 'skip',
 * });
 * for (const batch of batcher) {
 *   await client.putRecords(batch);
 * }
 * ```
 */
export class Batcher<T> extends BatcherBase<T> implements Iterable<Batch<T>> {
  private run: Generator<Batch<T>, void, undefined> | null = null;
  private pendingPulls = 0;

  /**
   * @param records - Source of records. Taken over by the batcher: do not iterate it elsewhere.
   * @throws ConfigurationError if the options are invalid.
   */
  constructor(
    private readonly records: Iterable<T>,
    config: BatcherConfig<T>,
  ) {
    super(config);
  }

  [Symbol.iterator](): Iterator<Batch<T>> {
    const run = this.getRun();
    // Only `next` is exposed so that breaking out of a loop leaves the run resumable.
    return {
      next: () => {
        this.pendingPulls++;
        try {
          return run.next();
        } finally {
          this.pendingPulls--;
        }
      },
    };
  }

  /**
   * Drain the source and return every batch.
   *
   * Holds all batches in memory and never returns for an unbounded source;
   * iterate the batcher instead for large inputs.
   */
  batches(): Batch<T>[] {
    return [...this];
  }

  /**
   * Abandon the run and release the source iterator. Further iteration yields nothing.
   *
   * Called from an event subscriber, the run stops at its next check instead,
   * after handing out the batches already announced.
   */
  close(): void {
    if (this.ctx.isFinished()) return;
    this.ctx.transitionTo(BatcherStatus.CLOSED);
    if (this.pendingPulls === 0) {
      this.run?.return(undefined);
    }
  }

  private getRun(): Generator<Batch<T>, void, undefined> {
    if (!this.run) {
      this.run = this.produce();
    }
    return this.run;
  }

  private *produce(): Generator<Batch<T>, void, undefined> {
    if (this.ctx.isFinished()) return;
    this.ctx.transitionTo(BatcherStatus.RUNNING);

    try {
      for (const record of this.records) {
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
