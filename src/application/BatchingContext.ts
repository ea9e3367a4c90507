import type { Batch, BatcherProgress, ClosedBatch } from '../domain/model/Batch.js';
import type { ResolvedBatcherConfig } from '../BatcherConfig.js';
import type { OfferResult } from '../domain/services/BatchWindow.js';
import { BatcherStatus, canTransition, isTerminal } from '../domain/model/BatcherStatus.js';
import { RecordTooLargeError } from '../domain/errors/BatcherErrors.js';
import { BatchWindow } from '../domain/services/BatchWindow.js';
import { EventBus } from './EventBus.js';

/** Snapshot returned by `getStats()`. */
export interface BatcherStats extends BatcherProgress {
  readonly status: BatcherStatus;
}

/**
 * Mutable state of one batching run, shared by the sync and async facades.
 *
 * Internal: the facades own the iteration, this class owns the window, the
 * lifecycle status and event publication, so both drive the same algorithm.
 */
export class BatchingContext<T> {
  readonly eventBus: EventBus;
  private readonly window: BatchWindow<T>;
  private status: BatcherStatus = BatcherStatus.CREATED;

  constructor(config: ResolvedBatcherConfig<T>) {
    this.eventBus = new EventBus(config.onHandlerError);
    this.window = new BatchWindow(config);
  }

  /** `true` once the run can produce nothing more. */
  isFinished(): boolean {
    return isTerminal(this.status);
  }

  transitionTo(next: BatcherStatus): void {
    if (!canTransition(this.status, next)) {
      throw new Error(`Invalid state transition: ${this.status} → ${next}`);
    }
    this.status = next;
  }

  /** Place one record and return the batches it closed, in output order. */
  accept(record: T): Batch<T>[] {
    let result: OfferResult<T>;
    try {
      result = this.window.offer(record);
    } catch (error) {
      if (error instanceof RecordTooLargeError) {
        this.eventBus.emit({
          type: 'record:rejected',
          position: error.position,
          size: error.size,
          limit: error.limit,
          timestamp: Date.now(),
        });
      }
      throw error;
    }

    if (result.kind === 'skipped') {
      this.eventBus.emit({
        type: 'record:skipped',
        position: result.position,
        size: result.size,
        limit: result.limit,
        timestamp: Date.now(),
      });
      return [];
    }

    return result.closed.map((batch) => this.publish(batch));
  }

  /** Close the last open batch and mark the run completed. */
  finish(): Batch<T> | null {
    if (this.isFinished()) return null;
    const last = this.window.flush();
    const records = last ? this.publish(last) : null;
    // A subscriber of the last batch may have closed the run.
    if (this.isFinished()) return records;
    this.transitionTo(BatcherStatus.COMPLETED);
    this.eventBus.emit({ type: 'batching:completed', progress: this.window.progress(), timestamp: Date.now() });
    return records;
  }

  /** Mark the run failed. No-op when it already ended, e.g. closed from a subscriber. */
  fail(error: unknown): void {
    if (this.isFinished()) return;
    this.transitionTo(BatcherStatus.FAILED);
    this.eventBus.emit({
      type: 'batching:failed',
      error: error instanceof Error ? error.message : String(error),
      progress: this.window.progress(),
      timestamp: Date.now(),
    });
  }

  stats(): BatcherStats {
    return { status: this.status, ...this.window.progress() };
  }

  private publish(batch: ClosedBatch<T>): Batch<T> {
    this.eventBus.emit({
      type: 'batch:emitted',
      batchIndex: batch.index,
      recordCount: batch.records.length,
      totalSize: batch.size,
      timestamp: Date.now(),
    });
    return batch.records;
  }
}
