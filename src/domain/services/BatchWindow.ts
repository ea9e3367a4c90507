import type { Batch, BatcherProgress, ClosedBatch } from '../model/Batch.js';
import { RecordSizePolicy } from '../model/RecordSizePolicy.js';
import type { SizeCalcFn } from '../ports/SizeCalcFn.js';
import { InvalidRecordSizeError, RecordTooLargeError } from '../errors/BatcherErrors.js';

/** Limits and policies the window enforces. `null` means unbounded. */
export interface WindowLimits<T> {
  readonly maxBatchLen: number | null;
  readonly maxBatchSize: number | null;
  /** Largest size a single record may have. */
  readonly maxRecordSize: number | null;
  readonly sizeCalcFn: SizeCalcFn<T>;
  readonly whenRecordSizeExceeded: RecordSizePolicy;
}

/** Outcome of offering one record to the window. */
export type OfferResult<T> =
  | {
      readonly kind: 'accepted';
      /** Batches closed by this record, in output order. Zero, one or two. */
      readonly closed: readonly ClosedBatch<T>[];
    }
  | {
      readonly kind: 'skipped';
      readonly position: number;
      readonly size: number;
      readonly limit: number;
    };

/**
 * Online windowing state machine: decides, record by record, whether a record
 * joins the open batch, starts a new one, or is dropped.
 *
 * Pure logic, no I/O and no look-ahead. Holds at most one open batch.
 */
export class BatchWindow<T> {
  private open: T[] = [];
  private openSize = 0;
  private pulled = 0;
  private batched = 0;
  private skipped = 0;
  private emitted = 0;

  constructor(private readonly limits: WindowLimits<T>) {}

  /**
   * Measure `record` and place it.
   *
   * @throws RecordTooLargeError if the record exceeds the record limit under the `'error'` policy.
   * @throws InvalidRecordSizeError if the size function returns a negative or non-finite number.
   */
  offer(record: T): OfferResult<T> {
    const position = this.pulled++;
    const size = this.limits.sizeCalcFn(record);

    if (!Number.isFinite(size) || size < 0) {
      throw new InvalidRecordSizeError(record, size, position);
    }

    const recordLimit = this.limits.maxRecordSize;
    if (recordLimit !== null && size > recordLimit) {
      if (this.limits.whenRecordSizeExceeded === RecordSizePolicy.SKIP) {
        this.skipped++;
        return { kind: 'skipped', position, size, limit: recordLimit };
      }
      throw new RecordTooLargeError(record, size, recordLimit, position);
    }

    const closed: ClosedBatch<T>[] = [];

    if (this.open.length > 0 && this.wouldOverflow(size)) {
      closed.push(this.close());
    }

    this.open.push(record);
    this.openSize += size;
    this.batched++;

    if (this.isSaturated()) {
      closed.push(this.close());
    }

    return { kind: 'accepted', closed };
  }

  /** Close whatever is still open. Call once the source is exhausted. */
  flush(): ClosedBatch<T> | null {
    return this.open.length > 0 ? this.close() : null;
  }

  progress(): BatcherProgress {
    return {
      recordsPulled: this.pulled,
      recordsBatched: this.batched,
      recordsSkipped: this.skipped,
      batchesEmitted: this.emitted,
    };
  }

  private wouldOverflow(size: number): boolean {
    const { maxBatchLen, maxBatchSize } = this.limits;
    const lenExceeded = maxBatchLen !== null && this.open.length + 1 > maxBatchLen;
    const sizeExceeded = maxBatchSize !== null && this.openSize + size > maxBatchSize;
    return lenExceeded || sizeExceeded;
  }

  // A batch at maxBatchLen cannot take another record, so it goes out without waiting for one.
  // One at maxBatchSize stays open: a zero-size record still fits.
  private isSaturated(): boolean {
    const { maxBatchLen } = this.limits;
    return maxBatchLen !== null && this.open.length >= maxBatchLen;
  }

  private close(): ClosedBatch<T> {
    const records: Batch<T> = this.open;
    const closed: ClosedBatch<T> = { index: this.emitted++, records, size: this.openSize };
    this.open = [];
    this.openSize = 0;
    return closed;
  }
}
