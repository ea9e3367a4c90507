/** An ordered, non-empty group of records handed to the consumer. */
export type Batch<T> = T[];

/** A batch together with the bookkeeping the window tracked while it was open. */
export interface ClosedBatch<T> {
  /** Zero-based position of this batch in the output sequence. */
  readonly index: number;
  readonly records: Batch<T>;
  /** Sum of the measured sizes of `records`. */
  readonly size: number;
}

/** Progress counters for a batching run. */
export interface BatcherProgress {
  /** Records taken from the source so far, including skipped ones. */
  readonly recordsPulled: number;
  /** Records placed into a batch (open or closed). */
  readonly recordsBatched: number;
  readonly recordsSkipped: number;
  readonly batchesEmitted: number;
}
