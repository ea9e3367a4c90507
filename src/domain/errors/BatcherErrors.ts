/** Base class for every error raised by the batching engine itself. */
export class BatcherError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BatcherError';
  }
}

/** Invalid options passed to a batcher constructor. No instance is produced. */
export class ConfigurationError extends BatcherError {
  constructor(
    message: string,
    /** Name of the offending option, when a single one is to blame. */
    readonly option?: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A record whose own size exceeds the record limit, under the `'error'` policy.
 *
 * Ends the run: batches already handed out stay valid, nothing more is produced.
 */
export class RecordTooLargeError<T = unknown> extends BatcherError {
  constructor(
    readonly record: T,
    readonly size: number,
    readonly limit: number,
    /** Zero-based position of the record in the source. */
    readonly position: number,
  ) {
    super(`Record at position ${String(position)} has size ${String(size)}, exceeding the limit of ${String(limit)}`);
    this.name = 'RecordTooLargeError';
  }
}

/** The size function returned a value that is not a finite, non-negative number. */
export class InvalidRecordSizeError<T = unknown> extends BatcherError {
  constructor(
    readonly record: T,
    readonly size: number,
    readonly position: number,
  ) {
    super(
      `Size function returned ${String(size)} for record at position ${String(position)}; expected a finite, non-negative number`,
    );
    this.name = 'InvalidRecordSizeError';
  }
}
