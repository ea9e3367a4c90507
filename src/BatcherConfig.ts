import type { SizeCalcFn } from './domain/ports/SizeCalcFn.js';
import type { WindowLimits } from './domain/services/BatchWindow.js';
import type { HandlerErrorFn } from './application/EventBus.js';
import { RecordSizePolicy, isRecordSizePolicy } from './domain/model/RecordSizePolicy.js';
import { ConfigurationError } from './domain/errors/BatcherErrors.js';
import { constantSize } from './domain/services/sizeFunctions.js';

/** Options for `Batcher` and `AsyncBatcher`. At least one of `maxBatchLen` and `maxBatchSize` is required. */
export interface BatcherConfig<T> {
  /** Maximum number of records per batch. Positive integer. Default: unbounded. */
  readonly maxBatchLen?: number;
  /** Maximum summed size of a batch, in the units of `sizeCalcFn`. Default: unbounded. */
  readonly maxBatchSize?: number;
  /**
   * Largest size a single record may have. Records above it are handled by
   * `whenRecordSizeExceeded`. Default: `maxBatchSize`. Must not exceed it.
   */
  readonly maxRecordSize?: number;
  /** Measures a record. Default: every record costs `1`. */
  readonly sizeCalcFn?: SizeCalcFn<T>;
  /** Policy for records above `maxRecordSize`. Default: `'error'`. */
  readonly whenRecordSizeExceeded?: RecordSizePolicy;
  /** Receives errors thrown by event subscribers. Default: ignore them. */
  readonly onHandlerError?: HandlerErrorFn;
}

export interface ResolvedBatcherConfig<T> extends WindowLimits<T> {
  readonly onHandlerError: HandlerErrorFn | undefined;
}

function isPositiveFinite(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Validate options and fill in defaults.
 *
 * @throws ConfigurationError naming the first invalid option.
 */
export function resolveBatcherConfig<T>(config: BatcherConfig<T>): ResolvedBatcherConfig<T> {
  const maxBatchLen = config.maxBatchLen ?? null;
  const maxBatchSize = config.maxBatchSize ?? null;

  if (maxBatchLen === null && maxBatchSize === null) {
    throw new ConfigurationError('At least one of maxBatchLen or maxBatchSize must be set');
  }

  if (maxBatchLen !== null && (!Number.isInteger(maxBatchLen) || maxBatchLen < 1)) {
    throw new ConfigurationError(`maxBatchLen must be a positive integer, got ${String(maxBatchLen)}`, 'maxBatchLen');
  }

  if (maxBatchSize !== null && !isPositiveFinite(maxBatchSize)) {
    throw new ConfigurationError(
      `maxBatchSize must be a positive finite number, got ${String(maxBatchSize)}`,
      'maxBatchSize',
    );
  }

  const maxRecordSize = config.maxRecordSize ?? maxBatchSize;
  if (maxRecordSize !== null) {
    if (!isPositiveFinite(maxRecordSize)) {
      throw new ConfigurationError(
        `maxRecordSize must be a positive finite number, got ${String(maxRecordSize)}`,
        'maxRecordSize',
      );
    }
    if (maxBatchSize !== null && maxRecordSize > maxBatchSize) {
      throw new ConfigurationError(
        `maxRecordSize (${String(maxRecordSize)}) must not exceed maxBatchSize (${String(maxBatchSize)})`,
        'maxRecordSize',
      );
    }
  }

  const whenRecordSizeExceeded: unknown = config.whenRecordSizeExceeded ?? RecordSizePolicy.ERROR;
  if (!isRecordSizePolicy(whenRecordSizeExceeded)) {
    throw new ConfigurationError(
      `whenRecordSizeExceeded must be 'skip' or 'error', got ${String(whenRecordSizeExceeded)}`,
      'whenRecordSizeExceeded',
    );
  }

  const sizeCalcFn: unknown = config.sizeCalcFn ?? constantSize;
  if (typeof sizeCalcFn !== 'function') {
    throw new ConfigurationError('sizeCalcFn must be a function', 'sizeCalcFn');
  }

  return {
    maxBatchLen,
    maxBatchSize,
    maxRecordSize,
    sizeCalcFn: config.sizeCalcFn ?? constantSize,
    whenRecordSizeExceeded,
    onHandlerError: config.onHandlerError,
  };
}
