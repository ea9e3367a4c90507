// Main entry points
export { Batcher } from './Batcher.js';
export { AsyncBatcher } from './AsyncBatcher.js';
export type { BatcherBase } from './BatcherBase.js';
export type { BatcherConfig } from './BatcherConfig.js';
export type { BatcherStats } from './application/BatchingContext.js';

// Domain model
export type { Batch, BatcherProgress } from './domain/model/Batch.js';
export { RecordSizePolicy } from './domain/model/RecordSizePolicy.js';
export { BatcherStatus } from './domain/model/BatcherStatus.js';

// Errors
export {
  BatcherError,
  ConfigurationError,
  RecordTooLargeError,
  InvalidRecordSizeError,
} from './domain/errors/BatcherErrors.js';

// Size functions
export type { SizeCalcFn } from './domain/ports/SizeCalcFn.js';
export { constantSize, byteLength, jsonByteLength } from './domain/services/sizeFunctions.js';

// Domain events
export type { HandlerErrorFn } from './application/EventBus.js';
export type {
  DomainEvent,
  EventType,
  EventPayload,
  BatchEmittedEvent,
  RecordSkippedEvent,
  RecordRejectedEvent,
  BatchingCompletedEvent,
  BatchingFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters
export { CsvParser } from './infrastructure/parsers/CsvParser.js';
export type { CsvParserOptions, CsvRow } from './infrastructure/parsers/CsvParser.js';
