import type { BatcherProgress } from '../model/Batch.js';

/** Emitted when a batch is closed, right before it is handed to the consumer. */
export interface BatchEmittedEvent {
  readonly type: 'batch:emitted';
  readonly batchIndex: number;
  readonly recordCount: number;
  /** Sum of the measured sizes of the batch's records. */
  readonly totalSize: number;
  readonly timestamp: number;
}

/** Emitted for each oversized record dropped under the `'skip'` policy. */
export interface RecordSkippedEvent {
  readonly type: 'record:skipped';
  /** Zero-based position of the record in the source. */
  readonly position: number;
  readonly size: number;
  readonly limit: number;
  readonly timestamp: number;
}

/** Emitted for an oversized record under the `'error'` policy, before the run fails. */
export interface RecordRejectedEvent {
  readonly type: 'record:rejected';
  readonly position: number;
  readonly size: number;
  readonly limit: number;
  readonly timestamp: number;
}

/** Emitted once the source is exhausted and the last batch has been closed. */
export interface BatchingCompletedEvent {
  readonly type: 'batching:completed';
  readonly progress: BatcherProgress;
  readonly timestamp: number;
}

/** Emitted when the run ends because of an error (oversized record, size function, source). */
export interface BatchingFailedEvent {
  readonly type: 'batching:failed';
  readonly error: string;
  readonly progress: BatcherProgress;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | BatchEmittedEvent
  | RecordSkippedEvent
  | RecordRejectedEvent
  | BatchingCompletedEvent
  | BatchingFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
