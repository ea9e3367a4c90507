import type { BatcherConfig } from './BatcherConfig.js';
import type { BatcherStats } from './application/BatchingContext.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import { resolveBatcherConfig } from './BatcherConfig.js';
import { BatchingContext } from './application/BatchingContext.js';

/** Configuration, events and stats shared by `Batcher` and `AsyncBatcher`. */
export abstract class BatcherBase<T> {
  protected readonly ctx: BatchingContext<T>;

  /** @throws ConfigurationError if the options are invalid. */
  constructor(config: BatcherConfig<T>) {
    this.ctx = new BatchingContext(resolveBatcherConfig(config));
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<E extends EventType>(type: E, handler: (event: EventPayload<E>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<E extends EventType>(type: E, handler: (event: EventPayload<E>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /** Current status and progress counters. */
  getStats(): BatcherStats {
    return this.ctx.stats();
  }
}
