import type { ValidationPhase } from '../model/Errors.js';

/** Emitted after a table was validated against a schema, whether or not it passed. */
export interface TableValidatedEvent {
  readonly type: 'table:validated';
  readonly schema: string;
  readonly location: string;
  readonly rowCount: number;
  readonly errorCount: number;
  readonly timestamp: number;
}

/** Emitted after a standalone series was validated against a series schema. */
export interface SeriesValidatedEvent {
  readonly type: 'series:validated';
  readonly schema: string;
  readonly location: string;
  readonly length: number;
  readonly errorCount: number;
  readonly timestamp: number;
}

/** Emitted when a wrapped function's arguments or return value fail validation, just before the error is raised. */
export interface CallRejectedEvent {
  readonly type: 'call:rejected';
  readonly functionName: string;
  readonly phase: ValidationPhase;
  readonly errorCount: number;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent = TableValidatedEvent | SeriesValidatedEvent | CallRejectedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;

/** Anything that accepts domain events. `EventBus` is the built-in implementation. */
export interface EventPublisher {
  emit(event: DomainEvent): void;
}
