import type { EventType, EventPayload, DomainEvent, EventPublisher } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type AnyHandler = (event: any) => void;

/** Options for `EventBus`. */
export interface EventBusOptions {
  /** Receives errors thrown by subscribers. Default: ignore them. */
  readonly onHandlerError?: (error: unknown, event: DomainEvent) => void;
}

/** Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus implements EventPublisher {
  private readonly handlers = new Map<string, Set<AnyHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();
  private readonly onHandlerError: (error: unknown, event: DomainEvent) => void;

  constructor(options?: EventBusOptions) {
    this.onHandlerError = options?.onHandlerError ?? (() => undefined);
  }

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Set<AnyHandler>();
    existing.add(handler as AnyHandler);
    this.handlers.set(type, existing);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type);
    if (existing) {
      existing.delete(handler as AnyHandler);
    }
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /**
   * Emit a domain event to all registered handlers. A throwing handler does not
   * prevent others from executing, and never fails the validation that emitted it.
   */
  emit(event: DomainEvent): void {
    const handlers = this.handlers.get(event.type);
    if (handlers) {
      for (const handler of handlers) {
        this.deliver(handler, event);
      }
    }

    for (const handler of this.wildcardHandlers) {
      this.deliver(handler, event);
    }
  }

  private deliver(handler: AnyHandler, event: DomainEvent): void {
    try {
      handler(event);
    } catch (error) {
      this.onHandlerError(error, event);
    }
  }
}
