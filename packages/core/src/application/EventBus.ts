import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

function isEventOf<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}

/** Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  // Typed handlers are stored as narrowing wrappers, keyed by the original handler for `off()`.
  private readonly handlers = new Map<EventType, Map<unknown, WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Map<unknown, WildcardHandler>();
    existing.set(handler, (event) => {
      if (isEventOf(event, type)) handler(event);
    });
    this.handlers.set(type, existing);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler);
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /** Emit a domain event to all registered handlers. A throwing handler does not prevent others from executing. */
  emit(event: DomainEvent): void {
    const handlers = this.handlers.get(event.type);
    if (handlers) {
      for (const handler of handlers.values()) {
        try {
          handler(event);
        } catch {
          // Subscribers cannot disrupt the pipeline.
        }
      }
    }

    for (const handler of this.wildcardHandlers) {
      try {
        handler(event);
      } catch {
        // Swallow handler errors.
      }
    }
  }
}
