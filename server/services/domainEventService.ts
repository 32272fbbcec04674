import {
  isEventOfType,
  type DomainEventOf,
  type DomainEventType,
} from "@platform/deployment/domain";
import type { EventEnvelope, EventSink } from "@platform/events";

export type DomainEventHandler<T extends DomainEventType> = (
  envelope: EventEnvelope<DomainEventOf<T>>,
) => void | Promise<void>;

type EnvelopeHandler = (envelope: EventEnvelope) => void | Promise<void>;

const subscribers = new Map<DomainEventType, EnvelopeHandler[]>();

export function subscribe<T extends DomainEventType>(
  eventType: T,
  handler: DomainEventHandler<T>,
): () => void {
  const wrapped: EnvelopeHandler = (envelope) => {
    const { event } = envelope;
    if (isEventOfType(event, eventType)) return handler({ ...envelope, event });
  };

  const handlers = subscribers.get(eventType) ?? [];
  handlers.push(wrapped);
  subscribers.set(eventType, handlers);

  return () => {
    const current = subscribers.get(eventType);
    if (current) {
      const idx = current.indexOf(wrapped);
      if (idx !== -1) current.splice(idx, 1);
    }
  };
}

export function clearSubscribers(): void {
  subscribers.clear();
}

function notifySubscribers(envelope: EventEnvelope): void {
  const handlers = subscribers.get(envelope.event.type);
  if (!handlers || handlers.length === 0) return;
  for (const handler of handlers) {
    Promise.resolve()
      .then(() => handler(envelope))
      .catch((err) => {
        console.error(
          `[domain-event] Subscriber error for ${envelope.event.type}: ${err instanceof Error ? err.message : err}`,
        );
      });
  }
}

/**
 * Sink handing persisted events to in-process subscribers.
 *
 * Fire-and-forget: a failing subscriber is logged and never fails the
 * command that produced the event.
 */
export function createSubscriberSink(): EventSink {
  return {
    async emit(events: readonly EventEnvelope[]): Promise<void> {
      for (const envelope of events) {
        notifySubscribers(envelope);
      }
    },
  };
}

/** Fans events out to several sinks, in order. */
export function combineSinks(...sinks: EventSink[]): EventSink {
  return {
    async emit(events: readonly EventEnvelope[]): Promise<void> {
      for (const sink of sinks) {
        await sink.emit(events);
      }
    },
  };
}
