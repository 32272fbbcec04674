import type { DomainEvent } from "../deployment/domain";

export type AggregateKind = "target" | "app" | "deployment";

export type EventEnvelope<E extends DomainEvent = DomainEvent> = Readonly<{
  eventId: string;
  aggregate: AggregateKind;
  aggregateId: string;
  aggregateVersion: number;
  occurredAt: string;
  event: E;
}>;
