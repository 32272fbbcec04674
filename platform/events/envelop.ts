import { randomUUID } from "node:crypto";
import type { DomainEvent } from "../deployment/domain";
import type { AggregateKind, EventEnvelope } from "./EventEnvelope";

export function envelop(
  aggregate: AggregateKind,
  aggregateId: string,
  aggregateVersion: number,
  events: readonly DomainEvent[],
  occurredAt: Date = new Date(),
): EventEnvelope[] {
  return events.map((event) => ({
    eventId: randomUUID(),
    aggregate,
    aggregateId,
    aggregateVersion,
    occurredAt: occurredAt.toISOString(),
    event,
  }));
}
