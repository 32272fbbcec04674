export type { AggregateKind, EventEnvelope } from "./EventEnvelope";
export type { EventSink } from "./EventSink";
export { InMemoryEventSink } from "./InMemoryEventSink";
export { envelop } from "./envelop";
