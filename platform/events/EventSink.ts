import type { EventEnvelope } from "./EventEnvelope";

/**
 * EventSink receives domain events once the aggregate that raised them has
 * been persisted. Implementations may store, stream, or forward them.
 */
export interface EventSink {
  emit(events: readonly EventEnvelope[]): Promise<void>;
}
