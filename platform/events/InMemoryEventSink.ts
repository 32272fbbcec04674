import type { EventEnvelope } from "./EventEnvelope";
import type { EventSink } from "./EventSink";

export class InMemoryEventSink implements EventSink {
  public readonly events: EventEnvelope[] = [];

  async emit(events: readonly EventEnvelope[]): Promise<void> {
    this.events.push(...events);
  }

  types(): string[] {
    return this.events.map((e) => e.event.type);
  }
}
