import { TargetStatus, type TargetId } from "@platform/deployment/domain";
import type { CommandBus } from "../bus/commandBus";
import type { RequestContext } from "../context";
import { log } from "../logging";
import { subscribe } from "./domainEventService";

/**
 * Drives configuration attempts: every time a target enters the configuring
 * state, `target.configure` is dispatched for that attempt's version.
 * Returns a function that stops listening.
 */
export function startTargetConfigurator(bus: CommandBus, ctx: RequestContext): () => void {
  const configure = async (id: TargetId, version: Date): Promise<void> => {
    const result = await bus.dispatch(ctx, "target.configure", { id, version });
    if (!result.ok) {
      log(`configure ${id} rejected: ${result.error.code}`, "target-configurator");
    }
  };

  const unsubscribers = [
    subscribe("target.created", ({ event }) => configure(event.id, event.state.version)),
    subscribe("target.state_changed", ({ event }) => {
      if (event.state.status !== TargetStatus.Configuring) return;
      return configure(event.id, event.state.version);
    }),
  ];

  return () => {
    for (const unsubscribe of unsubscribers) unsubscribe();
  };
}
