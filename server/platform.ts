import {
  InMemoryAppsStore,
  InMemoryDeploymentsStore,
  InMemoryTargetsStore,
} from "@platform/deployment/store";
import { InMemoryEventSink, type EventSink } from "@platform/events";
import { CommandBus } from "./bus/commandBus";
import { registerCommands, type Repositories } from "./commands";
import type { PlatformConfig } from "./config";
import { createDatabase } from "./db";
import { DryRunProvider, type Provider } from "./execution";
import { log } from "./logging";
import { combineSinks, createSubscriberSink } from "./services/domainEventService";
import { PgAppsStore, PgDeploymentsStore, PgTargetsStore } from "./storage";

export type Platform = Repositories & {
  bus: CommandBus;
  provider: Provider;
  /** Every event dispatched since startup, in order. */
  journal: InMemoryEventSink;
  close(): Promise<void>;
};

export type PlatformOverrides = {
  provider?: Provider;
};

function inMemoryRepositories(sink: EventSink): Repositories {
  const targets = new InMemoryTargetsStore(sink);
  return {
    targets,
    apps: new InMemoryAppsStore(targets, sink),
    deployments: new InMemoryDeploymentsStore(sink),
  };
}

/**
 * Composition root: repositories for the configured store driver, the event
 * sinks, the provider and a command bus with every command registered.
 */
export function createPlatform(config: PlatformConfig, overrides: PlatformOverrides = {}): Platform {
  const journal = new InMemoryEventSink();
  const sink = combineSinks(journal, createSubscriberSink());
  const provider = overrides.provider ?? new DryRunProvider();

  let repositories: Repositories;
  let close: () => Promise<void> = async () => {};

  if (config.store.driver === "postgres") {
    const database = createDatabase(config.store.databaseUrl);
    repositories = {
      targets: new PgTargetsStore(database.db, sink),
      apps: new PgAppsStore(database.db, sink),
      deployments: new PgDeploymentsStore(database.db, sink),
    };
    close = database.close;
  } else {
    repositories = inMemoryRepositories(sink);
  }

  const bus = registerCommands(new CommandBus(), { ...repositories, provider });
  log(`store=${config.store.driver} commands=${bus.registered().length}`, "platform");

  return { ...repositories, bus, provider, journal, close };
}
