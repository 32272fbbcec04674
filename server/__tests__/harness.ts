import { vi } from "vitest";
import type { App, CleanupStrategy, Environment, Target } from "@platform/deployment/domain";
import {
  InMemoryAppsStore,
  InMemoryDeploymentsStore,
  InMemoryTargetsStore,
} from "@platform/deployment/store";
import { InMemoryEventSink } from "@platform/events";
import { CommandBus, type CommandDefinition, type CommandResult } from "../bus/commandBus";
import { registerCommands, type CommandDependencies } from "../commands";
import { createSystemContext, type RequestContext } from "../context";

export const userCtx: RequestContext = { userId: "user-1", source: "header" };

export function createFakeProvider() {
  return {
    setup: vi.fn<(target: Target) => Promise<void>>().mockResolvedValue(undefined),
    cleanupTarget: vi.fn<(target: Target, strategy: CleanupStrategy) => Promise<void>>().mockResolvedValue(undefined),
    cleanupApp: vi
      .fn<(app: App, target: Target, environment: Environment, strategy: CleanupStrategy) => Promise<void>>()
      .mockResolvedValue(undefined),
  };
}

export function unwrap<T>(result: CommandResult<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

/** In-memory repositories, a fake provider and a bus with every command registered. */
export function createHarness() {
  const sink = new InMemoryEventSink();
  const targets = new InMemoryTargetsStore(sink);
  const apps = new InMemoryAppsStore(targets, sink);
  const deployments = new InMemoryDeploymentsStore(sink);
  const provider = createFakeProvider();
  const deps: CommandDependencies = { targets, apps, deployments, provider };
  const bus = registerCommands(new CommandBus(), deps);

  function run<TInput, TResult>(
    definition: CommandDefinition<TInput, TResult>,
    payload: unknown,
    ctx: RequestContext = userCtx,
  ): Promise<CommandResult<TResult>> {
    return bus.execute(ctx, definition, payload);
  }

  async function dispatch(name: string, payload: unknown, ctx: RequestContext = userCtx) {
    return bus.dispatch(ctx, name, payload);
  }

  async function createTarget(url = "http://my-url.com", host = "10.0.0.1"): Promise<string> {
    const result = await dispatch("target.create", { name: "target", url, provider: { kind: "docker", host } });
    if (!result.ok || typeof result.value !== "string") throw new Error("target.create failed");
    return result.value;
  }

  /** Creates a target and reports its first configuration attempt. */
  async function createConfiguredTarget(url?: string, host?: string, failure?: Error): Promise<string> {
    const id = await createTarget(url, host);
    const target = await targets.getById(id);
    if (!target) throw new Error("target not saved");

    if (failure) provider.setup.mockRejectedValueOnce(failure);
    unwrap(await dispatch("target.configure", { id, version: target.currentVersion() }, createSystemContext("system")));
    return id;
  }

  async function createApp(name: string, production: string, staging: string): Promise<string> {
    const result = await dispatch("app.create", {
      name,
      production: { target: production },
      staging: { target: staging },
    });
    if (!result.ok || typeof result.value !== "string") throw new Error("app.create failed");
    return result.value;
  }

  async function queue(appId: string, environment: Environment, data = "main"): Promise<number> {
    const result = await dispatch("deployment.queue", { appId, environment, source: { kind: "git", data } });
    if (!result.ok || typeof result.value !== "number") throw new Error("deployment.queue failed");
    return result.value;
  }

  return {
    sink,
    targets,
    apps,
    deployments,
    provider,
    deps,
    bus,
    run,
    dispatch,
    createTarget,
    createConfiguredTarget,
    createApp,
    queue,
  };
}

export type Harness = ReturnType<typeof createHarness>;
