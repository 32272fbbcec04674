import { z } from "zod";
import {
  App,
  CleanupStrategy,
  ENVIRONMENTS,
  EnvironmentConfig,
  appCleanupNotRequested,
  notFound,
  parseAppName,
  type AppId,
  type Environment,
} from "@platform/deployment/domain";
import type { CommandDefinition } from "../bus/commandBus";
import { requireRequester } from "../context";
import type { CommandDependencies } from "./types";

export const environmentSchema = z.enum(ENVIRONMENTS);

const environmentConfigSchema = z
  .object({
    target: z.string().min(1),
    vars: z.record(z.record(z.string())).default({}),
  })
  .strict();

const appIdSchema = z.object({ id: z.string().min(1) }).strict();

async function loadApp(apps: CommandDependencies["apps"], id: AppId): Promise<App> {
  const app = await apps.getById(id);
  if (!app) throw notFound("App");
  return app;
}

function toEnvironmentConfig(data: z.infer<typeof environmentConfigSchema>): EnvironmentConfig {
  return new EnvironmentConfig(data.target, data.vars);
}

// ---- Create ----

const createAppSchema = z
  .object({
    name: z.string().min(1),
    production: environmentConfigSchema,
    staging: environmentConfigSchema,
  })
  .strict();

export function createAppCommand(
  deps: Pick<CommandDependencies, "apps">,
): CommandDefinition<z.infer<typeof createAppSchema>, AppId> {
  return {
    name: "app.create",
    schema: createAppSchema,
    async handle(ctx, input) {
      const requestedBy = requireRequester(ctx);
      const name = parseAppName(input.name);

      const production = await deps.apps.checkEnvironmentConfig(name, toEnvironmentConfig(input.production));
      const staging = await deps.apps.checkEnvironmentConfig(name, toEnvironmentConfig(input.staging));

      const app = App.create(name, production, staging, requestedBy);
      await deps.apps.save(app);
      return app.id;
    },
  };
}

// ---- Update ----

const updateAppSchema = z
  .object({
    id: z.string().min(1),
    production: environmentConfigSchema.optional(),
    staging: environmentConfigSchema.optional(),
  })
  .strict();

export function updateAppCommand(
  deps: Pick<CommandDependencies, "apps">,
): CommandDefinition<z.infer<typeof updateAppSchema>, AppId> {
  return {
    name: "app.update",
    schema: updateAppSchema,
    async handle(ctx, input) {
      requireRequester(ctx);
      const app = await loadApp(deps.apps, input.id);

      const changes: Array<[Environment, z.infer<typeof environmentConfigSchema> | undefined]> = [
        ["production", input.production],
        ["staging", input.staging],
      ];

      for (const [environment, data] of changes) {
        if (!data) continue;
        const requirement = await deps.apps.checkEnvironmentConfig(app.name, toEnvironmentConfig(data), app.id);
        app.hasEnvironmentConfig(environment, requirement);
      }

      await deps.apps.save(app);
      return app.id;
    },
  };
}

// ---- Cleanup & deletion ----

export function requestAppCleanupCommand(
  deps: Pick<CommandDependencies, "apps">,
): CommandDefinition<z.infer<typeof appIdSchema>, void> {
  return {
    name: "app.request_cleanup",
    schema: appIdSchema,
    async handle(ctx, input) {
      const requestedBy = requireRequester(ctx);
      const app = await loadApp(deps.apps, input.id);
      app.requestCleanup(requestedBy);
      await deps.apps.save(app);
    },
  };
}

const cleanupAppSchema = z
  .object({
    id: z.string().min(1),
    environment: environmentSchema,
  })
  .strict();

/**
 * Removes what an app left on the target of one environment. A target that
 * no longer exists has nothing left to remove.
 */
export function cleanupAppCommand(
  deps: Pick<CommandDependencies, "apps" | "targets" | "deployments" | "provider">,
): CommandDefinition<z.infer<typeof cleanupAppSchema>, CleanupStrategy> {
  return {
    name: "app.cleanup",
    schema: cleanupAppSchema,
    async handle(_ctx, input) {
      const app = await loadApp(deps.apps, input.id);
      if (!app.cleanupRequested) throw appCleanupNotRequested();

      const { target: targetId } = app.environmentConfig(input.environment);
      const target = await deps.targets.getById(targetId);
      if (!target) return CleanupStrategy.Skip;

      const ongoing = await deps.deployments.hasRunningOrPendingDeploymentsOnAppTargetEnv(
        app.id,
        target.id,
        input.environment,
      );
      const succeeded = await deps.deployments.hasSucceededDeploymentsOnAppTargetEnv(
        app.id,
        target.id,
        input.environment,
      );

      const strategy = target.appCleanupStrategy(ongoing, succeeded);
      await deps.provider.cleanupApp(app, target, input.environment, strategy);
      return strategy;
    },
  };
}

export function deleteAppCommand(
  deps: Pick<CommandDependencies, "apps">,
): CommandDefinition<z.infer<typeof appIdSchema>, void> {
  return {
    name: "app.delete",
    schema: appIdSchema,
    async handle(_ctx, input) {
      const app = await loadApp(deps.apps, input.id);
      app.delete(true);
      await deps.apps.save(app);
    },
  };
}
