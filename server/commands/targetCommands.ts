import { z } from "zod";
import {
  Target,
  TargetUrl,
  notFound,
  parseProviderConfig,
  providerConfigSchema,
  targetCleanupNeeded,
  type CleanupStrategy,
  type TargetId,
} from "@platform/deployment/domain";
import type { CommandDefinition } from "../bus/commandBus";
import { requireRequester } from "../context";
import type { CommandDependencies } from "./types";

const targetIdSchema = z.object({ id: z.string().min(1) }).strict();

async function loadTarget(targets: CommandDependencies["targets"], id: TargetId): Promise<Target> {
  const target = await targets.getById(id);
  if (!target) throw notFound("Target");
  return target;
}

// ---- Create ----

const createTargetSchema = z
  .object({
    name: z.string().trim().min(1),
    url: z.string().min(1),
    provider: providerConfigSchema,
  })
  .strict();

export function createTargetCommand(
  deps: Pick<CommandDependencies, "targets">,
): CommandDefinition<z.infer<typeof createTargetSchema>, TargetId> {
  return {
    name: "target.create",
    schema: createTargetSchema,
    async handle(ctx, input) {
      const requestedBy = requireRequester(ctx);
      const url = TargetUrl.parse(input.url);
      const config = parseProviderConfig(input.provider);

      const urlRequirement = await deps.targets.checkUrlAvailability(url);
      const configRequirement = await deps.targets.checkConfigAvailability(config);

      const target = Target.create(input.name, urlRequirement, configRequirement, requestedBy);
      await deps.targets.save(target);
      return target.id;
    },
  };
}

// ---- Update ----

const updateTargetSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().trim().min(1).optional(),
    url: z.string().min(1).optional(),
    provider: providerConfigSchema.optional(),
  })
  .strict();

export function updateTargetCommand(
  deps: Pick<CommandDependencies, "targets">,
): CommandDefinition<z.infer<typeof updateTargetSchema>, TargetId> {
  return {
    name: "target.update",
    schema: updateTargetSchema,
    async handle(ctx, input) {
      requireRequester(ctx);
      const target = await loadTarget(deps.targets, input.id);

      if (input.name !== undefined) {
        target.rename(input.name);
      }

      if (input.url !== undefined) {
        const url = TargetUrl.parse(input.url);
        target.hasUrl(await deps.targets.checkUrlAvailability(url, target.id));
      }

      if (input.provider !== undefined) {
        const config = parseProviderConfig(input.provider);
        target.hasProvider(await deps.targets.checkConfigAvailability(config, target.id));
      }

      await deps.targets.save(target);
      return target.id;
    },
  };
}

// ---- Configuration ----

const configureTargetSchema = z
  .object({
    id: z.string().min(1),
    version: z.coerce.date(),
  })
  .strict();

/**
 * Runs the provider setup for the configuration attempt `version` and
 * records its outcome on the target. A failed setup is an outcome, not a
 * command failure.
 */
export function configureTargetCommand(
  deps: Pick<CommandDependencies, "targets" | "provider">,
): CommandDefinition<z.infer<typeof configureTargetSchema>, void> {
  return {
    name: "target.configure",
    schema: configureTargetSchema,
    async handle(_ctx, input) {
      const target = await loadTarget(deps.targets, input.id);

      // Superseded by a newer attempt
      if (input.version.getTime() !== target.currentVersion().getTime()) return;

      let failure: unknown;
      try {
        await deps.provider.setup(target);
      } catch (err) {
        failure = err instanceof Error ? err : new Error(String(err));
      }

      target.configured(input.version, failure);
      await deps.targets.save(target);
    },
  };
}

export function reconfigureTargetCommand(
  deps: Pick<CommandDependencies, "targets">,
): CommandDefinition<z.infer<typeof targetIdSchema>, void> {
  return {
    name: "target.reconfigure",
    schema: targetIdSchema,
    async handle(ctx, input) {
      requireRequester(ctx);
      const target = await loadTarget(deps.targets, input.id);
      target.reconfigure();
      await deps.targets.save(target);
    },
  };
}

// ---- Cleanup & deletion ----

export function requestTargetCleanupCommand(
  deps: Pick<CommandDependencies, "targets" | "apps">,
): CommandDefinition<z.infer<typeof targetIdSchema>, void> {
  return {
    name: "target.request_cleanup",
    schema: targetIdSchema,
    async handle(ctx, input) {
      const requestedBy = requireRequester(ctx);
      const target = await loadTarget(deps.targets, input.id);
      const usedByApps = await deps.apps.hasAppsOnTarget(target.id);

      target.requestCleanup(usedByApps, requestedBy);
      await deps.targets.save(target);
    },
  };
}

/** Removes the target resources through the provider, then deletes it. */
export function cleanupTargetCommand(
  deps: Pick<CommandDependencies, "targets" | "deployments" | "provider">,
): CommandDefinition<z.infer<typeof targetIdSchema>, CleanupStrategy> {
  return {
    name: "target.cleanup",
    schema: targetIdSchema,
    async handle(_ctx, input) {
      const target = await loadTarget(deps.targets, input.id);
      if (!target.cleanupRequested) throw targetCleanupNeeded();

      const ongoing = await deps.deployments.hasRunningOrPendingDeploymentsOnTarget(target.id);
      const strategy = target.cleanupStrategy(ongoing);

      await deps.provider.cleanupTarget(target, strategy);

      target.delete(true);
      await deps.targets.save(target);
      return strategy;
    },
  };
}
