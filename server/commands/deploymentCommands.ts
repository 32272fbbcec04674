import { z } from "zod";
import {
  notFound,
  targetNotFound,
  type Deployment,
  type DeploymentId,
  type DeploymentNumber,
} from "@platform/deployment/domain";
import type { CommandDefinition } from "../bus/commandBus";
import { requireRequester } from "../context";
import { environmentSchema } from "./appCommands";
import type { CommandDependencies } from "./types";

const deploymentIdSchema = z
  .object({
    appId: z.string().min(1),
    deploymentNumber: z.number().int().positive(),
  })
  .strict();

async function loadDeployment(
  deployments: CommandDependencies["deployments"],
  id: DeploymentId,
): Promise<Deployment> {
  const deployment = await deployments.getById(id);
  if (!deployment) throw notFound("Deployment");
  return deployment;
}

// ---- Creation ----

const queueDeploymentSchema = z
  .object({
    appId: z.string().min(1),
    environment: environmentSchema,
    source: z
      .object({
        kind: z.string().min(1),
        data: z.string(),
      })
      .strict(),
  })
  .strict();

export function queueDeploymentCommand(
  deps: Pick<CommandDependencies, "apps" | "deployments">,
): CommandDefinition<z.infer<typeof queueDeploymentSchema>, DeploymentNumber> {
  return {
    name: "deployment.queue",
    schema: queueDeploymentSchema,
    async handle(ctx, input) {
      const requestedBy = requireRequester(ctx);

      const app = await deps.apps.getById(input.appId);
      if (!app) throw notFound("App");

      const latest = await deps.deployments.latestDeploymentNumber(app.id);
      const deployment = app.newDeployment(latest, input.source, input.environment, requestedBy);

      await deps.deployments.save(deployment);
      return deployment.id.deploymentNumber;
    },
  };
}

export function redeployCommand(
  deps: Pick<CommandDependencies, "apps" | "deployments">,
): CommandDefinition<z.infer<typeof deploymentIdSchema>, DeploymentNumber> {
  return {
    name: "deployment.redeploy",
    schema: deploymentIdSchema,
    async handle(ctx, input) {
      const requestedBy = requireRequester(ctx);

      const app = await deps.apps.getById(input.appId);
      if (!app) throw notFound("App");

      const source = await loadDeployment(deps.deployments, input);
      const latest = await deps.deployments.latestDeploymentNumber(app.id);
      const deployment = app.redeploy(source, latest, requestedBy);

      await deps.deployments.save(deployment);
      return deployment.id.deploymentNumber;
    },
  };
}

// ---- Progress reported by the execution layer ----

export function startDeploymentCommand(
  deps: Pick<CommandDependencies, "targets" | "deployments">,
): CommandDefinition<z.infer<typeof deploymentIdSchema>, void> {
  return {
    name: "deployment.start",
    schema: deploymentIdSchema,
    async handle(_ctx, input) {
      const deployment = await loadDeployment(deps.deployments, input);

      const target = await deps.targets.getById(deployment.config.target);
      if (!target) throw targetNotFound();
      target.checkAvailability();

      deployment.hasStarted();
      await deps.deployments.save(deployment);
    },
  };
}

const endDeploymentSchema = deploymentIdSchema
  .extend({
    error: z.string().min(1).optional(),
  })
  .strict();

export function endDeploymentCommand(
  deps: Pick<CommandDependencies, "deployments">,
): CommandDefinition<z.infer<typeof endDeploymentSchema>, void> {
  return {
    name: "deployment.end",
    schema: endDeploymentSchema,
    async handle(_ctx, input) {
      const deployment = await loadDeployment(deps.deployments, input);
      deployment.hasEnded(input.error);
      await deps.deployments.save(deployment);
    },
  };
}
