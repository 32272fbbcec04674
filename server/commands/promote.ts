import { z } from "zod";
import { notFound, type DeploymentNumber } from "@platform/deployment/domain";
import type { CommandDefinition } from "../bus/commandBus";
import { requireRequester } from "../context";
import type { CommandDependencies } from "./types";

const promoteSchema = z
  .object({
    appId: z.string().min(1),
    deploymentNumber: z.number().int().positive(),
  })
  .strict();

export type PromoteInput = z.infer<typeof promoteSchema>;

/**
 * Creates a new production deployment from the source of an existing one.
 *
 * Only the new deployment is written: the app is read to allocate the next
 * number and snapshot the production config, and the deployments store
 * rejects a number taken concurrently.
 */
export function promoteCommand(
  deps: Pick<CommandDependencies, "apps" | "deployments">,
): CommandDefinition<PromoteInput, DeploymentNumber> {
  return {
    name: "deployment.promote",
    schema: promoteSchema,
    async handle(ctx, input) {
      const requestedBy = requireRequester(ctx);

      const app = await deps.apps.getById(input.appId);
      if (!app) throw notFound("App");

      const source = await deps.deployments.getById({
        appId: app.id,
        deploymentNumber: input.deploymentNumber,
      });
      if (!source) throw notFound("Deployment");

      const latest = await deps.deployments.latestDeploymentNumber(app.id);
      const deployment = app.promote(source, latest, requestedBy);

      await deps.deployments.save(deployment);
      return deployment.id.deploymentNumber;
    },
  };
}
