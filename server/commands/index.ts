import type { CommandBus } from "../bus/commandBus";
import {
  cleanupAppCommand,
  createAppCommand,
  deleteAppCommand,
  requestAppCleanupCommand,
  updateAppCommand,
} from "./appCommands";
import {
  endDeploymentCommand,
  queueDeploymentCommand,
  redeployCommand,
  startDeploymentCommand,
} from "./deploymentCommands";
import { promoteCommand } from "./promote";
import {
  cleanupTargetCommand,
  configureTargetCommand,
  createTargetCommand,
  reconfigureTargetCommand,
  requestTargetCleanupCommand,
  updateTargetCommand,
} from "./targetCommands";
import type { CommandDependencies } from "./types";

export type { CommandDependencies, Repositories } from "./types";

export function registerCommands(bus: CommandBus, deps: CommandDependencies): CommandBus {
  return bus
    .register(createTargetCommand(deps))
    .register(updateTargetCommand(deps))
    .register(configureTargetCommand(deps))
    .register(reconfigureTargetCommand(deps))
    .register(requestTargetCleanupCommand(deps))
    .register(cleanupTargetCommand(deps))
    .register(createAppCommand(deps))
    .register(updateAppCommand(deps))
    .register(requestAppCleanupCommand(deps))
    .register(cleanupAppCommand(deps))
    .register(deleteAppCommand(deps))
    .register(queueDeploymentCommand(deps))
    .register(redeployCommand(deps))
    .register(promoteCommand(deps))
    .register(startDeploymentCommand(deps))
    .register(endDeploymentCommand(deps));
}
