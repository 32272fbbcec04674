import {
  Deployment,
  DeploymentStatus,
  deploymentIdKey,
  type AppId,
  type DeploymentId,
  type DeploymentNumber,
  type DeploymentSnapshot,
  type Environment,
  type TargetId,
} from "../domain";
import { envelop, type EventSink } from "../../events";
import type { DeploymentsReader, DeploymentsWriter } from "./types";
import { VersionedTable } from "./VersionedTable";

function isOngoing(d: DeploymentSnapshot): boolean {
  return d.state.status === DeploymentStatus.Pending || d.state.status === DeploymentStatus.Running;
}

export class InMemoryDeploymentsStore implements DeploymentsReader, DeploymentsWriter {
  private readonly table = new VersionedTable<DeploymentSnapshot>("deployment");

  constructor(private readonly sink: EventSink) {}

  async getById(id: DeploymentId): Promise<Deployment | null> {
    const row = this.table.get(deploymentIdKey(id));
    return row ? Deployment.restore(row.snapshot, row.version) : null;
  }

  async latestDeploymentNumber(appId: AppId): Promise<DeploymentNumber> {
    return this.table
      .values()
      .filter((d) => d.id.appId === appId)
      .reduce((max, d) => Math.max(max, d.id.deploymentNumber), 0);
  }

  async hasRunningOrPendingDeploymentsOnTarget(targetId: TargetId): Promise<boolean> {
    return this.table.values().some((d) => d.config.target === targetId && isOngoing(d));
  }

  async hasRunningOrPendingDeploymentsOnAppTargetEnv(
    appId: AppId,
    targetId: TargetId,
    environment: Environment,
  ): Promise<boolean> {
    return this.onAppTargetEnv(appId, targetId, environment).some(isOngoing);
  }

  async hasSucceededDeploymentsOnAppTargetEnv(
    appId: AppId,
    targetId: TargetId,
    environment: Environment,
  ): Promise<boolean> {
    return this.onAppTargetEnv(appId, targetId, environment).some(
      (d) => d.state.status === DeploymentStatus.Succeeded,
    );
  }

  async save(deployment: Deployment): Promise<void> {
    const key = deploymentIdKey(deployment.id);
    const events = deployment.pendingEvents();
    const version = this.table.write(key, deployment.version, deployment.snapshot());

    deployment.commit(version);
    await this.sink.emit(envelop("deployment", key, version, events));
  }

  private onAppTargetEnv(appId: AppId, targetId: TargetId, environment: Environment): DeploymentSnapshot[] {
    return this.table
      .values()
      .filter((d) => d.id.appId === appId && d.config.target === targetId && d.config.environment === environment);
  }
}
