import { and, eq, inArray, max, type SQL } from "drizzle-orm";
import {
  Deployment,
  DeploymentStatus,
  deploymentIdKey,
  type AppId,
  type DeploymentId,
  type DeploymentNumber,
  type Environment,
  type TargetId,
} from "@platform/deployment/domain";
import type { DeploymentsReader, DeploymentsWriter } from "@platform/deployment/store";
import type { EventSink } from "@platform/events";
import { deployments } from "@shared/schema";
import type { Database } from "../db";
import { deploymentToRow, rowToDeployment } from "./mappers";
import { persist, type Transaction } from "./persist";

const ONGOING = [DeploymentStatus.Pending, DeploymentStatus.Running];

function byId(id: DeploymentId): SQL | undefined {
  return and(eq(deployments.appId, id.appId), eq(deployments.deploymentNumber, id.deploymentNumber));
}

export class PgDeploymentsStore implements DeploymentsReader, DeploymentsWriter {
  constructor(
    private readonly db: Database,
    private readonly sink: EventSink,
  ) {}

  async getById(id: DeploymentId): Promise<Deployment | null> {
    const [row] = await this.db.select().from(deployments).where(byId(id));
    if (!row) return null;
    const { snapshot, version } = rowToDeployment(row);
    return Deployment.restore(snapshot, version);
  }

  async latestDeploymentNumber(appId: AppId): Promise<DeploymentNumber> {
    const [row] = await this.db
      .select({ latest: max(deployments.deploymentNumber) })
      .from(deployments)
      .where(eq(deployments.appId, appId));
    return row?.latest ?? 0;
  }

  async hasRunningOrPendingDeploymentsOnTarget(targetId: TargetId): Promise<boolean> {
    return this.exists(and(eq(deployments.target, targetId), inArray(deployments.status, ONGOING)));
  }

  async hasRunningOrPendingDeploymentsOnAppTargetEnv(
    appId: AppId,
    targetId: TargetId,
    environment: Environment,
  ): Promise<boolean> {
    return this.exists(and(this.onAppTargetEnv(appId, targetId, environment), inArray(deployments.status, ONGOING)));
  }

  async hasSucceededDeploymentsOnAppTargetEnv(
    appId: AppId,
    targetId: TargetId,
    environment: Environment,
  ): Promise<boolean> {
    return this.exists(
      and(this.onAppTargetEnv(appId, targetId, environment), eq(deployments.status, DeploymentStatus.Succeeded)),
    );
  }

  async save(deployment: Deployment): Promise<void> {
    const events = deployment.pendingEvents();
    const expectedVersion = deployment.version;
    const id = deployment.id;

    const version = await persist(this.db, this.sink, {
      aggregate: "deployment",
      aggregateId: deploymentIdKey(id),
      expectedVersion,
      events,
      write: async (tx, nextVersion) => {
        const row = deploymentToRow(deployment.snapshot(), nextVersion);
        if (expectedVersion === 0) {
          // A number already taken by a concurrent request surfaces as a version conflict.
          const inserted = await tx
            .insert(deployments)
            .values(row)
            .onConflictDoNothing({ target: [deployments.appId, deployments.deploymentNumber] })
            .returning({ appId: deployments.appId });
          return inserted.length > 0;
        }

        const updated = await tx
          .update(deployments)
          .set(row)
          .where(and(byId(id), eq(deployments.version, expectedVersion)))
          .returning({ appId: deployments.appId });
        return updated.length > 0;
      },
      currentVersion: (tx) => this.versionOf(tx, id),
    });

    deployment.commit(version);
  }

  private onAppTargetEnv(appId: AppId, targetId: TargetId, environment: Environment): SQL | undefined {
    return and(
      eq(deployments.appId, appId),
      eq(deployments.target, targetId),
      eq(deployments.environment, environment),
    );
  }

  private async exists(condition: SQL | undefined): Promise<boolean> {
    const rows = await this.db.select({ appId: deployments.appId }).from(deployments).where(condition).limit(1);
    return rows.length > 0;
  }

  private async versionOf(tx: Transaction, id: DeploymentId): Promise<number> {
    const [row] = await tx.select({ version: deployments.version }).from(deployments).where(byId(id));
    return row?.version ?? 0;
  }
}
