import { AggregateRoot } from "./aggregate";
import { deploymentNotPending, deploymentNotRunning } from "./errors";
import type { DeploymentEvent } from "./events";
import { actionBy, type Action, type AppId, type DeploymentId, type TargetId, type UserId } from "./ids";
import type { AppName, Environment, ServicesEnv } from "./environment";

export const DeploymentStatus = {
  Pending: "pending",
  Running: "running",
  Succeeded: "succeeded",
  Failed: "failed",
} as const;

export type DeploymentStatus = (typeof DeploymentStatus)[keyof typeof DeploymentStatus];

/**
 * Opaque reference to what should be deployed (raw compose file, archive
 * path, git ref...). Copied as is on promotion and redeploy.
 */
export type SourceData = Readonly<{
  kind: string;
  data: string;
}>;

/** Environment configuration resolved when the deployment was requested. */
export type DeploymentConfig = Readonly<{
  appId: AppId;
  appName: AppName;
  environment: Environment;
  target: TargetId;
  vars: ServicesEnv;
}>;

export type DeploymentState = Readonly<{
  status: DeploymentStatus;
  errorCode?: string;
  startedAt?: Date;
  finishedAt?: Date;
}>;

export type DeploymentSnapshot = Readonly<{
  id: DeploymentId;
  config: DeploymentConfig;
  source: SourceData;
  state: DeploymentState;
  requested: Action;
}>;

export class Deployment extends AggregateRoot<DeploymentSnapshot, DeploymentEvent> {
  private constructor(snapshot: DeploymentSnapshot, version: number) {
    super(snapshot, version);
  }

  /** Only `App` creates deployments, through its own factories. */
  static queue(id: DeploymentId, config: DeploymentConfig, source: SourceData, requestedBy: UserId): Deployment {
    const snapshot: DeploymentSnapshot = {
      id,
      config,
      source: { kind: source.kind, data: source.data },
      state: { status: DeploymentStatus.Pending },
      requested: actionBy(requestedBy),
    };

    const deployment = new Deployment(snapshot, 0);
    deployment.record({
      type: "deployment.created",
      id,
      config,
      source: snapshot.source,
      state: snapshot.state,
      requested: snapshot.requested,
    });
    return deployment;
  }

  static restore(snapshot: DeploymentSnapshot, version: number): Deployment {
    return new Deployment(snapshot, version);
  }

  get id(): DeploymentId {
    return this.state.id;
  }

  get config(): DeploymentConfig {
    return this.state.config;
  }

  get source(): SourceData {
    return this.state.source;
  }

  get status(): DeploymentStatus {
    return this.state.state.status;
  }

  get requested(): Action {
    return this.state.requested;
  }

  hasStarted(at: Date = new Date()): void {
    if (this.state.state.status !== DeploymentStatus.Pending) throw deploymentNotPending();

    this.raise({
      type: "deployment.state_changed",
      id: this.id,
      state: { status: DeploymentStatus.Running, startedAt: at },
    });
  }

  hasEnded(err?: unknown, at: Date = new Date()): void {
    const current = this.state.state;
    if (current.status !== DeploymentStatus.Running) throw deploymentNotRunning();

    const failed = err !== undefined && err !== null;
    this.raise({
      type: "deployment.state_changed",
      id: this.id,
      state: {
        status: failed ? DeploymentStatus.Failed : DeploymentStatus.Succeeded,
        errorCode: failed ? (err instanceof Error ? err.message : String(err)) : undefined,
        startedAt: current.startedAt,
        finishedAt: at,
      },
    });
  }

  protected evolve(state: DeploymentSnapshot, event: DeploymentEvent): DeploymentSnapshot {
    switch (event.type) {
      case "deployment.created":
        return state;
      case "deployment.state_changed":
        return { ...state, state: event.state };
    }
  }
}
