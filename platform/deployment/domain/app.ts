import { AggregateRoot } from "./aggregate";
import { appCleanupNeeded, appCleanupRequested, couldNotPromoteProductionDeployment } from "./errors";
import type { AppEvent } from "./events";
import { actionBy, newId, type Action, type AppId, type DeploymentNumber, type UserId } from "./ids";
import type { AppName, Environment, EnvironmentConfig } from "./environment";
import type { EnvironmentConfigRequirement } from "./requirement";
import { Deployment, type SourceData } from "./deployment";

export type AppSnapshot = Readonly<{
  id: AppId;
  name: AppName;
  production: EnvironmentConfig;
  staging: EnvironmentConfig;
  cleanupRequested?: Action;
  created: Action;
  deleted: boolean;
}>;

export class App extends AggregateRoot<AppSnapshot, AppEvent> {
  private constructor(snapshot: AppSnapshot, version: number) {
    super(snapshot, version);
  }

  static create(
    name: AppName,
    production: EnvironmentConfigRequirement,
    staging: EnvironmentConfigRequirement,
    requestedBy: UserId,
  ): App {
    const snapshot: AppSnapshot = {
      id: newId(),
      name,
      production: production.met(),
      staging: staging.met(),
      created: actionBy(requestedBy),
      deleted: false,
    };

    const app = new App(snapshot, 0);
    app.record({
      type: "app.created",
      id: snapshot.id,
      name,
      production: snapshot.production,
      staging: snapshot.staging,
      created: snapshot.created,
    });
    return app;
  }

  static restore(snapshot: AppSnapshot, version: number): App {
    return new App(snapshot, version);
  }

  get id(): AppId {
    return this.state.id;
  }

  get name(): AppName {
    return this.state.name;
  }

  get cleanupRequested(): Action | undefined {
    return this.state.cleanupRequested;
  }

  get isDeleted(): boolean {
    return this.state.deleted;
  }

  environmentConfig(environment: Environment): EnvironmentConfig {
    return environment === "production" ? this.state.production : this.state.staging;
  }

  hasEnvironmentConfig(environment: Environment, requirement: EnvironmentConfigRequirement): void {
    this.ensureNotCleaningUp();

    const config = requirement.met();
    if (this.environmentConfig(environment).equals(config)) return;

    this.raise({ type: "app.env_changed", id: this.id, environment, config });
  }

  /**
   * Creates the next deployment of this app. `latestNumber` is the highest
   * deployment number already persisted for it (0 when there is none).
   */
  newDeployment(
    latestNumber: DeploymentNumber,
    source: SourceData,
    environment: Environment,
    requestedBy: UserId,
  ): Deployment {
    this.ensureNotCleaningUp();

    const config = this.environmentConfig(environment);

    return Deployment.queue(
      { appId: this.id, deploymentNumber: latestNumber + 1 },
      {
        appId: this.id,
        appName: this.name,
        environment,
        target: config.target,
        vars: config.variables(),
      },
      source,
      requestedBy,
    );
  }

  /** Deploys the same source again on the source deployment's environment. */
  redeploy(source: Deployment, latestNumber: DeploymentNumber, requestedBy: UserId): Deployment {
    return this.newDeployment(latestNumber, source.source, source.config.environment, requestedBy);
  }

  /** Deploys the source of a staging deployment to production. */
  promote(source: Deployment, latestNumber: DeploymentNumber, requestedBy: UserId): Deployment {
    if (source.config.environment === "production") {
      throw couldNotPromoteProductionDeployment();
    }

    return this.newDeployment(latestNumber, source.source, "production", requestedBy);
  }

  requestCleanup(requestedBy: UserId): void {
    if (this.state.cleanupRequested) return;

    this.raise({ type: "app.cleanup_requested", id: this.id, requested: actionBy(requestedBy) });
  }

  delete(resourcesCleanedUp: boolean): void {
    if (!this.state.cleanupRequested || !resourcesCleanedUp) {
      throw appCleanupNeeded();
    }

    this.raise({ type: "app.deleted", id: this.id });
  }

  private ensureNotCleaningUp(): void {
    if (this.state.cleanupRequested) throw appCleanupRequested();
  }

  protected evolve(state: AppSnapshot, event: AppEvent): AppSnapshot {
    switch (event.type) {
      case "app.created":
        return state;
      case "app.env_changed":
        return event.environment === "production"
          ? { ...state, production: event.config }
          : { ...state, staging: event.config };
      case "app.cleanup_requested":
        return { ...state, cleanupRequested: event.requested };
      case "app.deleted":
        return { ...state, deleted: true };
    }
  }
}
