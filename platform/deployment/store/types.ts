import type {
  App,
  AppName,
  Deployment,
  DeploymentId,
  DeploymentNumber,
  Environment,
  EnvironmentConfig,
  EnvironmentConfigRequirement,
  ProviderConfig,
  ProviderConfigRequirement,
  Target,
  TargetId,
  TargetUrl,
  TargetUrlRequirement,
  AppId,
} from "../domain";

/**
 * Repository contracts of the deployment domain.
 *
 * Rules:
 * - Readers return freshly restored aggregates, never shared instances
 * - Writers persist the snapshot with the aggregate version as expected
 *   version, then drain and dispatch its pending events
 * - Uniqueness checks return requirements, the domain decides what to do
 */

export interface TargetsReader {
  getById(id: TargetId): Promise<Target | null>;
  /** Excludes `excluding` so a target never conflicts with itself. */
  checkUrlAvailability(url: TargetUrl, excluding?: TargetId): Promise<TargetUrlRequirement>;
  checkConfigAvailability(config: ProviderConfig, excluding?: TargetId): Promise<ProviderConfigRequirement>;
}

export interface TargetsWriter {
  save(target: Target): Promise<void>;
}

export interface AppsReader {
  getById(id: AppId): Promise<App | null>;
  getByName(name: AppName): Promise<App | null>;
  checkEnvironmentConfig(
    name: AppName,
    config: EnvironmentConfig,
    excluding?: AppId,
  ): Promise<EnvironmentConfigRequirement>;
  hasAppsOnTarget(id: TargetId): Promise<boolean>;
}

export interface AppsWriter {
  save(app: App): Promise<void>;
}

export interface DeploymentsReader {
  getById(id: DeploymentId): Promise<Deployment | null>;
  /** Highest deployment number of the app, 0 when it has none. */
  latestDeploymentNumber(appId: AppId): Promise<DeploymentNumber>;
  hasRunningOrPendingDeploymentsOnTarget(targetId: TargetId): Promise<boolean>;
  hasRunningOrPendingDeploymentsOnAppTargetEnv(
    appId: AppId,
    targetId: TargetId,
    environment: Environment,
  ): Promise<boolean>;
  hasSucceededDeploymentsOnAppTargetEnv(
    appId: AppId,
    targetId: TargetId,
    environment: Environment,
  ): Promise<boolean>;
}

export interface DeploymentsWriter {
  /** Fails with a conflict when a new deployment reuses an existing number. */
  save(deployment: Deployment): Promise<void>;
}
