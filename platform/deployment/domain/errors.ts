export type DeploymentErrorKind =
  | "NotFound"
  | "Conflict"
  | "InvalidTransition"
  | "Precondition"
  | "Validation";

export const ErrorCode = {
  NotFound: "NOT_FOUND",
  TargetNotFound: "TARGET_NOT_FOUND",
  UrlAlreadyTaken: "URL_ALREADY_TAKEN",
  ConfigAlreadyTaken: "CONFIG_ALREADY_TAKEN",
  AppNameAlreadyTaken: "APP_NAME_ALREADY_TAKEN",
  ConcurrentModification: "CONCURRENT_MODIFICATION",
  TargetConfigurationInProgress: "TARGET_CONFIGURATION_IN_PROGRESS",
  TargetConfigurationFailed: "TARGET_CONFIGURATION_FAILED",
  TargetCleanupRequested: "TARGET_CLEANUP_REQUESTED",
  ProviderUpdateNotPermitted: "PROVIDER_UPDATE_NOT_PERMITTED",
  AppCleanupRequested: "APP_CLEANUP_REQUESTED",
  CouldNotPromoteProductionDeployment: "COULD_NOT_PROMOTE_PRODUCTION_DEPLOYMENT",
  DeploymentNotPending: "DEPLOYMENT_NOT_PENDING",
  DeploymentNotRunning: "DEPLOYMENT_NOT_RUNNING",
  TargetInUse: "TARGET_IN_USE",
  RunningOrPendingDeployments: "RUNNING_OR_PENDING_DEPLOYMENTS",
  TargetCleanupNeeded: "TARGET_CLEANUP_NEEDED",
  AppCleanupNeeded: "APP_CLEANUP_NEEDED",
  AppCleanupNotRequested: "APP_CLEANUP_NOT_REQUESTED",
  InvalidUrl: "INVALID_URL",
  InvalidAppName: "INVALID_APP_NAME",
  InvalidProviderConfig: "INVALID_PROVIDER_CONFIG",
  InvalidCommand: "INVALID_COMMAND",
  RequesterRequired: "REQUESTER_REQUIRED",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class of every failure the domain core reports. Callers branch on
 * `kind` and `code`, never on the message.
 */
export class DeploymentError extends Error {
  public readonly kind: DeploymentErrorKind;
  public readonly code: ErrorCode;

  constructor(kind: DeploymentErrorKind, code: ErrorCode, message: string) {
    super(message);
    this.name = "DeploymentError";
    this.kind = kind;
    this.code = code;
  }
}

export class NotFoundError extends DeploymentError {
  constructor(code: ErrorCode, message: string) {
    super("NotFound", code, message);
    this.name = "NotFoundError";
  }
}

export class ConflictError extends DeploymentError {
  constructor(code: ErrorCode, message: string) {
    super("Conflict", code, message);
    this.name = "ConflictError";
  }
}

export class InvalidTransitionError extends DeploymentError {
  constructor(code: ErrorCode, message: string) {
    super("InvalidTransition", code, message);
    this.name = "InvalidTransitionError";
  }
}

export class PreconditionError extends DeploymentError {
  constructor(code: ErrorCode, message: string) {
    super("Precondition", code, message);
    this.name = "PreconditionError";
  }
}

export class ValidationError extends DeploymentError {
  public readonly details: readonly string[];

  constructor(code: ErrorCode, message: string, details: readonly string[] = []) {
    super("Validation", code, message);
    this.name = "ValidationError";
    this.details = details;
  }
}

export const notFound = (what: string) => new NotFoundError(ErrorCode.NotFound, `${what} not found`);
export const targetNotFound = () => new NotFoundError(ErrorCode.TargetNotFound, "Target not found");

export const urlAlreadyTaken = () => new ConflictError(ErrorCode.UrlAlreadyTaken, "Url already taken by another target");
export const configAlreadyTaken = () =>
  new ConflictError(ErrorCode.ConfigAlreadyTaken, "Provider configuration already used by another target");
export const appNameAlreadyTaken = () => new ConflictError(ErrorCode.AppNameAlreadyTaken, "App name already taken");
export const concurrentModification = (entity: string, expected: number, actual: number) =>
  new ConflictError(
    ErrorCode.ConcurrentModification,
    `${entity} was modified concurrently (expected version ${expected}, found ${actual})`,
  );

export const targetConfigurationInProgress = () =>
  new InvalidTransitionError(ErrorCode.TargetConfigurationInProgress, "Target configuration is in progress");
export const targetConfigurationFailed = () =>
  new InvalidTransitionError(ErrorCode.TargetConfigurationFailed, "Target configuration has failed");
export const targetCleanupRequested = () =>
  new InvalidTransitionError(ErrorCode.TargetCleanupRequested, "Target cleanup has been requested");
export const providerUpdateNotPermitted = () =>
  new InvalidTransitionError(
    ErrorCode.ProviderUpdateNotPermitted,
    "Provider fingerprint could not be changed on an existing target",
  );
export const appCleanupRequested = () =>
  new InvalidTransitionError(ErrorCode.AppCleanupRequested, "App cleanup has been requested");
export const couldNotPromoteProductionDeployment = () =>
  new InvalidTransitionError(
    ErrorCode.CouldNotPromoteProductionDeployment,
    "A production deployment could not be promoted",
  );
export const deploymentNotPending = () =>
  new InvalidTransitionError(ErrorCode.DeploymentNotPending, "Deployment is not pending");
export const deploymentNotRunning = () =>
  new InvalidTransitionError(ErrorCode.DeploymentNotRunning, "Deployment is not running");

export const targetInUse = () => new PreconditionError(ErrorCode.TargetInUse, "Target is still used by at least one app");
export const runningOrPendingDeployments = () =>
  new PreconditionError(ErrorCode.RunningOrPendingDeployments, "Deployments are still running or pending");
export const targetCleanupNeeded = () =>
  new PreconditionError(ErrorCode.TargetCleanupNeeded, "Target resources must be cleaned up first");
export const appCleanupNeeded = () =>
  new PreconditionError(ErrorCode.AppCleanupNeeded, "App resources must be cleaned up first");

export const appCleanupNotRequested = () =>
  new PreconditionError(ErrorCode.AppCleanupNotRequested, "App cleanup must be requested first");

export function isDeploymentError(err: unknown, code?: ErrorCode): err is DeploymentError {
  return err instanceof DeploymentError && (code === undefined || err.code === code);
}

const STATUS_BY_KIND: Record<DeploymentErrorKind, number> = {
  NotFound: 404,
  Conflict: 409,
  InvalidTransition: 409,
  Precondition: 412,
  Validation: 400,
};

export function kindToStatusCode(kind: DeploymentErrorKind): number {
  return STATUS_BY_KIND[kind];
}
