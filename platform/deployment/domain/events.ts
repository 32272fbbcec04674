import type { Action, AppId, DeploymentId, TargetId } from "./ids";
import type { TargetUrl } from "./url";
import type { ProviderConfig } from "./provider";
import type { TargetState } from "./target";
import type { AppName, Environment, EnvironmentConfig } from "./environment";
import type { DeploymentConfig, DeploymentState, SourceData } from "./deployment";

// ---- Target ----

export interface TargetCreated {
  readonly type: "target.created";
  readonly id: TargetId;
  readonly name: string;
  readonly url: TargetUrl;
  readonly provider: ProviderConfig;
  readonly state: TargetState;
  readonly created: Action;
}

export interface TargetRenamed {
  readonly type: "target.renamed";
  readonly id: TargetId;
  readonly name: string;
}

export interface TargetUrlChanged {
  readonly type: "target.url_changed";
  readonly id: TargetId;
  readonly url: TargetUrl;
}

export interface TargetProviderChanged {
  readonly type: "target.provider_changed";
  readonly id: TargetId;
  readonly provider: ProviderConfig;
}

export interface TargetStateChanged {
  readonly type: "target.state_changed";
  readonly id: TargetId;
  readonly state: TargetState;
}

export interface TargetCleanupRequested {
  readonly type: "target.cleanup_requested";
  readonly id: TargetId;
  readonly requested: Action;
}

export interface TargetDeleted {
  readonly type: "target.deleted";
  readonly id: TargetId;
}

export type TargetEvent =
  | TargetCreated
  | TargetRenamed
  | TargetUrlChanged
  | TargetProviderChanged
  | TargetStateChanged
  | TargetCleanupRequested
  | TargetDeleted;

// ---- App ----

export interface AppCreated {
  readonly type: "app.created";
  readonly id: AppId;
  readonly name: AppName;
  readonly production: EnvironmentConfig;
  readonly staging: EnvironmentConfig;
  readonly created: Action;
}

export interface AppEnvChanged {
  readonly type: "app.env_changed";
  readonly id: AppId;
  readonly environment: Environment;
  readonly config: EnvironmentConfig;
}

export interface AppCleanupRequested {
  readonly type: "app.cleanup_requested";
  readonly id: AppId;
  readonly requested: Action;
}

export interface AppDeleted {
  readonly type: "app.deleted";
  readonly id: AppId;
}

export type AppEvent = AppCreated | AppEnvChanged | AppCleanupRequested | AppDeleted;

// ---- Deployment ----

export interface DeploymentCreated {
  readonly type: "deployment.created";
  readonly id: DeploymentId;
  readonly config: DeploymentConfig;
  readonly source: SourceData;
  readonly state: DeploymentState;
  readonly requested: Action;
}

export interface DeploymentStateChanged {
  readonly type: "deployment.state_changed";
  readonly id: DeploymentId;
  readonly state: DeploymentState;
}

export type DeploymentEvent = DeploymentCreated | DeploymentStateChanged;

export type DomainEvent = TargetEvent | AppEvent | DeploymentEvent;

export type DomainEventType = DomainEvent["type"];

export type DomainEventOf<T extends DomainEventType> = Extract<DomainEvent, { type: T }>;

export function isEventOfType<T extends DomainEventType>(event: DomainEvent, type: T): event is DomainEventOf<T> {
  return event.type === type;
}
