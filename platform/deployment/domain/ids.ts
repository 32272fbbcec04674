import { randomUUID } from "node:crypto";

export type OpaqueId = string;

export type TargetId = OpaqueId;
export type AppId = OpaqueId;
export type UserId = OpaqueId;
export type DeploymentNumber = number;

export type DeploymentId = Readonly<{
  appId: AppId;
  deploymentNumber: DeploymentNumber;
}>;

/** Who asked for something, and when. */
export type Action = Readonly<{
  at: Date;
  by: UserId;
}>;

export function newId(): OpaqueId {
  return randomUUID();
}

export function actionBy(by: UserId, at: Date = new Date()): Action {
  return { at, by };
}

export function deploymentIdKey(id: DeploymentId): string {
  return `${id.appId}#${id.deploymentNumber}`;
}
