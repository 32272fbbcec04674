import type { z } from "zod";
import {
  EnvironmentConfig,
  TargetUrl,
  parseProviderConfig,
  type Action,
  type AppSnapshot,
  type DeploymentSnapshot,
  type TargetSnapshot,
} from "@platform/deployment/domain";
import type { EventEnvelope } from "@platform/events";
import {
  insertAppSchema,
  insertDeploymentSchema,
  insertDomainEventSchema,
  insertTargetSchema,
  type AppRow,
  type DeploymentRow,
  type TargetRow,
  apps,
  deployments,
  domainEvents,
  targets,
} from "@shared/schema";

export type NewTargetRow = typeof targets.$inferInsert;
export type NewAppRow = typeof apps.$inferInsert;
export type NewDeploymentRow = typeof deployments.$inferInsert;
export type NewDomainEventRow = typeof domainEvents.$inferInsert;

export type Versioned<S> = { snapshot: S; version: number };

export class RowValidationError extends Error {
  constructor(entity: string, details: string[]) {
    super(`Invalid ${entity} row: ${details.join("; ")}`);
    this.name = "RowValidationError";
  }
}

function assertRow(schema: z.ZodTypeAny, entity: string, row: unknown): void {
  const result = schema.safeParse(row);
  if (!result.success) {
    throw new RowValidationError(
      entity,
      result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
}

function actionOf(at: Date | null, by: string | null): Action | undefined {
  return at && by ? { at, by } : undefined;
}

// --- Targets ---

export function targetToRow(snapshot: TargetSnapshot, version: number): NewTargetRow {
  const row: NewTargetRow = {
    id: snapshot.id,
    name: snapshot.name,
    url: snapshot.url.toString(),
    providerKind: snapshot.provider.kind,
    providerFingerprint: snapshot.provider.fingerprint(),
    provider: snapshot.provider.toJSON(),
    status: snapshot.state.status,
    stateVersion: snapshot.state.version,
    errorCode: snapshot.state.errorCode ?? null,
    lastReadyVersion: snapshot.state.lastReadyVersion ?? null,
    cleanupRequestedAt: snapshot.cleanupRequested?.at ?? null,
    cleanupRequestedBy: snapshot.cleanupRequested?.by ?? null,
    createdAt: snapshot.created.at,
    createdBy: snapshot.created.by,
    version,
  };
  assertRow(insertTargetSchema, "target", row);
  return row;
}

export function rowToTarget(row: TargetRow): Versioned<TargetSnapshot> {
  return {
    version: row.version,
    snapshot: {
      id: row.id,
      name: row.name,
      url: TargetUrl.parse(row.url),
      provider: parseProviderConfig(row.provider),
      state: {
        status: row.status,
        version: row.stateVersion,
        errorCode: row.errorCode ?? undefined,
        lastReadyVersion: row.lastReadyVersion ?? undefined,
      },
      cleanupRequested: actionOf(row.cleanupRequestedAt, row.cleanupRequestedBy),
      created: { at: row.createdAt, by: row.createdBy },
      deleted: false,
    },
  };
}

// --- Apps ---

export function appToRow(snapshot: AppSnapshot, version: number): NewAppRow {
  const row: NewAppRow = {
    id: snapshot.id,
    name: snapshot.name,
    productionTarget: snapshot.production.target,
    productionVars: snapshot.production.variables(),
    stagingTarget: snapshot.staging.target,
    stagingVars: snapshot.staging.variables(),
    cleanupRequestedAt: snapshot.cleanupRequested?.at ?? null,
    cleanupRequestedBy: snapshot.cleanupRequested?.by ?? null,
    createdAt: snapshot.created.at,
    createdBy: snapshot.created.by,
    version,
  };
  assertRow(insertAppSchema, "app", row);
  return row;
}

export function rowToApp(row: AppRow): Versioned<AppSnapshot> {
  return {
    version: row.version,
    snapshot: {
      id: row.id,
      name: row.name,
      production: new EnvironmentConfig(row.productionTarget, row.productionVars),
      staging: new EnvironmentConfig(row.stagingTarget, row.stagingVars),
      cleanupRequested: actionOf(row.cleanupRequestedAt, row.cleanupRequestedBy),
      created: { at: row.createdAt, by: row.createdBy },
      deleted: false,
    },
  };
}

// --- Deployments ---

export function deploymentToRow(snapshot: DeploymentSnapshot, version: number): NewDeploymentRow {
  const row: NewDeploymentRow = {
    appId: snapshot.id.appId,
    deploymentNumber: snapshot.id.deploymentNumber,
    appName: snapshot.config.appName,
    environment: snapshot.config.environment,
    target: snapshot.config.target,
    vars: snapshot.config.vars,
    sourceKind: snapshot.source.kind,
    sourceData: snapshot.source.data,
    status: snapshot.state.status,
    errorCode: snapshot.state.errorCode ?? null,
    startedAt: snapshot.state.startedAt ?? null,
    finishedAt: snapshot.state.finishedAt ?? null,
    requestedAt: snapshot.requested.at,
    requestedBy: snapshot.requested.by,
    version,
  };
  assertRow(insertDeploymentSchema, "deployment", row);
  return row;
}

export function rowToDeployment(row: DeploymentRow): Versioned<DeploymentSnapshot> {
  return {
    version: row.version,
    snapshot: {
      id: { appId: row.appId, deploymentNumber: row.deploymentNumber },
      config: {
        appId: row.appId,
        appName: row.appName,
        environment: row.environment,
        target: row.target,
        vars: row.vars,
      },
      source: { kind: row.sourceKind, data: row.sourceData },
      state: {
        status: row.status,
        errorCode: row.errorCode ?? undefined,
        startedAt: row.startedAt ?? undefined,
        finishedAt: row.finishedAt ?? undefined,
      },
      requested: { at: row.requestedAt, by: row.requestedBy },
    },
  };
}

// --- Outbox ---

/** Payloads go through JSON so value objects are stored by their toJSON form. */
export function envelopeToRow(envelope: EventEnvelope): NewDomainEventRow {
  const payload: unknown = JSON.parse(JSON.stringify(envelope.event));
  const row: NewDomainEventRow = {
    id: envelope.eventId,
    aggregate: envelope.aggregate,
    aggregateId: envelope.aggregateId,
    aggregateVersion: envelope.aggregateVersion,
    type: envelope.event.type,
    payload,
    occurredAt: new Date(envelope.occurredAt),
  };
  assertRow(insertDomainEventSchema, "domain event", row);
  return row;
}
