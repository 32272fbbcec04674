import { sql } from "drizzle-orm";
import {
  pgTable,
  text,
  varchar,
  timestamp,
  pgEnum,
  integer,
  jsonb,
  primaryKey,
  index,
  unique,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";
import type { ProviderConfigData, ServicesEnv } from "@platform/deployment/domain";

export const targetStatusEnum = pgEnum("target_status", [
  "configuring",
  "ready",
  "failed",
]);

export const deploymentStatusEnum = pgEnum("deployment_status", [
  "pending",
  "running",
  "succeeded",
  "failed",
]);

export const environmentNameEnum = pgEnum("environment_name", [
  "production",
  "staging",
]);

export const aggregateKindEnum = pgEnum("aggregate_kind", [
  "target",
  "app",
  "deployment",
]);

// Targets: url and provider fingerprint are unique among existing targets.
export const targets = pgTable("targets", {
  id: varchar("id").primaryKey(),
  name: text("name").notNull(),
  url: text("url").notNull(),
  providerKind: text("provider_kind").notNull(),
  providerFingerprint: text("provider_fingerprint").notNull(),
  provider: jsonb("provider").$type<ProviderConfigData>().notNull(),
  status: targetStatusEnum("status").notNull(),
  stateVersion: timestamp("state_version", { precision: 3 }).notNull(),
  errorCode: text("error_code"),
  lastReadyVersion: timestamp("last_ready_version", { precision: 3 }),
  cleanupRequestedAt: timestamp("cleanup_requested_at"),
  cleanupRequestedBy: varchar("cleanup_requested_by"),
  createdAt: timestamp("created_at").notNull(),
  createdBy: varchar("created_by").notNull(),
  version: integer("version").notNull(),
}, (table) => [
  unique("uq_targets_url").on(table.url),
  unique("uq_targets_provider_fingerprint").on(table.providerFingerprint),
]);

export const apps = pgTable("apps", {
  id: varchar("id").primaryKey(),
  name: text("name").notNull(),
  productionTarget: varchar("production_target").notNull(),
  productionVars: jsonb("production_vars").$type<ServicesEnv>().notNull(),
  stagingTarget: varchar("staging_target").notNull(),
  stagingVars: jsonb("staging_vars").$type<ServicesEnv>().notNull(),
  cleanupRequestedAt: timestamp("cleanup_requested_at"),
  cleanupRequestedBy: varchar("cleanup_requested_by"),
  createdAt: timestamp("created_at").notNull(),
  createdBy: varchar("created_by").notNull(),
  version: integer("version").notNull(),
}, (table) => [
  unique("uq_apps_name").on(table.name),
  index("idx_apps_production_target").on(table.productionTarget),
  index("idx_apps_staging_target").on(table.stagingTarget),
]);

// Deployments are keyed by (app_id, deployment_number); numbers are never reused.
export const deployments = pgTable("deployments", {
  appId: varchar("app_id").notNull(),
  deploymentNumber: integer("deployment_number").notNull(),
  appName: text("app_name").notNull(),
  environment: environmentNameEnum("environment").notNull(),
  target: varchar("target").notNull(),
  vars: jsonb("vars").$type<ServicesEnv>().notNull(),
  sourceKind: text("source_kind").notNull(),
  sourceData: text("source_data").notNull(),
  status: deploymentStatusEnum("status").notNull(),
  errorCode: text("error_code"),
  startedAt: timestamp("started_at"),
  finishedAt: timestamp("finished_at"),
  requestedAt: timestamp("requested_at").notNull(),
  requestedBy: varchar("requested_by").notNull(),
  version: integer("version").notNull(),
}, (table) => [
  primaryKey({ columns: [table.appId, table.deploymentNumber] }),
  index("idx_deployments_target_status").on(table.target, table.status),
]);

// Outbox: events appended in the transaction that persisted their aggregate.
export const domainEvents = pgTable("domain_events", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  aggregate: aggregateKindEnum("aggregate").notNull(),
  aggregateId: varchar("aggregate_id").notNull(),
  aggregateVersion: integer("aggregate_version").notNull(),
  type: text("type").notNull(),
  payload: jsonb("payload").notNull(),
  occurredAt: timestamp("occurred_at").defaultNow().notNull(),
  dispatchedAt: timestamp("dispatched_at"),
}, (table) => [
  index("idx_domain_events_pending").on(table.dispatchedAt),
]);

export const insertTargetSchema = createInsertSchema(targets);
export const insertAppSchema = createInsertSchema(apps);
export const insertDeploymentSchema = createInsertSchema(deployments);
export const insertDomainEventSchema = createInsertSchema(domainEvents).omit({
  dispatchedAt: true,
});

export type InsertTarget = z.infer<typeof insertTargetSchema>;
export type TargetRow = typeof targets.$inferSelect;

export type InsertApp = z.infer<typeof insertAppSchema>;
export type AppRow = typeof apps.$inferSelect;

export type InsertDeployment = z.infer<typeof insertDeploymentSchema>;
export type DeploymentRow = typeof deployments.$inferSelect;

export type InsertDomainEvent = z.infer<typeof insertDomainEventSchema>;
export type DomainEventRow = typeof domainEvents.$inferSelect;
