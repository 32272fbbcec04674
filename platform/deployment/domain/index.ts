/**
 * Deployment domain
 *
 * Aggregates (Target, App, Deployment), their value objects, requirements,
 * events and errors. Nothing in this module performs I/O: facts that need a
 * store are resolved by callers and handed in as requirements.
 *
 * @module platform/deployment/domain
 */

export * from "./errors";
export * from "./ids";
export * from "./url";
export * from "./provider";
export * from "./environment";
export * from "./requirement";
export * from "./events";
export { AggregateRoot } from "./aggregate";
export * from "./target";
export * from "./app";
export * from "./deployment";
