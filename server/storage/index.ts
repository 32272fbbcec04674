export { PgTargetsStore } from "./PgTargetsStore";
export { PgAppsStore } from "./PgAppsStore";
export { PgDeploymentsStore } from "./PgDeploymentsStore";
export { persist, translateUniqueViolation, type Transaction, type UnitOfWork } from "./persist";
export * from "./mappers";
