export type {
  TargetsReader,
  TargetsWriter,
  AppsReader,
  AppsWriter,
  DeploymentsReader,
  DeploymentsWriter,
} from "./types";
export { VersionedTable, type VersionedRecord } from "./VersionedTable";
export { InMemoryTargetsStore } from "./InMemoryTargetsStore";
export { InMemoryAppsStore } from "./InMemoryAppsStore";
export { InMemoryDeploymentsStore } from "./InMemoryDeploymentsStore";
