import type {
  AppsReader,
  AppsWriter,
  DeploymentsReader,
  DeploymentsWriter,
  TargetsReader,
  TargetsWriter,
} from "@platform/deployment/store";
import type { Provider } from "../execution";

export type Repositories = {
  targets: TargetsReader & TargetsWriter;
  apps: AppsReader & AppsWriter;
  deployments: DeploymentsReader & DeploymentsWriter;
};

export type CommandDependencies = Repositories & {
  provider: Provider;
};
