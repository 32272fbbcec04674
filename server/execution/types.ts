import type { App, CleanupStrategy, Environment, Target } from "@platform/deployment/domain";

/**
 * Boundary to whatever provisions targets and runs deployments (docker
 * engine, cluster...). The domain core only decides what should happen.
 */
export interface Provider {
  /** Prepares the target. Rejects when the target could not be configured. */
  setup(target: Target): Promise<void>;
  cleanupTarget(target: Target, strategy: CleanupStrategy): Promise<void>;
  cleanupApp(app: App, target: Target, environment: Environment, strategy: CleanupStrategy): Promise<void>;
}
