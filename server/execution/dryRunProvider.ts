import type { App, CleanupStrategy, Environment, Target } from "@platform/deployment/domain";
import type { Provider } from "./types";

function logBoundaryCrossing(method: string, detail: string): void {
  console.log(`[control-plane→provider] ${method} via DryRunProvider | ${detail}`);
}

/**
 * Provider that performs nothing and reports success, used until a real
 * provider is wired in and by local development.
 */
export class DryRunProvider implements Provider {
  async setup(target: Target): Promise<void> {
    logBoundaryCrossing("setup", `target=${target.id} provider=${target.provider.kind} url=${target.url.toString()}`);
  }

  async cleanupTarget(target: Target, strategy: CleanupStrategy): Promise<void> {
    logBoundaryCrossing("cleanupTarget", `target=${target.id} strategy=${strategy}`);
  }

  async cleanupApp(app: App, target: Target, environment: Environment, strategy: CleanupStrategy): Promise<void> {
    logBoundaryCrossing("cleanupApp", `app=${app.id} target=${target.id} env=${environment} strategy=${strategy}`);
  }
}
