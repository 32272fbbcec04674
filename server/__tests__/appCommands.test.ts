import { describe, it, expect, beforeEach } from "vitest";
import { CleanupStrategy, ErrorCode } from "@platform/deployment/domain";
import { createHarness, unwrap, type Harness } from "./harness";

describe("app commands", () => {
  let h: Harness;
  let production: string;
  let staging: string;

  beforeEach(async () => {
    h = createHarness();
    production = await h.createConfiguredTarget("http://prod.local", "10.0.0.1");
    staging = await h.createConfiguredTarget("http://staging.local", "10.0.0.2");
  });

  describe("app.create", () => {
    it("binds both environments", async () => {
      const result = await h.dispatch("app.create", {
        name: "my-app",
        production: { target: production, vars: { web: { PORT: "80" } } },
        staging: { target: staging },
      });

      const id = unwrap(result);
      if (typeof id !== "string") throw new Error("expected an app id");
      const app = await h.apps.getById(id);
      expect(app?.name).toBe("my-app");
      expect(app?.environmentConfig("production").variables()).toEqual({ web: { PORT: "80" } });
      expect(app?.environmentConfig("staging").target).toBe(staging);
    });

    it("rejects a name already taken", async () => {
      await h.createApp("my-app", production, staging);

      const result = await h.dispatch("app.create", {
        name: "my-app",
        production: { target: production },
        staging: { target: staging },
      });

      expect(result.ok ? undefined : result.error.code).toBe(ErrorCode.AppNameAlreadyTaken);
    });

    it("lets one of two concurrent creates with the same name through", async () => {
      const payload = { name: "dup", production: { target: production }, staging: { target: staging } };

      const results = await Promise.all([h.dispatch("app.create", payload), h.dispatch("app.create", payload)]);

      expect(results.filter((r) => r.ok)).toHaveLength(1);
      expect(results.flatMap((r) => (r.ok ? [] : [r.error.code]))).toEqual([ErrorCode.AppNameAlreadyTaken]);
    });

    it("rejects an unknown target", async () => {
      const result = await h.dispatch("app.create", {
        name: "my-app",
        production: { target: "missing" },
        staging: { target: staging },
      });

      expect(result.ok ? undefined : result.error.code).toBe(ErrorCode.TargetNotFound);
    });

    it("rejects an invalid name", async () => {
      const result = await h.dispatch("app.create", {
        name: "My App",
        production: { target: production },
        staging: { target: staging },
      });

      expect(result.ok ? undefined : result.error.code).toBe(ErrorCode.InvalidAppName);
    });
  });

  describe("app.update", () => {
    it("changes only the given environment", async () => {
      const id = await h.createApp("my-app", production, staging);

      unwrap(await h.dispatch("app.update", { id, staging: { target: production, vars: { web: { DEBUG: "1" } } } }));

      const app = await h.apps.getById(id);
      expect(app?.environmentConfig("staging").target).toBe(production);
      expect(app?.environmentConfig("production").target).toBe(production);
      expect(h.sink.types().slice(-1)).toEqual(["app.env_changed"]);
    });

    it("does not conflict with its own name", async () => {
      const id = await h.createApp("my-app", production, staging);

      const result = await h.dispatch("app.update", { id, production: { target: staging } });

      expect(result.ok).toBe(true);
    });
  });

  describe("app cleanup", () => {
    it("requires a cleanup request first", async () => {
      const id = await h.createApp("my-app", production, staging);

      const result = await h.dispatch("app.cleanup", { id, environment: "production" });

      expect(result.ok ? undefined : result.error.code).toBe(ErrorCode.AppCleanupNotRequested);
    });

    it("skips environments that never had a successful deployment", async () => {
      const id = await h.createApp("my-app", production, staging);
      unwrap(await h.dispatch("app.request_cleanup", { id }));

      const result = await h.dispatch("app.cleanup", { id, environment: "staging" });

      expect(result).toEqual({ ok: true, value: CleanupStrategy.Skip });
      expect(h.provider.cleanupApp).toHaveBeenCalledTimes(1);
      expect(h.provider.cleanupApp.mock.calls[0]?.[2]).toBe("staging");
      expect(h.provider.cleanupApp.mock.calls[0]?.[3]).toBe(CleanupStrategy.Skip);
    });

    it("removes resources of a succeeded deployment", async () => {
      const id = await h.createApp("my-app", production, staging);
      const deploymentNumber = await h.queue(id, "production");
      unwrap(await h.dispatch("deployment.start", { appId: id, deploymentNumber }));
      unwrap(await h.dispatch("deployment.end", { appId: id, deploymentNumber }));
      unwrap(await h.dispatch("app.request_cleanup", { id }));

      const result = await h.dispatch("app.cleanup", { id, environment: "production" });

      expect(result).toEqual({ ok: true, value: CleanupStrategy.Default });
    });

    it("waits for pending deployments", async () => {
      const id = await h.createApp("my-app", production, staging);
      await h.queue(id, "production");
      unwrap(await h.dispatch("app.request_cleanup", { id }));

      const result = await h.dispatch("app.cleanup", { id, environment: "production" });

      expect(result.ok ? undefined : result.error.code).toBe(ErrorCode.RunningOrPendingDeployments);
      expect(h.provider.cleanupApp).not.toHaveBeenCalled();
    });

    it("blocks new deployments once requested", async () => {
      const id = await h.createApp("my-app", production, staging);
      unwrap(await h.dispatch("app.request_cleanup", { id }));

      const result = await h.dispatch("deployment.queue", {
        appId: id,
        environment: "staging",
        source: { kind: "git", data: "main" },
      });

      expect(result.ok ? undefined : result.error.code).toBe(ErrorCode.AppCleanupRequested);
    });

    it("deletes the app after its cleanup request", async () => {
      const id = await h.createApp("my-app", production, staging);

      const early = await h.dispatch("app.delete", { id });
      expect(early.ok ? undefined : early.error.code).toBe(ErrorCode.AppCleanupNeeded);

      unwrap(await h.dispatch("app.request_cleanup", { id }));
      unwrap(await h.dispatch("app.delete", { id }));

      expect(await h.apps.getById(id)).toBeNull();
      expect(await h.apps.hasAppsOnTarget(production)).toBe(false);
    });
  });
});
