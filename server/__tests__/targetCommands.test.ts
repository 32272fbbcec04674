import { describe, it, expect, beforeEach } from "vitest";
import { CleanupStrategy, ErrorCode, TargetStatus } from "@platform/deployment/domain";
import { createSystemContext } from "../context";
import { createHarness, unwrap, type Harness } from "./harness";

const system = createSystemContext("system");

describe("target commands", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  describe("target.create", () => {
    it("creates a configuring target", async () => {
      const id = await h.createTarget();

      const target = await h.targets.getById(id);
      expect(target?.status).toBe(TargetStatus.Configuring);
      expect(target?.provider.toJSON()).toEqual({ kind: "docker", host: "10.0.0.1" });
      expect(h.sink.types()).toEqual(["target.created"]);
    });

    it("rejects a url already used by another target", async () => {
      await h.createTarget("http://my-url.com", "10.0.0.1");

      const result = await h.dispatch("target.create", {
        name: "other",
        url: "http://my-url.com/",
        provider: { kind: "docker", host: "10.0.0.2" },
      });

      expect(result.ok ? undefined : result.error.code).toBe(ErrorCode.UrlAlreadyTaken);
    });

    it("rejects a provider already used by another target", async () => {
      await h.createTarget("http://my-url.com", "10.0.0.1");

      const result = await h.dispatch("target.create", {
        name: "other",
        url: "http://other-url.com",
        provider: { kind: "docker", host: "10.0.0.1", user: "admin" },
      });

      expect(result.ok ? undefined : result.error.code).toBe(ErrorCode.ConfigAlreadyTaken);
    });

    it("lets one of two concurrent creates for the same url and provider through", async () => {
      const payload = { name: "target", url: "http://same.local", provider: { kind: "docker", host: "10.0.0.9" } };

      const results = await Promise.all([h.dispatch("target.create", payload), h.dispatch("target.create", payload)]);

      expect(results.filter((r) => r.ok)).toHaveLength(1);
      expect(results.flatMap((r) => (r.ok ? [] : [r.error.code]))).toEqual([ErrorCode.UrlAlreadyTaken]);
      expect(h.sink.types()).toEqual(["target.created"]);
    });

    it("rejects an invalid url", async () => {
      const result = await h.dispatch("target.create", {
        name: "target",
        url: "ftp://my-url.com",
        provider: { kind: "docker" },
      });

      expect(result.ok ? undefined : result.error.code).toBe(ErrorCode.InvalidUrl);
    });
  });

  describe("target.configure", () => {
    it("marks the target ready when the provider setup succeeds", async () => {
      const id = await h.createConfiguredTarget();

      expect(h.provider.setup).toHaveBeenCalledTimes(1);
      expect(h.provider.setup.mock.calls[0]?.[0].id).toBe(id);
      expect((await h.targets.getById(id))?.status).toBe(TargetStatus.Ready);
    });

    it("records a failed setup as the outcome", async () => {
      const id = await h.createConfiguredTarget(undefined, undefined, new Error("docker: connection refused"));

      const target = await h.targets.getById(id);
      expect(target?.status).toBe(TargetStatus.Failed);
      expect(target?.snapshot().state.errorCode).toBe("docker: connection refused");
    });

    it("skips attempts superseded by a newer one", async () => {
      const id = await h.createTarget();
      const created = await h.targets.getById(id);
      if (!created) throw new Error("target not saved");
      const staleVersion = created.currentVersion();

      unwrap(await h.dispatch("target.update", { id, url: "http://new-url.com" }));
      const result = await h.dispatch("target.configure", { id, version: staleVersion }, system);

      expect(result.ok).toBe(true);
      expect(h.provider.setup).not.toHaveBeenCalled();
      expect((await h.targets.getById(id))?.status).toBe(TargetStatus.Configuring);
    });

    it("accepts the version as an ISO string", async () => {
      const id = await h.createTarget();
      const target = await h.targets.getById(id);
      if (!target) throw new Error("target not saved");

      unwrap(await h.dispatch("target.configure", { id, version: target.currentVersion().toISOString() }, system));

      expect((await h.targets.getById(id))?.status).toBe(TargetStatus.Ready);
    });
  });

  describe("target.update", () => {
    it("renames without reconfiguring", async () => {
      const id = await h.createConfiguredTarget();

      unwrap(await h.dispatch("target.update", { id, name: "renamed" }));

      const target = await h.targets.getById(id);
      expect(target?.name).toBe("renamed");
      expect(target?.status).toBe(TargetStatus.Ready);
    });

    it("reconfigures when the url changes", async () => {
      const id = await h.createConfiguredTarget();

      unwrap(await h.dispatch("target.update", { id, url: "https://new-url.com" }));

      const target = await h.targets.getById(id);
      expect(target?.url.toString()).toBe("https://new-url.com");
      expect(target?.status).toBe(TargetStatus.Configuring);
    });

    it("refuses to move the target to another host", async () => {
      const id = await h.createConfiguredTarget();

      const result = await h.dispatch("target.update", { id, provider: { kind: "docker", host: "10.9.9.9" } });

      expect(result.ok ? undefined : result.error.code).toBe(ErrorCode.ProviderUpdateNotPermitted);
    });

    it("reports a missing target", async () => {
      const result = await h.dispatch("target.update", { id: "missing", name: "x" });

      expect(result.ok ? undefined : result.error.message).toBe("Target not found");
    });
  });

  describe("target.reconfigure", () => {
    it("is rejected while configuring", async () => {
      const id = await h.createTarget();

      const result = await h.dispatch("target.reconfigure", { id });

      expect(result.ok ? undefined : result.error.code).toBe(ErrorCode.TargetConfigurationInProgress);
    });

    it("starts a new attempt on a failed target", async () => {
      const id = await h.createConfiguredTarget(undefined, undefined, new Error("boom"));

      unwrap(await h.dispatch("target.reconfigure", { id }));

      expect((await h.targets.getById(id))?.status).toBe(TargetStatus.Configuring);
    });
  });

  describe("target cleanup", () => {
    it("is rejected while an app uses the target", async () => {
      const id = await h.createConfiguredTarget();
      await h.createApp("my-app", id, id);

      const result = await h.dispatch("target.request_cleanup", { id });

      expect(result.ok ? undefined : result.error.code).toBe(ErrorCode.TargetInUse);
    });

    it("could not clean up before a request", async () => {
      const id = await h.createConfiguredTarget();

      const result = await h.dispatch("target.cleanup", { id });

      expect(result.ok ? undefined : result.error.code).toBe(ErrorCode.TargetCleanupNeeded);
      expect(h.provider.cleanupTarget).not.toHaveBeenCalled();
    });

    it("cleans up through the provider then deletes the target", async () => {
      const id = await h.createConfiguredTarget();
      unwrap(await h.dispatch("target.request_cleanup", { id }));

      const result = await h.dispatch("target.cleanup", { id });

      expect(result).toEqual({ ok: true, value: CleanupStrategy.Default });
      expect(h.provider.cleanupTarget).toHaveBeenCalledTimes(1);
      const [cleaned, strategy] = h.provider.cleanupTarget.mock.calls[0] ?? [];
      expect(cleaned?.id).toBe(id);
      expect(strategy).toBe(CleanupStrategy.Default);
      expect(await h.targets.getById(id)).toBeNull();
      expect(h.sink.types().slice(-2)).toEqual(["target.cleanup_requested", "target.deleted"]);
    });

    it("skips resources of a target that never became reachable", async () => {
      const id = await h.createConfiguredTarget(undefined, undefined, new Error("unreachable"));
      unwrap(await h.dispatch("target.request_cleanup", { id }));

      const result = await h.dispatch("target.cleanup", { id });

      expect(result).toEqual({ ok: true, value: CleanupStrategy.Skip });
    });

    it("waits for deployments still pending on the target", async () => {
      const id = await h.createConfiguredTarget();
      const appId = await h.createApp("my-app", id, id);
      await h.queue(appId, "production");
      unwrap(await h.dispatch("app.request_cleanup", { id: appId }));
      unwrap(await h.dispatch("app.delete", { id: appId }));
      unwrap(await h.dispatch("target.request_cleanup", { id }));

      const result = await h.dispatch("target.cleanup", { id });

      expect(result.ok ? undefined : result.error.code).toBe(ErrorCode.RunningOrPendingDeployments);
      expect(await h.targets.getById(id)).not.toBeNull();
    });
  });
});
