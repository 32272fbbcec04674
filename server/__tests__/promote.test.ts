import { describe, it, expect, beforeEach } from "vitest";
import { ErrorCode } from "@platform/deployment/domain";
import { promoteCommand } from "../commands/promote";
import { createHarness, type Harness } from "./harness";

describe("deployment.promote", () => {
  let h: Harness;
  let appId: string;

  beforeEach(async () => {
    h = createHarness();
    const production = await h.createConfiguredTarget("http://prod.local", "10.0.0.1");
    const staging = await h.createConfiguredTarget("http://staging.local", "10.0.0.2");
    appId = await h.createApp("my-app", production, staging);
  });

  it("fails if the app does not exist", async () => {
    const result = await h.run(promoteCommand(h.deps), { appId: "some-app-id", deploymentNumber: 1 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("NotFound");
    expect(result.error.message).toBe("App not found");
  });

  it("fails if the source deployment does not exist", async () => {
    const result = await h.run(promoteCommand(h.deps), { appId, deploymentNumber: 1 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("NotFound");
    expect(result.error.message).toBe("Deployment not found");
  });

  it("creates a production deployment from a staging one", async () => {
    const number = await h.queue(appId, "staging", "feature/login");

    const result = await h.run(promoteCommand(h.deps), { appId, deploymentNumber: number });

    expect(result).toEqual({ ok: true, value: 2 });
    const promoted = await h.deployments.getById({ appId, deploymentNumber: 2 });
    expect(promoted?.config.environment).toBe("production");
    expect(promoted?.source).toEqual({ kind: "git", data: "feature/login" });
    expect(promoted?.requested.by).toBe("user-1");
  });

  it("keeps numbers strictly increasing across promotions", async () => {
    const number = await h.queue(appId, "staging");
    const promote = promoteCommand(h.deps);

    const values: unknown[] = [];
    for (let i = 0; i < 3; i++) {
      const result = await h.run(promote, { appId, deploymentNumber: number });
      values.push(result.ok ? result.value : result.error.code);
    }

    expect(values).toEqual([2, 3, 4]);
  });

  it("refuses to promote a production deployment", async () => {
    const number = await h.queue(appId, "production");

    const result = await h.run(promoteCommand(h.deps), { appId, deploymentNumber: number });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ErrorCode.CouldNotPromoteProductionDeployment);
    expect(await h.deployments.latestDeploymentNumber(appId)).toBe(1);
  });

  it("requires a requester", async () => {
    const number = await h.queue(appId, "staging");

    const result = await h.run(promoteCommand(h.deps), { appId, deploymentNumber: number }, { source: "header" });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ErrorCode.RequesterRequired);
  });

  it("writes the new deployment only", async () => {
    const number = await h.queue(appId, "staging");
    const before = h.sink.events.length;

    await h.run(promoteCommand(h.deps), { appId, deploymentNumber: number });

    const emitted = h.sink.events.slice(before);
    expect(emitted.map((e) => [e.aggregate, e.aggregateId, e.event.type])).toEqual([
      ["deployment", `${appId}#2`, "deployment.created"],
    ]);
  });
});
