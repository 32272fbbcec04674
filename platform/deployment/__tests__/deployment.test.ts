import { describe, it, expect } from "vitest";
import { App, Deployment, DeploymentStatus, ErrorCode } from "../domain";
import { UID, envRequirement, errorCodeOf, eventAt } from "./fixtures";

function makeDeployment(): Deployment {
  const app = App.create("my-app", envRequirement("production-target"), envRequirement("staging-target"), UID);
  return app.newDeployment(0, { kind: "git", data: "main" }, "production", UID);
}

describe("Deployment", () => {
  it("starts from pending", () => {
    const deployment = makeDeployment();
    const at = new Date("2026-03-01T10:00:00.000Z");

    deployment.hasStarted(at);

    const evt = eventAt(deployment, 1, "deployment.state_changed");
    expect(evt.state).toEqual({ status: DeploymentStatus.Running, startedAt: at });
    expect(deployment.status).toBe(DeploymentStatus.Running);
  });

  it("could not start twice", () => {
    const deployment = makeDeployment();
    deployment.hasStarted();

    expect(errorCodeOf(() => deployment.hasStarted())).toBe(ErrorCode.DeploymentNotPending);
  });

  it("could not end before it started", () => {
    expect(errorCodeOf(() => makeDeployment().hasEnded())).toBe(ErrorCode.DeploymentNotRunning);
  });

  it("succeeds when ended without error", () => {
    const deployment = makeDeployment();
    const startedAt = new Date("2026-03-01T10:00:00.000Z");
    const finishedAt = new Date("2026-03-01T10:05:00.000Z");
    deployment.hasStarted(startedAt);

    deployment.hasEnded(undefined, finishedAt);

    expect(deployment.snapshot().state).toEqual({
      status: DeploymentStatus.Succeeded,
      errorCode: undefined,
      startedAt,
      finishedAt,
    });
  });

  it("fails with the error message as error code", () => {
    const deployment = makeDeployment();
    deployment.hasStarted();

    deployment.hasEnded(new Error("compose: build failed"));

    expect(deployment.status).toBe(DeploymentStatus.Failed);
    expect(deployment.snapshot().state.errorCode).toBe("compose: build failed");
  });
});
