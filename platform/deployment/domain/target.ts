import { AggregateRoot } from "./aggregate";
import {
  providerUpdateNotPermitted,
  runningOrPendingDeployments,
  targetCleanupNeeded,
  targetCleanupRequested,
  targetConfigurationFailed,
  targetConfigurationInProgress,
  targetInUse,
} from "./errors";
import type { TargetEvent } from "./events";
import { actionBy, newId, type Action, type TargetId, type UserId } from "./ids";
import type { ProviderConfig } from "./provider";
import type { ProviderConfigRequirement, TargetUrlRequirement } from "./requirement";
import type { TargetUrl } from "./url";

export const TargetStatus = {
  Configuring: "configuring",
  Ready: "ready",
  Failed: "failed",
} as const;

export type TargetStatus = (typeof TargetStatus)[keyof typeof TargetStatus];

export const CleanupStrategy = {
  Default: "default",
  Skip: "skip",
} as const;

export type CleanupStrategy = (typeof CleanupStrategy)[keyof typeof CleanupStrategy];

/**
 * Configuration state of a target. `version` tags the configuration attempt
 * the state refers to; `lastReadyVersion` remembers the last attempt that
 * made the target reachable.
 */
export type TargetState = Readonly<{
  status: TargetStatus;
  version: Date;
  errorCode?: string;
  lastReadyVersion?: Date;
}>;

export type TargetSnapshot = Readonly<{
  id: TargetId;
  name: string;
  url: TargetUrl;
  provider: ProviderConfig;
  state: TargetState;
  cleanupRequested?: Action;
  created: Action;
  deleted: boolean;
}>;

/** Versions only move forward, even for two attempts within the same millisecond. */
function nextVersion(previous: Date): Date {
  return new Date(Math.max(Date.now(), previous.getTime() + 1));
}

function errorCodeOf(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export class Target extends AggregateRoot<TargetSnapshot, TargetEvent> {
  private constructor(snapshot: TargetSnapshot, version: number) {
    super(snapshot, version);
  }

  static create(
    name: string,
    urlRequirement: TargetUrlRequirement,
    configRequirement: ProviderConfigRequirement,
    requestedBy: UserId,
  ): Target {
    const url = urlRequirement.met();
    const provider = configRequirement.met();
    const created = actionBy(requestedBy);

    const snapshot: TargetSnapshot = {
      id: newId(),
      name,
      url,
      provider,
      state: { status: TargetStatus.Configuring, version: created.at },
      created,
      deleted: false,
    };

    const target = new Target(snapshot, 0);
    target.record({
      type: "target.created",
      id: snapshot.id,
      name,
      url,
      provider,
      state: snapshot.state,
      created,
    });
    return target;
  }

  static restore(snapshot: TargetSnapshot, version: number): Target {
    return new Target(snapshot, version);
  }

  get id(): TargetId {
    return this.state.id;
  }

  get name(): string {
    return this.state.name;
  }

  get url(): TargetUrl {
    return this.state.url;
  }

  get provider(): ProviderConfig {
    return this.state.provider;
  }

  get status(): TargetStatus {
    return this.state.state.status;
  }

  get cleanupRequested(): Action | undefined {
    return this.state.cleanupRequested;
  }

  get isDeleted(): boolean {
    return this.state.deleted;
  }

  currentVersion(): Date {
    return new Date(this.state.state.version.getTime());
  }

  rename(name: string): void {
    this.ensureNotCleaningUp();

    if (this.state.name === name) return;

    this.raise({ type: "target.renamed", id: this.id, name });
  }

  hasUrl(requirement: TargetUrlRequirement): void {
    this.ensureNotCleaningUp();

    const url = requirement.met();
    if (this.state.url.equals(url)) return;

    this.raise({ type: "target.url_changed", id: this.id, url });
    this.reconfigureState();
  }

  hasProvider(requirement: ProviderConfigRequirement): void {
    this.ensureNotCleaningUp();

    const provider = requirement.met();

    if (this.state.provider.fingerprint() !== provider.fingerprint()) {
      throw providerUpdateNotPermitted();
    }

    if (this.state.provider.equals(provider)) return;

    this.raise({ type: "target.provider_changed", id: this.id, provider });
    this.reconfigureState();
  }

  /**
   * Reports the outcome of the configuration attempt tagged by `version`.
   * Reports older than the current attempt are ignored.
   */
  configured(version: Date, err?: unknown): void {
    const current = this.state.state;
    if (version.getTime() < current.version.getTime()) return;

    const failed = err !== undefined && err !== null;
    const next: TargetState = failed
      ? {
          status: TargetStatus.Failed,
          version,
          errorCode: errorCodeOf(err),
          lastReadyVersion: current.lastReadyVersion,
        }
      : { status: TargetStatus.Ready, version, lastReadyVersion: version };

    if (next.status === current.status && next.errorCode === current.errorCode) {
      this.state = { ...this.state, state: next };
      return;
    }

    this.raiseCollapsed({ type: "target.state_changed", id: this.id, state: next });
  }

  reconfigure(): void {
    this.ensureNotCleaningUp();

    if (this.state.state.status === TargetStatus.Configuring) {
      throw targetConfigurationInProgress();
    }

    this.reconfigureState();
  }

  checkAvailability(): void {
    switch (this.state.state.status) {
      case TargetStatus.Configuring:
        throw targetConfigurationInProgress();
      case TargetStatus.Failed:
        throw targetConfigurationFailed();
    }

    this.ensureNotCleaningUp();
  }

  requestCleanup(usedByApps: boolean, requestedBy: UserId): void {
    if (this.state.cleanupRequested) return;

    if (this.state.state.status === TargetStatus.Configuring) {
      throw targetConfigurationInProgress();
    }

    if (usedByApps) {
      throw targetInUse();
    }

    this.raise({ type: "target.cleanup_requested", id: this.id, requested: actionBy(requestedBy) });
  }

  /** How the resources of the whole target should be removed. */
  cleanupStrategy(hasRunningOrPendingDeployments: boolean): CleanupStrategy {
    const { status, lastReadyVersion } = this.state.state;

    if (status === TargetStatus.Configuring) throw targetConfigurationInProgress();
    if (hasRunningOrPendingDeployments) throw runningOrPendingDeployments();

    if (status === TargetStatus.Failed) {
      // Never reachable, or could not be fixed anymore: nothing to remove.
      if (!lastReadyVersion || this.state.cleanupRequested) return CleanupStrategy.Skip;
      throw targetConfigurationFailed();
    }

    return CleanupStrategy.Default;
  }

  /** How the resources of one app deployed on this target should be removed. */
  appCleanupStrategy(hasRunningOrPendingDeployments: boolean, hasSucceededDeployment: boolean): CleanupStrategy {
    if (this.state.cleanupRequested) return CleanupStrategy.Skip;
    if (hasRunningOrPendingDeployments) throw runningOrPendingDeployments();
    if (!hasSucceededDeployment) return CleanupStrategy.Skip;

    switch (this.state.state.status) {
      case TargetStatus.Configuring:
        throw targetConfigurationInProgress();
      case TargetStatus.Failed:
        throw targetConfigurationFailed();
    }

    return CleanupStrategy.Default;
  }

  delete(resourcesCleanedUp: boolean): void {
    if (!this.state.cleanupRequested || !resourcesCleanedUp) {
      throw targetCleanupNeeded();
    }

    this.raise({ type: "target.deleted", id: this.id });
  }

  private ensureNotCleaningUp(): void {
    if (this.state.cleanupRequested) throw targetCleanupRequested();
  }

  private reconfigureState(): void {
    const current = this.state.state;
    this.raiseCollapsed({
      type: "target.state_changed",
      id: this.id,
      state: {
        status: TargetStatus.Configuring,
        version: nextVersion(current.version),
        lastReadyVersion: current.lastReadyVersion,
      },
    });
  }

  protected evolve(state: TargetSnapshot, event: TargetEvent): TargetSnapshot {
    switch (event.type) {
      case "target.created":
        return state;
      case "target.renamed":
        return { ...state, name: event.name };
      case "target.url_changed":
        return { ...state, url: event.url };
      case "target.provider_changed":
        return { ...state, provider: event.provider };
      case "target.state_changed":
        return { ...state, state: event.state };
      case "target.cleanup_requested":
        return { ...state, cleanupRequested: event.requested };
      case "target.deleted":
        return { ...state, deleted: true };
    }
  }
}
