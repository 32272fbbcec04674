import {
  Target,
  configAlreadyTaken,
  providerConfigRequirement,
  targetUrlRequirement,
  urlAlreadyTaken,
  type Action,
  type ProviderConfig,
  type ProviderConfigRequirement,
  type TargetId,
  type TargetSnapshot,
  type TargetUrl,
  type TargetUrlRequirement,
} from "../domain";
import { envelop, type EventSink } from "../../events";
import type { TargetsReader, TargetsWriter } from "./types";
import { VersionedTable } from "./VersionedTable";

function copyAction(action: Action): Action {
  return { at: new Date(action.at.getTime()), by: action.by };
}

function copyTarget(snapshot: TargetSnapshot): TargetSnapshot {
  const { state } = snapshot;
  return {
    ...snapshot,
    state: {
      ...state,
      version: new Date(state.version.getTime()),
      lastReadyVersion: state.lastReadyVersion ? new Date(state.lastReadyVersion.getTime()) : undefined,
    },
    cleanupRequested: snapshot.cleanupRequested ? copyAction(snapshot.cleanupRequested) : undefined,
    created: copyAction(snapshot.created),
  };
}

export class InMemoryTargetsStore implements TargetsReader, TargetsWriter {
  private readonly table = new VersionedTable<TargetSnapshot>("target", copyTarget);

  constructor(private readonly sink: EventSink) {}

  async getById(id: TargetId): Promise<Target | null> {
    const row = this.table.get(id);
    return row ? Target.restore(row.snapshot, row.version) : null;
  }

  async checkUrlAvailability(url: TargetUrl, excluding?: TargetId): Promise<TargetUrlRequirement> {
    const taken = this.others(excluding).some((t) => t.url.equals(url));
    return targetUrlRequirement(url, !taken);
  }

  async checkConfigAvailability(config: ProviderConfig, excluding?: TargetId): Promise<ProviderConfigRequirement> {
    const fingerprint = config.fingerprint();
    const taken = this.others(excluding).some((t) => t.provider.fingerprint() === fingerprint);
    return providerConfigRequirement(config, !taken);
  }

  async save(target: Target): Promise<void> {
    const events = target.pendingEvents();
    if (!target.isDeleted) this.ensureUnique(target);

    const version = target.isDeleted
      ? this.table.remove(target.id, target.version)
      : this.table.write(target.id, target.version, target.snapshot());

    target.commit(version);
    await this.sink.emit(envelop("target", target.id, version, events));
  }

  /** Url and fingerprint stay unique at write time, whatever the earlier availability check said. */
  private ensureUnique(target: Target): void {
    const others = this.others(target.id);
    if (others.some((t) => t.url.equals(target.url))) throw urlAlreadyTaken();

    const fingerprint = target.provider.fingerprint();
    if (others.some((t) => t.provider.fingerprint() === fingerprint)) throw configAlreadyTaken();
  }

  private others(excluding?: TargetId): TargetSnapshot[] {
    return this.table.values().filter((t) => t.id !== excluding);
  }
}
