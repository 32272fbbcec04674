import {
  App,
  appNameAlreadyTaken,
  environmentConfigRequirement,
  type AppId,
  type AppName,
  type AppSnapshot,
  type EnvironmentConfig,
  type EnvironmentConfigRequirement,
  type TargetId,
} from "../domain";
import { envelop, type EventSink } from "../../events";
import type { AppsReader, AppsWriter, TargetsReader } from "./types";
import { VersionedTable } from "./VersionedTable";

export class InMemoryAppsStore implements AppsReader, AppsWriter {
  private readonly table = new VersionedTable<AppSnapshot>("app");

  constructor(
    private readonly targets: Pick<TargetsReader, "getById">,
    private readonly sink: EventSink,
  ) {}

  async getById(id: AppId): Promise<App | null> {
    const row = this.table.get(id);
    return row ? App.restore(row.snapshot, row.version) : null;
  }

  async getByName(name: AppName): Promise<App | null> {
    const snapshot = this.table.values().find((a) => a.name === name);
    return snapshot ? this.getById(snapshot.id) : null;
  }

  async checkEnvironmentConfig(
    name: AppName,
    config: EnvironmentConfig,
    excluding?: AppId,
  ): Promise<EnvironmentConfigRequirement> {
    const target = await this.targets.getById(config.target);
    const nameTaken = this.table.values().some((a) => a.name === name && a.id !== excluding);
    return environmentConfigRequirement(config, target !== null, !nameTaken);
  }

  async hasAppsOnTarget(id: TargetId): Promise<boolean> {
    return this.table.values().some((a) => a.production.target === id || a.staging.target === id);
  }

  async save(app: App): Promise<void> {
    const events = app.pendingEvents();
    if (!app.isDeleted && this.table.values().some((a) => a.name === app.name && a.id !== app.id)) {
      throw appNameAlreadyTaken();
    }

    const version = app.isDeleted
      ? this.table.remove(app.id, app.version)
      : this.table.write(app.id, app.version, app.snapshot());

    app.commit(version);
    await this.sink.emit(envelop("app", app.id, version, events));
  }
}
