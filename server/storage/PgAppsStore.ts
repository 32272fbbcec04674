import { and, eq, ne, or } from "drizzle-orm";
import {
  App,
  environmentConfigRequirement,
  type AppId,
  type AppName,
  type EnvironmentConfig,
  type EnvironmentConfigRequirement,
  type TargetId,
} from "@platform/deployment/domain";
import type { AppsReader, AppsWriter } from "@platform/deployment/store";
import type { EventSink } from "@platform/events";
import { apps, targets } from "@shared/schema";
import type { Database } from "../db";
import { appToRow, rowToApp } from "./mappers";
import { persist, type Transaction } from "./persist";

export class PgAppsStore implements AppsReader, AppsWriter {
  constructor(
    private readonly db: Database,
    private readonly sink: EventSink,
  ) {}

  async getById(id: AppId): Promise<App | null> {
    const [row] = await this.db.select().from(apps).where(eq(apps.id, id));
    if (!row) return null;
    const { snapshot, version } = rowToApp(row);
    return App.restore(snapshot, version);
  }

  async getByName(name: AppName): Promise<App | null> {
    const [row] = await this.db.select().from(apps).where(eq(apps.name, name));
    if (!row) return null;
    const { snapshot, version } = rowToApp(row);
    return App.restore(snapshot, version);
  }

  async checkEnvironmentConfig(
    name: AppName,
    config: EnvironmentConfig,
    excluding?: AppId,
  ): Promise<EnvironmentConfigRequirement> {
    const target = await this.db
      .select({ id: targets.id })
      .from(targets)
      .where(eq(targets.id, config.target))
      .limit(1);

    const sameName = eq(apps.name, name);
    const taken = await this.db
      .select({ id: apps.id })
      .from(apps)
      .where(excluding ? and(sameName, ne(apps.id, excluding)) : sameName)
      .limit(1);

    return environmentConfigRequirement(config, target.length > 0, taken.length === 0);
  }

  async hasAppsOnTarget(id: TargetId): Promise<boolean> {
    const rows = await this.db
      .select({ id: apps.id })
      .from(apps)
      .where(or(eq(apps.productionTarget, id), eq(apps.stagingTarget, id)))
      .limit(1);
    return rows.length > 0;
  }

  async save(app: App): Promise<void> {
    const events = app.pendingEvents();
    const expectedVersion = app.version;

    const version = await persist(this.db, this.sink, {
      aggregate: "app",
      aggregateId: app.id,
      expectedVersion,
      events,
      write: async (tx, nextVersion) => {
        if (app.isDeleted) {
          const deleted = await tx
            .delete(apps)
            .where(and(eq(apps.id, app.id), eq(apps.version, expectedVersion)))
            .returning({ id: apps.id });
          return deleted.length > 0;
        }

        const row = appToRow(app.snapshot(), nextVersion);
        if (expectedVersion === 0) {
          const inserted = await tx
            .insert(apps)
            .values(row)
            .onConflictDoNothing({ target: apps.id })
            .returning({ id: apps.id });
          return inserted.length > 0;
        }

        const updated = await tx
          .update(apps)
          .set(row)
          .where(and(eq(apps.id, app.id), eq(apps.version, expectedVersion)))
          .returning({ id: apps.id });
        return updated.length > 0;
      },
      currentVersion: (tx) => this.versionOf(tx, app.id),
    });

    app.commit(version);
  }

  private async versionOf(tx: Transaction, id: AppId): Promise<number> {
    const [row] = await tx.select({ version: apps.version }).from(apps).where(eq(apps.id, id));
    return row?.version ?? 0;
  }
}
