import { and, eq, ne, type SQL } from "drizzle-orm";
import {
  Target,
  providerConfigRequirement,
  targetUrlRequirement,
  type ProviderConfig,
  type ProviderConfigRequirement,
  type TargetId,
  type TargetUrl,
  type TargetUrlRequirement,
} from "@platform/deployment/domain";
import type { TargetsReader, TargetsWriter } from "@platform/deployment/store";
import type { EventSink } from "@platform/events";
import { targets } from "@shared/schema";
import type { Database } from "../db";
import { rowToTarget, targetToRow } from "./mappers";
import { persist, type Transaction } from "./persist";

export class PgTargetsStore implements TargetsReader, TargetsWriter {
  constructor(
    private readonly db: Database,
    private readonly sink: EventSink,
  ) {}

  async getById(id: TargetId): Promise<Target | null> {
    const [row] = await this.db.select().from(targets).where(eq(targets.id, id));
    if (!row) return null;
    const { snapshot, version } = rowToTarget(row);
    return Target.restore(snapshot, version);
  }

  async checkUrlAvailability(url: TargetUrl, excluding?: TargetId): Promise<TargetUrlRequirement> {
    const taken = await this.exists(eq(targets.url, url.toString()), excluding);
    return targetUrlRequirement(url, !taken);
  }

  async checkConfigAvailability(config: ProviderConfig, excluding?: TargetId): Promise<ProviderConfigRequirement> {
    const taken = await this.exists(eq(targets.providerFingerprint, config.fingerprint()), excluding);
    return providerConfigRequirement(config, !taken);
  }

  async save(target: Target): Promise<void> {
    const events = target.pendingEvents();
    const expectedVersion = target.version;

    const version = await persist(this.db, this.sink, {
      aggregate: "target",
      aggregateId: target.id,
      expectedVersion,
      events,
      write: async (tx, nextVersion) => {
        if (target.isDeleted) {
          const deleted = await tx
            .delete(targets)
            .where(and(eq(targets.id, target.id), eq(targets.version, expectedVersion)))
            .returning({ id: targets.id });
          return deleted.length > 0;
        }

        const row = targetToRow(target.snapshot(), nextVersion);
        if (expectedVersion === 0) {
          const inserted = await tx
            .insert(targets)
            .values(row)
            .onConflictDoNothing({ target: targets.id })
            .returning({ id: targets.id });
          return inserted.length > 0;
        }

        const updated = await tx
          .update(targets)
          .set(row)
          .where(and(eq(targets.id, target.id), eq(targets.version, expectedVersion)))
          .returning({ id: targets.id });
        return updated.length > 0;
      },
      currentVersion: (tx) => this.versionOf(tx, target.id),
    });

    target.commit(version);
  }

  private async exists(condition: SQL, excluding?: TargetId): Promise<boolean> {
    const where = excluding ? and(condition, ne(targets.id, excluding)) : condition;
    const rows = await this.db.select({ id: targets.id }).from(targets).where(where).limit(1);
    return rows.length > 0;
  }

  private async versionOf(tx: Transaction, id: TargetId): Promise<number> {
    const [row] = await tx.select({ version: targets.version }).from(targets).where(eq(targets.id, id));
    return row?.version ?? 0;
  }
}
