import { inArray } from "drizzle-orm";
import {
  appNameAlreadyTaken,
  concurrentModification,
  configAlreadyTaken,
  isDeploymentError,
  urlAlreadyTaken,
  type DeploymentError,
  type DomainEvent,
} from "@platform/deployment/domain";
import { envelop, type AggregateKind, type EventSink } from "@platform/events";
import { domainEvents } from "@shared/schema";
import type { Database } from "../db";
import { envelopeToRow } from "./mappers";

export type Transaction = Parameters<Parameters<Database["transaction"]>[0]>[0];

const UNIQUE_VIOLATION = "23505";

const CONFLICT_BY_CONSTRAINT: Record<string, () => DeploymentError> = {
  uq_targets_url: urlAlreadyTaken,
  uq_targets_provider_fingerprint: configAlreadyTaken,
  uq_apps_name: appNameAlreadyTaken,
};

function violatedConstraint(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("code" in err && err.code === UNIQUE_VIOLATION && "constraint" in err && typeof err.constraint === "string") {
    return err.constraint;
  }
  return "cause" in err ? violatedConstraint(err.cause) : undefined;
}

/**
 * Turns a unique violation raised by a concurrent writer into the domain
 * conflict the requirement check would have reported.
 */
export function translateUniqueViolation(err: unknown): unknown {
  const constraint = violatedConstraint(err);
  const conflict = constraint ? CONFLICT_BY_CONSTRAINT[constraint] : undefined;
  return conflict ? conflict() : err;
}

export type UnitOfWork = {
  aggregate: AggregateKind;
  aggregateId: string;
  expectedVersion: number;
  events: readonly DomainEvent[];
  /** Resolves false when no row matched the expected version. */
  write(tx: Transaction, nextVersion: number): Promise<boolean>;
  currentVersion(tx: Transaction): Promise<number>;
};

/**
 * Writes one aggregate and its events to the outbox in a single transaction,
 * then hands the events to the sink and marks them dispatched.
 * Returns the new aggregate version.
 */
export async function persist(db: Database, sink: EventSink, unit: UnitOfWork): Promise<number> {
  const nextVersion = unit.expectedVersion + 1;
  const envelopes = envelop(unit.aggregate, unit.aggregateId, nextVersion, unit.events);

  try {
    await db.transaction(async (tx) => {
      const written = await unit.write(tx, nextVersion);
      if (!written) {
        const actual = await unit.currentVersion(tx);
        throw concurrentModification(`${unit.aggregate} ${unit.aggregateId}`, unit.expectedVersion, actual);
      }

      if (envelopes.length > 0) {
        await tx.insert(domainEvents).values(envelopes.map(envelopeToRow));
      }
    });
  } catch (err) {
    const translated = translateUniqueViolation(err);
    if (isDeploymentError(translated)) {
      console.warn(`[store] ${unit.aggregate} ${unit.aggregateId} not saved: ${translated.code}`);
    }
    throw translated;
  }

  if (envelopes.length === 0) return nextVersion;

  await sink.emit(envelopes);
  await db
    .update(domainEvents)
    .set({ dispatchedAt: new Date() })
    .where(inArray(domainEvents.id, envelopes.map((e) => e.eventId)));

  return nextVersion;
}
