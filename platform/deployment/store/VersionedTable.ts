import { concurrentModification } from "../domain";

export type VersionedRecord<S> = Readonly<{ snapshot: S; version: number }>;

/**
 * Map of snapshots guarded by an optimistic version, shared by the in-memory
 * repositories. A write with expected version 0 inserts.
 *
 * `copy` runs on the way in and out, so callers never hold a stored snapshot.
 */
export class VersionedTable<S> {
  private readonly rows = new Map<string, VersionedRecord<S>>();

  constructor(
    private readonly entity: string,
    private readonly copy: (snapshot: S) => S = (snapshot) => snapshot,
  ) {}

  get(key: string): VersionedRecord<S> | undefined {
    const row = this.rows.get(key);
    return row ? { snapshot: this.copy(row.snapshot), version: row.version } : undefined;
  }

  values(): S[] {
    return Array.from(this.rows.values(), (r) => r.snapshot);
  }

  write(key: string, expectedVersion: number, snapshot: S): number {
    const actual = this.rows.get(key)?.version ?? 0;
    if (actual !== expectedVersion) {
      throw concurrentModification(`${this.entity} ${key}`, expectedVersion, actual);
    }

    const version = actual + 1;
    this.rows.set(key, { snapshot: this.copy(snapshot), version });
    return version;
  }

  remove(key: string, expectedVersion: number): number {
    const actual = this.rows.get(key)?.version ?? 0;
    if (actual !== expectedVersion) {
      throw concurrentModification(`${this.entity} ${key}`, expectedVersion, actual);
    }

    this.rows.delete(key);
    return actual + 1;
  }
}
