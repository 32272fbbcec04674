import type { DomainEvent } from "./events";

/**
 * Base of every aggregate: holds an immutable state snapshot, the repository
 * version it was loaded at and the events raised since then.
 *
 * Repositories persist `snapshot()` with `version` as the expected version,
 * then call `commit()` to drain the buffer for dispatch.
 */
export abstract class AggregateRoot<S, E extends DomainEvent> {
  private pending: E[] = [];

  protected constructor(
    protected state: S,
    private persistedVersion: number,
  ) {}

  protected abstract evolve(state: S, event: E): S;

  protected raise(event: E): void {
    this.state = this.evolve(this.state, event);
    this.pending.push(event);
  }

  /**
   * Same as `raise` but drops a not yet committed event of the same type so a
   * single unit of work only ever carries the latest one.
   */
  protected raiseCollapsed(event: E): void {
    this.pending = this.pending.filter((e) => e.type !== event.type);
    this.raise(event);
  }

  /** Used by factories whose initial state already reflects the event. */
  protected record(event: E): void {
    this.pending.push(event);
  }

  get version(): number {
    return this.persistedVersion;
  }

  snapshot(): S {
    return this.state;
  }

  pendingEvents(): readonly E[] {
    return [...this.pending];
  }

  commit(version: number): E[] {
    const drained = this.pending;
    this.pending = [];
    this.persistedVersion = version;
    return drained;
  }
}
