/**
 * packages/core/src/runtime/stateCell.ts — Generation-tracked mutable value.
 *
 * A StateCell is owned by exactly one scope. Every write bumps the
 * generation and asks the owner to schedule a recomposition; the write never
 * recomposes synchronously. Once the owner is destroyed, writes are ignored,
 * so a cancelled task that still holds a setter cannot reach a dead scope.
 */

/** Symbol under which versioned values expose their generation. */
export const VERSION: unique symbol = Symbol("loom.version");

/** A value whose changes are tracked by a monotonically increasing counter. */
export interface Versioned {
  readonly [VERSION]: number;
}

export function isVersioned(v: unknown): v is Versioned {
  return typeof v === "object" && v !== null && VERSION in v && typeof v[VERSION] === "number";
}

/** The scope-side contract a cell writes through. */
export type CellOwner = Readonly<{
  isAlive: () => boolean;
  markDirty: () => void;
}>;

export type StateSetter<T> = (next: T) => void;

export class StateCell<T> implements Versioned {
  private current: T;
  private gen = 0;
  private readonly owner: CellOwner;

  constructor(initial: T, owner: CellOwner) {
    this.current = initial;
    this.owner = owner;
  }

  get value(): T {
    return this.current;
  }

  get generation(): number {
    return this.gen;
  }

  get [VERSION](): number {
    return this.gen;
  }

  get(): T {
    return this.current;
  }

  /** Write a new value. Returns false when the owning scope no longer exists. */
  set(next: T): boolean {
    if (!this.owner.isAlive()) return false;
    this.current = next;
    this.gen++;
    this.owner.markDirty();
    return true;
  }

  update(fn: (prev: T) => T): boolean {
    if (!this.owner.isAlive()) return false;
    return this.set(fn(this.current));
  }

  /** Setter bound to this cell, safe to hand to tasks and callbacks. */
  readonly setter: StateSetter<T> = (next: T) => {
    this.set(next);
  };
}
