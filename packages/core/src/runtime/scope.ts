/**
 * packages/core/src/runtime/scope.ts — Persistent per-node state container.
 *
 * A ScopeRecord lives as long as its node keeps the same type at the same
 * tree slot. It stores hook slots (positionally matched across
 * compositions), provided context values, child slots, and pending effect
 * and task work produced by the latest composition.
 *
 * Scope lifecycle:
 *   - Created the first time a node is composed at a slot
 *   - Reused on every recomposition while the node's type is unchanged
 *   - Destroyed when the slot disappears or changes type: effect cleanups
 *     and drop hooks run in reverse declaration order, tasks are aborted,
 *     and every state cell it owns stops accepting writes
 *
 * The `Scope` handle given to a compose function is valid only for that
 * composition step; hooks called through it afterwards fail loudly.
 */

import { warnDev } from "../debug/warn.js";
import { LoomError, describeThrown } from "../errors.js";
import type { DynNode } from "./dynNode.js";
import type { MemoKey } from "./memoize.js";
import type { Composable } from "./node.js";
import type { TreePosition } from "./position.js";
import type { CellOwner, StateCell } from "./stateCell.js";

export type ScopeId = number;

/** Handle passed to compose functions; first argument of every hook. */
export type Scope = Readonly<{
  id: ScopeId;
  name: string;
  position: TreePosition;
  /** Number of completed compositions before this one. */
  generation: number;
}>;

export type EffectCleanup = () => void;

export type EffectState = {
  readonly key: MemoKey;
  readonly effect: () => undefined | EffectCleanup;
  /** Cleanup from the last effect run, if any. */
  cleanup: EffectCleanup | undefined;
  /** True while this effect update is waiting for the post-pass flush. */
  pending: boolean;
};

export type TaskKind = "shared" | "local";

export type TaskStatus = "pending" | "running" | "done" | "failed" | "cancelled";

/** Mutable bookkeeping for one background task bound to a scope. */
export type TaskRecord = {
  readonly kind: TaskKind;
  readonly controller: AbortController;
  readonly run: (signal: AbortSignal) => Promise<void>;
  readonly settled: Promise<void>;
  readonly settle: () => void;
  readonly scopeName: string;
  status: TaskStatus;
};

/** Per-hook-index slot storage. */
export type HookSlot =
  | { kind: "state"; cell: StateCell<unknown> }
  | { kind: "ref"; ref: { current: unknown } }
  | { kind: "memo"; key: MemoKey; value: unknown }
  | { kind: "callback"; fn: unknown; stable: unknown }
  | { kind: "effect"; effect: EffectState }
  | { kind: "drop"; fn: () => void }
  | { kind: "provider"; contextId: symbol; value: unknown }
  | { kind: "task"; task: TaskRecord };

export type HookKind = HookSlot["kind"];

/** Hook slots plus the ref contents they held, taken before a composition. */
export type HookSnapshot = Readonly<{
  hooks: readonly HookSlot[];
  refValues: readonly unknown[];
}>;

export type SlotOf<K extends HookKind> = Extract<HookSlot, { kind: K }>;

/** Services a scope needs from the composer that owns it. */
export type ScopeHost = Readonly<{
  devChecks: boolean;
  /** Schedule the scope for the next pass (or keep it in the current one). */
  requestRecompose: (scope: ScopeRecord) => void;
}>;

export type ScopeInit = Readonly<{
  id: ScopeId;
  node: Composable;
  position: TreePosition;
  parent: ScopeRecord | null;
  host: ScopeHost;
}>;

const handles = new WeakMap<Scope, ScopeRecord>();

function isSlotKind<K extends HookKind>(slot: HookSlot, kind: K): slot is SlotOf<K> {
  return slot.kind === kind;
}

function runGuarded(label: string, scopeName: string, fn: () => void): void {
  try {
    fn();
  } catch (err) {
    warnDev("scope", `${label} for ${scopeName} threw: ${describeThrown(err)}`);
  }
}

export class ScopeRecord {
  readonly id: ScopeId;
  readonly name: string;
  readonly position: TreePosition;
  readonly parent: ScopeRecord | null;
  readonly depth: number;
  readonly owner: CellOwner;

  /** Node most recently bound to this scope. */
  node: Composable;
  /** Slot currently holding this scope. */
  slot: DynNode | null = null;
  /** Child slots in output order; null marks an empty slot. */
  children: (DynNode | null)[] = [];
  /** Completed compositions. */
  generation = 0;
  /** Pass number of the latest composition attempt. */
  lastComposedPass = -1;
  hooks: HookSlot[] = [];
  hookIndex = 0;
  /** Hook count from the first successful composition. */
  expectedHookCount: number | null = null;
  pendingEffects: EffectState[] = [];
  pendingCleanups: EffectCleanup[] = [];
  pendingTasks: TaskRecord[] = [];

  private readonly host: ScopeHost;
  private readonly provided = new Map<symbol, unknown>();
  private nextChildSegment = 0;
  private alive = true;
  private activeHandle: Scope | null = null;

  constructor(init: ScopeInit) {
    this.id = init.id;
    this.node = init.node;
    this.name = init.node.type.name;
    this.position = init.position;
    this.parent = init.parent;
    this.depth = init.parent ? init.parent.depth + 1 : 0;
    this.host = init.host;
    this.owner = Object.freeze({
      isAlive: () => this.alive,
      markDirty: () => {
        if (this.alive) this.host.requestRecompose(this);
      },
    });
  }

  get devChecks(): boolean {
    return this.host.devChecks;
  }

  isAlive(): boolean {
    return this.alive;
  }

  isActiveHandle(cx: Scope): boolean {
    return this.activeHandle === cx;
  }

  /** Segment for a newly created child slot; never reused. */
  allocateChildSegment(): number {
    return this.nextChildSegment++;
  }

  /** Start a composition step and hand out a fresh handle. */
  beginCompose(): Scope {
    this.hookIndex = 0;
    this.pendingEffects = [];
    this.pendingCleanups = [];
    this.pendingTasks = [];
    const handle: Scope = Object.freeze({
      id: this.id,
      name: this.name,
      position: this.position,
      generation: this.generation,
    });
    handles.set(handle, this);
    this.activeHandle = handle;
    return handle;
  }

  /** Validate hook usage and commit the composition. */
  finishCompose(): void {
    this.activeHandle = null;
    const used = this.hookIndex;
    if (this.expectedHookCount === null) {
      this.expectedHookCount = used;
    } else if (this.host.devChecks && used !== this.expectedHookCount) {
      throw new LoomError(
        "LOOM_HOOK_COUNT",
        `Hook count mismatch for ${this.name} (scope ${String(this.id)}): expected ${String(
          this.expectedHookCount,
        )}, got ${String(used)}`,
      );
    }
    this.generation++;
  }

  snapshotHooks(): HookSnapshot {
    return {
      hooks: this.hooks.slice(),
      refValues: this.hooks.map((slot) => (slot.kind === "ref" ? slot.ref.current : undefined)),
    };
  }

  /** Discard everything the failed composition produced, ref writes included. */
  abortCompose(snapshot: HookSnapshot): void {
    this.activeHandle = null;
    this.hooks = snapshot.hooks.slice();
    snapshot.hooks.forEach((slot, i) => {
      if (slot.kind === "ref") slot.ref.current = snapshot.refValues[i];
    });
    this.pendingEffects = [];
    this.pendingCleanups = [];
    this.pendingTasks = [];
  }

  /**
   * Claim the next hook slot of `kind`, creating it on first use.
   * Throws on kind or count mismatch against previous compositions.
   */
  claim<K extends HookKind>(kind: K, create: () => SlotOf<K>): SlotOf<K> {
    const index = this.hookIndex;
    this.hookIndex++;
    const existing = this.hooks[index];

    if (existing === undefined) {
      if (
        this.host.devChecks &&
        this.expectedHookCount !== null &&
        index >= this.expectedHookCount
      ) {
        throw new LoomError(
          "LOOM_HOOK_COUNT",
          `Hook count mismatch at index ${String(index)} in ${this.name}: used more hooks than the previous composition while reading ${kind}`,
        );
      }
      const slot = create();
      this.hooks[index] = slot;
      return slot;
    }

    if (!isSlotKind(existing, kind)) {
      throw new LoomError(
        "LOOM_HOOK_ORDER",
        `Hook order mismatch at index ${String(index)} in ${this.name}: expected ${existing.kind}, got ${kind}`,
      );
    }
    return existing;
  }

  /** Replace the slot claimed most recently (slots are swapped, not mutated). */
  replaceLast(slot: HookSlot): void {
    this.hooks[this.hookIndex - 1] = slot;
  }

  provide(contextId: symbol, value: unknown): void {
    this.provided.set(contextId, value);
  }

  /** Nearest strict ancestor that provides `contextId`. */
  findProvider(contextId: symbol): Readonly<{ scope: ScopeRecord; value: unknown }> | null {
    for (let s = this.parent; s !== null; s = s.parent) {
      if (s.provided.has(contextId)) {
        return { scope: s, value: s.provided.get(contextId) };
      }
    }
    return null;
  }

  lookupContext(contextId: symbol): Readonly<{ found: boolean; value: unknown }> {
    const provider = this.findProvider(contextId);
    if (!provider) return { found: false, value: undefined };
    return { found: true, value: provider.value };
  }

  /**
   * Tear down this scope only (children are torn down by the composer first).
   * Marks the scope dead before any cleanup runs, so setters invoked from
   * cleanups are already no-ops.
   */
  destroy(): void {
    if (!this.alive) return;
    this.alive = false;
    this.activeHandle = null;

    for (let i = this.hooks.length - 1; i >= 0; i--) {
      const slot = this.hooks[i];
      if (!slot) continue;
      switch (slot.kind) {
        case "effect": {
          const cleanup = slot.effect.cleanup;
          if (cleanup) runGuarded("effect cleanup", this.name, cleanup);
          break;
        }
        case "drop": {
          runGuarded("drop hook", this.name, slot.fn);
          break;
        }
        case "task": {
          const task = slot.task;
          if (task.status === "pending" || task.status === "running") {
            task.status = "cancelled";
            task.controller.abort();
            task.settle();
          }
          break;
        }
        default:
          break;
      }
    }

    this.pendingEffects = [];
    this.pendingCleanups = [];
    this.pendingTasks = [];
    this.provided.clear();
  }
}

/**
 * Resolve the record behind a handle. Throws when the handle belongs to a
 * composition step that has already ended.
 */
export function scopeRecordOf(cx: Scope): ScopeRecord {
  const record = handles.get(cx);
  if (!record || !record.isAlive() || !record.isActiveHandle(cx)) {
    throw new LoomError(
      "LOOM_STALE_SCOPE",
      `hook called on ${cx.name} (scope ${String(cx.id)}) outside of its composition step`,
    );
  }
  return record;
}
