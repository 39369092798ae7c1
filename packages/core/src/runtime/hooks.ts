/**
 * packages/core/src/runtime/hooks.ts — Hook API for composable bodies.
 *
 * Every hook takes the current Scope handle first and claims the next
 * positional slot on the scope. Hooks must be called unconditionally and in
 * the same order on every composition of a scope; a changed kind at an index
 * throws LOOM_HOOK_ORDER and a changed count throws LOOM_HOOK_COUNT.
 */

import { ContextError, describeThrown } from "../errors.js";
import { warnDev } from "../debug/warn.js";
import { type DependencyCompare, memoKeysEqual, toMemoKey } from "./memoize.js";
import { type EffectCleanup, type EffectState, type Scope, type ScopeRecord, scopeRecordOf } from "./scope.js";
import { StateCell, type StateSetter } from "./stateCell.js";

declare const CONTEXT_VALUE: unique symbol;

/** Typed key under which an ancestor provides a value to its descendants. */
export type ContextKey<T> = Readonly<{
  id: symbol;
  name: string;
  /** Type marker only; never present at runtime. */
  [CONTEXT_VALUE]?: T;
}>;

export type ContextResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; error: ContextError }>;

export type RefState<T> = { current: T };

export function createContext<T>(name: string): ContextKey<T> {
  return Object.freeze({ id: Symbol(name), name });
}

/**
 * Persistent state. `init` runs on the first composition only; the setter is
 * stable across compositions and schedules the scope for the next pass.
 */
export function useState<T>(cx: Scope, init: () => T): readonly [T, StateSetter<T>] {
  const cell = useStateCell(cx, init);
  return [cell.value, cell.setter];
}

/** Like useState, but returns the cell so callers can depend on its generation. */
export function useStateCell<T>(cx: Scope, init: () => T): StateCell<T> {
  const record = scopeRecordOf(cx);
  const slot = record.claim("state", () => ({
    kind: "state",
    cell: new StateCell<unknown>(init(), record.owner),
  }));
  return slot.cell as StateCell<T>;
}

/** Mutable box that survives recompositions; writing it schedules nothing. */
export function useRef<T>(cx: Scope, initial: T): RefState<T> {
  const slot = scopeRecordOf(cx).claim("ref", () => ({ kind: "ref", ref: { current: initial } }));
  return slot.ref as RefState<T>;
}

/**
 * Cached computation. `compute` re-runs only when `dependency` differs from
 * the one seen on the previous composition.
 */
export function useMemo<T>(
  cx: Scope,
  dependency: unknown,
  compute: () => T,
  compare?: DependencyCompare,
): T {
  const record = scopeRecordOf(cx);
  const key = toMemoKey(dependency);
  let created = false;
  const slot = record.claim("memo", () => {
    created = true;
    return { kind: "memo", key, value: compute() };
  });
  if (created || memoKeysEqual(slot.key, key, compare)) {
    return slot.value as T;
  }
  const value = compute();
  record.replaceLast({ kind: "memo", key, value });
  return value;
}

/**
 * Stable function identity across compositions. Calls always go to the
 * callback committed by the latest successful composition.
 */
export function useCallback<A extends unknown[], R>(
  cx: Scope,
  fn: (...args: A) => R,
): (...args: A) => R {
  const record = scopeRecordOf(cx);
  const slot = record.claim("callback", () => {
    const index = record.hookIndex - 1;
    // Reads through the slot so a rolled-back composition keeps the old target.
    const stable = (...args: A): R => {
      const current = record.hooks[index];
      const target = current?.kind === "callback" ? current.fn : fn;
      return (target as (...args: A) => R)(...args);
    };
    return { kind: "callback", fn, stable };
  });
  record.replaceLast({ kind: "callback", fn, stable: slot.stable });
  return slot.stable as (...args: A) => R;
}

function normalizeEffect(effect: () => void | EffectCleanup): () => undefined | EffectCleanup {
  return () => {
    const result = effect();
    return typeof result === "function" ? result : undefined;
  };
}

/**
 * Side effect run after the pass that produced it has finished building the
 * tree. Re-runs (after the previous cleanup) whenever `dependency` changes.
 */
export function useEffect(
  cx: Scope,
  dependency: unknown,
  effect: () => void | EffectCleanup,
): void {
  const record = scopeRecordOf(cx);
  const key = toMemoKey(dependency);
  let created = false;
  const slot = record.claim("effect", () => {
    created = true;
    const state: EffectState = {
      key,
      effect: normalizeEffect(effect),
      cleanup: undefined,
      pending: true,
    };
    return { kind: "effect", effect: state };
  });

  if (created) {
    record.pendingEffects.push(slot.effect);
    return;
  }

  const prev = slot.effect;
  if (memoKeysEqual(prev.key, key) && !prev.pending) return;

  // Dependency changed, or the previous flush never ran.
  if (prev.cleanup) record.pendingCleanups.push(prev.cleanup);
  const next: EffectState = {
    key,
    effect: normalizeEffect(effect),
    cleanup: prev.cleanup,
    pending: true,
  };
  record.replaceLast({ kind: "effect", effect: next });
  record.pendingEffects.push(next);
}

/** Run `fn` once when the scope is destroyed. The latest `fn` wins. */
export function useDrop(cx: Scope, fn: () => void): void {
  const record = scopeRecordOf(cx);
  record.claim("drop", () => ({ kind: "drop", fn }));
  record.replaceLast({ kind: "drop", fn });
}

/**
 * Provide a value to every descendant. `make` runs on the first composition
 * only; provide a state cell to share a value that changes.
 */
export function useProvider<T>(cx: Scope, key: ContextKey<T>, make: () => T): T {
  const record = scopeRecordOf(cx);
  const slot = record.claim("provider", () => ({
    kind: "provider",
    contextId: key.id,
    value: make(),
  }));
  record.provide(slot.contextId, slot.value);
  return slot.value as T;
}

/**
 * Look up the nearest ancestor's value for `key`. Does not claim a hook slot.
 */
export function useContext<T>(cx: Scope, key: ContextKey<T>): ContextResult<T> {
  const found = scopeRecordOf(cx).lookupContext(key.id);
  if (!found.found) return { ok: false, error: new ContextError(key.name) };
  return { ok: true, value: found.value as T };
}

/**
 * Run the cleanups and effects queued by the latest composition of `record`.
 * Cleanup failures are reported and skipped; the first effect failure is
 * returned after every effect has had its turn.
 */
export function flushScopeEffects(record: ScopeRecord): unknown {
  const cleanups = record.pendingCleanups;
  const effects = record.pendingEffects;
  record.pendingCleanups = [];
  record.pendingEffects = [];

  for (const cleanup of cleanups) {
    try {
      cleanup();
    } catch (err) {
      warnDev("effects", `effect cleanup for ${record.name} threw: ${describeThrown(err)}`);
    }
  }

  let failure: unknown = undefined;
  for (const state of effects) {
    if (!record.isAlive()) break;
    state.pending = false;
    try {
      state.cleanup = state.effect();
    } catch (err) {
      state.cleanup = undefined;
      if (failure === undefined) failure = err;
    }
  }
  return failure;
}
