/**
 * packages/core/src/runtime/composer.ts — Incremental composition driver.
 *
 * The composer owns the scope tree, the dirty scheduler and the inbox of
 * scopes dirtied between passes. A pass:
 *   1. runs queued `update` callbacks, then moves the inbox into the scheduler
 *   2. pops scopes in tree order (ancestors first), composing each at most
 *      once and reconciling the children it produced
 *   3. after the last scope, flushes effects in composition order and then
 *      hands registered tasks to the executor
 *
 * Every child of a recomposed scope is composed in the same pass, except
 * below a scope that returns `keepChildren`. Setters fired while a pass is
 * active reach the current pass only when their scope is still waiting in
 * the scheduler; otherwise they wait for the next pass.
 *
 * A composable failure is offered to the nearest error boundary. Without
 * one, the step reports it and the failing scope keeps its previous hooks
 * and children; the rest of the pass continues on the next call.
 */

import { type ComposerConfig, resolveComposerConfig } from "../config.js";
import { warnDev } from "../debug/warn.js";
import { CompositionError, LoomError, toCompositionError } from "../errors.js";
import { BOUNDARY_CONTEXT, isBoundaryHandle } from "./boundary.js";
import { createDirtyScheduler } from "./dirtyScheduler.js";
import { DynNode, type DynNodeHost } from "./dynNode.js";
import { formatScopeTree, snapshotScopeTree } from "./format.js";
import { flushScopeEffects } from "./hooks.js";
import {
  type Children,
  type Composable,
  isComposable,
  isKeepChildren,
  normalizeChildren,
} from "./node.js";
import { ROOT_POSITION, type TreePosition } from "./position.js";
import { reconcileChildren } from "./reconcile.js";
import { type ScopeHost, type ScopeId, ScopeRecord } from "./scope.js";
import { startTask } from "./tasks.js";
import type {
  ComposeResult,
  PassSummary,
  ScopeSnapshot,
  StepResult,
  VisitedScope,
} from "./types.js";

export type Composer = Readonly<{
  /** Run steps until the current (or next) pass ends or fails. */
  composeOnce: () => ComposeResult;
  /** Compose at most one scope. */
  step: () => StepResult;
  /** Step results up to and including the one that ends or fails the pass. */
  steps: () => Generator<StepResult, void, undefined>;
  [Symbol.iterator]: () => Generator<StepResult, void, undefined>;
  /** Wait until something is dirty, then run one pass. */
  compose: () => Promise<ComposeResult>;
  /** Queue a mutation to run at the start of the next pass. */
  update: (fn: () => void) => void;
  pendingCount: () => number;
  hasPendingWork: () => boolean;
  isPassActive: () => boolean;
  format: () => string;
  snapshot: () => ScopeSnapshot;
  /** Destroy every scope; later calls throw LOOM_DISPOSED. */
  dispose: () => void;
}>;

type ActivePass = {
  readonly number: number;
  readonly startedAt: number;
  readonly composed: ScopeId[];
  readonly mounted: ScopeId[];
  readonly unmounted: ScopeId[];
  readonly caught: CompositionError[];
  /** Scopes composed this pass, whose effects and tasks run at pass end. */
  readonly touched: ScopeRecord[];
};

type BodyOutcome =
  | Readonly<{ ok: true; keep: boolean; nodes: readonly (Composable | null)[] }>
  | Readonly<{ ok: false; thrown: unknown }>;

type Attempt = Readonly<{ ok: true }> | Readonly<{ ok: false; error: CompositionError }>;

const ATTEMPT_OK: Attempt = Object.freeze({ ok: true });

function visit(record: ScopeRecord): VisitedScope {
  return Object.freeze({
    id: record.id,
    name: record.name,
    position: record.position,
    generation: record.generation,
  });
}

function runBody(node: Composable, record: ScopeRecord): BodyOutcome {
  const cx = record.beginCompose();
  try {
    const output = node.compose(cx);
    const keep = isKeepChildren(output);
    const nodes = normalizeChildren(keep ? output.children : output);
    record.finishCompose();
    return { ok: true, keep, nodes };
  } catch (thrown) {
    return { ok: false, thrown };
  }
}

export function createComposer(root: Composable, config?: ComposerConfig): Composer {
  if (!isComposable(root)) {
    throw new LoomError("LOOM_INVALID_NODE", "createComposer: root must be a composable node");
  }
  const cfg = resolveComposerConfig(config);
  const scheduler = createDirtyScheduler<ScopeRecord>();
  const inbox = new Set<ScopeRecord>();
  const updates: (() => void)[] = [];
  let waiters: (() => void)[] = [];
  let nextScopeId = 1;
  let passNumber = 0;
  let pass: ActivePass | null = null;
  let busy = false;
  let disposed = false;
  let depthWarned = false;

  function wake(): void {
    if (waiters.length === 0) return;
    const ready = waiters;
    waiters = [];
    for (const resolve of ready) resolve();
  }

  const scopeHost: ScopeHost = Object.freeze({
    devChecks: cfg.devChecks,
    requestRecompose: (scope: ScopeRecord) => {
      if (disposed || !scope.isAlive()) return;
      if (pass !== null && scheduler.has(scope.id)) return;
      inbox.add(scope);
      wake();
    },
  });

  function createScope(
    node: Composable,
    parent: ScopeRecord | null,
    position: TreePosition,
  ): ScopeRecord {
    const depth = parent ? parent.depth + 1 : 0;
    if (depth > cfg.maxDepth) {
      throw new LoomError(
        "LOOM_DEPTH_EXCEEDED",
        `${node.type.name} at depth ${String(depth)} exceeds maxDepth ${String(cfg.maxDepth)}`,
      );
    }
    if (depth > cfg.depthWarnThreshold && !depthWarned) {
      depthWarned = true;
      warnDev(
        "composer",
        `tree depth ${String(depth)} exceeds ${String(cfg.depthWarnThreshold)} at ${node.type.name}`,
      );
    }
    const record = new ScopeRecord({ id: nextScopeId++, node, position, parent, host: scopeHost });
    pass?.mounted.push(record.id);
    return record;
  }

  // Children first, last slot first.
  function destroyScope(record: ScopeRecord): void {
    if (!record.isAlive()) return;
    for (let i = record.children.length - 1; i >= 0; i--) {
      const child = record.children[i];
      if (child) destroyScope(child.scope);
    }
    record.children = [];
    scheduler.remove(record.id);
    inbox.delete(record);
    record.destroy();
    pass?.unmounted.push(record.id);
  }

  const dynHost: DynNodeHost = Object.freeze({ createScope, destroyScope });
  const rootSlot = new DynNode(root, null, ROOT_POSITION, dynHost);
  inbox.add(rootSlot.scope);

  function assertUsable(op: string): void {
    if (disposed) throw new LoomError("LOOM_DISPOSED", `${op} called after dispose()`);
    if (busy) {
      throw new LoomError("LOOM_REENTRANT_CALL", `${op} called while the composer is busy`);
    }
  }

  function runQueuedUpdates(): CompositionError | null {
    for (let fn = updates.shift(); fn !== undefined; fn = updates.shift()) {
      try {
        fn();
      } catch (thrown) {
        return toCompositionError(thrown, "update", ROOT_POSITION);
      }
    }
    return null;
  }

  function beginPass(): ActivePass | CompositionError | null {
    const failure = runQueuedUpdates();
    if (failure) return failure;
    if (inbox.size === 0) return null;

    passNumber++;
    const active: ActivePass = {
      number: passNumber,
      startedAt: performance.now(),
      composed: [],
      mounted: [],
      unmounted: [],
      caught: [],
      touched: [],
    };
    for (const record of inbox) {
      if (record.isAlive()) scheduler.insert(record);
    }
    inbox.clear();
    pass = active;
    return active;
  }

  function popNext(active: ActivePass): ScopeRecord | null {
    for (let next = scheduler.popMin(); next !== undefined; next = scheduler.popMin()) {
      if (!next.isAlive() || next.lastComposedPass === active.number) continue;
      return next;
    }
    return null;
  }

  function adoptChildren(record: ScopeRecord, nodes: readonly (Composable | null)[]): void {
    const result = reconcileChildren(record, record.children, nodes, dynHost);
    if (!result.ok) throw new LoomError(result.fatal.code, result.fatal.detail);
    record.children = result.value.nextSlots.slice();
    for (const dyn of result.value.removed) destroyScope(dyn.scope);
    for (const child of result.value.children) scheduler.insert(child.dyn.scope);
  }

  // Kept children are not composed; same-type slots only take the new props.
  function rebindKept(record: ScopeRecord, nodes: readonly (Composable | null)[]): void {
    for (let i = 0; i < nodes.length; i++) {
      const node = nodes[i];
      const slot = record.children[i];
      if (node && slot && slot.key === node.key) slot.rebind(node);
    }
  }

  function composeLeased(active: ActivePass, node: Composable, record: ScopeRecord): Attempt {
    const snapshot = record.snapshotHooks();
    record.lastComposedPass = active.number;
    const outcome = runBody(node, record);
    if (!outcome.ok) {
      record.abortCompose(snapshot);
      return { ok: false, error: toCompositionError(outcome.thrown, record.name, record.position) };
    }

    active.composed.push(record.id);
    active.touched.push(record);
    if (outcome.keep) {
      rebindKept(record, outcome.nodes);
    } else {
      adoptChildren(record, outcome.nodes);
    }
    return ATTEMPT_OK;
  }

  function composeRecord(active: ActivePass, record: ScopeRecord): Attempt {
    const slot = record.slot;
    if (!slot) return composeLeased(active, record.node, record);
    return slot.lease((node, scope) => composeLeased(active, node, scope));
  }

  // The fallback replaces the content outright; nothing from the failed subtree is reused.
  function captureAt(boundary: ScopeRecord, fallback: Children): void {
    for (let i = boundary.children.length - 1; i >= 0; i--) {
      const child = boundary.children[i];
      if (child) destroyScope(child.scope);
    }
    boundary.children = [];
    adoptChildren(boundary, normalizeChildren(fallback));
  }

  function handleFailure(active: ActivePass, failed: ScopeRecord, error: CompositionError): StepResult {
    let current = error;
    let from = failed;
    for (;;) {
      const provider = from.findProvider(BOUNDARY_CONTEXT.id);
      if (provider === null) break;
      from = provider.scope;
      if (!isBoundaryHandle(provider.value)) continue;
      let fallback: Children | null;
      try {
        fallback = provider.value.capture(current);
      } catch (thrown) {
        current = toCompositionError(thrown, from.name, from.position);
        continue;
      }
      if (fallback === null) continue;
      captureAt(from, fallback);
      active.caught.push(current);
      return { kind: "caught", error: current, boundary: visit(from) };
    }
    return { kind: "failed", error: current };
  }

  function finishPass(active: ActivePass): StepResult {
    pass = null;
    let effectError: CompositionError | null = null;
    for (const record of active.touched) {
      if (!record.isAlive()) continue;
      const failure = flushScopeEffects(record);
      if (failure !== undefined && effectError === null) {
        effectError = toCompositionError(failure, record.name, record.position);
      }
    }
    for (const record of active.touched) {
      if (!record.isAlive()) continue;
      const tasks = record.pendingTasks;
      record.pendingTasks = [];
      for (const task of tasks) startTask(task, cfg.executor, cfg.onTaskError);
    }

    const summary: PassSummary = Object.freeze({
      kind: "pass",
      pass: active.number,
      composed: Object.freeze(active.composed.slice()),
      mounted: Object.freeze(active.mounted.slice()),
      unmounted: Object.freeze(active.unmounted.slice()),
      caught: Object.freeze(active.caught.slice()),
      durationMs: performance.now() - active.startedAt,
    });
    cfg.onPass?.(summary);
    if (effectError) return { kind: "failed", error: effectError };
    return { kind: "done", summary };
  }

  function idleSummary(): PassSummary {
    return Object.freeze({
      kind: "idle",
      pass: passNumber,
      composed: [],
      mounted: [],
      unmounted: [],
      caught: [],
      durationMs: 0,
    });
  }

  function step(): StepResult {
    assertUsable("step");
    busy = true;
    try {
      const active = pass ?? beginPass();
      if (active === null) return { kind: "idle", summary: idleSummary() };
      if (active instanceof CompositionError) return { kind: "failed", error: active };

      const record = popNext(active);
      if (!record) return finishPass(active);
      const attempt = composeRecord(active, record);
      if (!attempt.ok) return handleFailure(active, record, attempt.error);
      return { kind: "composed", scope: visit(record) };
    } finally {
      busy = false;
    }
  }

  function composeOnce(): ComposeResult {
    for (;;) {
      const result = step();
      switch (result.kind) {
        case "composed":
        case "caught":
          continue;
        case "done":
        case "idle":
          return { ok: true, value: result.summary };
        case "failed":
          return { ok: false, error: result.error };
      }
    }
  }

  function* steps(): Generator<StepResult, void, undefined> {
    for (;;) {
      const result = step();
      yield result;
      if (result.kind !== "composed" && result.kind !== "caught") return;
    }
  }

  function hasPendingWork(): boolean {
    return pass !== null || inbox.size > 0 || updates.length > 0;
  }

  async function compose(): Promise<ComposeResult> {
    assertUsable("compose");
    if (!hasPendingWork()) {
      await new Promise<void>((resolve) => {
        waiters.push(resolve);
      });
    }
    return composeOnce();
  }

  return Object.freeze({
    composeOnce,
    step,
    steps,
    [Symbol.iterator]: steps,
    compose,
    update: (fn: () => void) => {
      if (disposed) throw new LoomError("LOOM_DISPOSED", "update called after dispose()");
      updates.push(fn);
      wake();
    },
    pendingCount: () => {
      let count = scheduler.size();
      for (const record of inbox) {
        if (!scheduler.has(record.id)) count++;
      }
      return count;
    },
    hasPendingWork,
    isPassActive: () => pass !== null,
    format: () => formatScopeTree(rootSlot.scope),
    snapshot: () => snapshotScopeTree(rootSlot.scope),
    dispose: () => {
      if (disposed) return;
      if (busy) throw new LoomError("LOOM_REENTRANT_CALL", "dispose called while the composer is busy");
      busy = true;
      try {
        destroyScope(rootSlot.scope);
      } finally {
        busy = false;
      }
      scheduler.clear();
      inbox.clear();
      updates.length = 0;
      pass = null;
      disposed = true;
      wake();
    },
  });
}

export function formatTree(composer: Composer): string {
  return composer.format();
}

export function snapshotTree(composer: Composer): ScopeSnapshot {
  return composer.snapshot();
}
