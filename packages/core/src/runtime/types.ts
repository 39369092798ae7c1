/**
 * packages/core/src/runtime/types.ts — Composer result and diagnostics types.
 */

import type { CompositionError } from "../errors.js";
import type { TreePosition } from "./position.js";
import type { ScopeId } from "./scope.js";

/** Identity of a scope as seen from outside the composer. */
export type VisitedScope = Readonly<{
  id: ScopeId;
  name: string;
  position: TreePosition;
  /** Completed compositions, including the one just visited. */
  generation: number;
}>;

export type PassSummary = Readonly<{
  /** "idle" when nothing was dirty and no pass ran. */
  kind: "pass" | "idle";
  /** Number of the pass (the last completed one for "idle"). */
  pass: number;
  /** Scopes composed, in composition order. */
  composed: readonly ScopeId[];
  mounted: readonly ScopeId[];
  unmounted: readonly ScopeId[];
  /** Failures absorbed by error boundaries during the pass. */
  caught: readonly CompositionError[];
  durationMs: number;
}>;

export type ComposeResult =
  | Readonly<{ ok: true; value: PassSummary }>
  | Readonly<{ ok: false; error: CompositionError }>;

/** Outcome of composing at most one scope. */
export type StepResult =
  | Readonly<{ kind: "composed"; scope: VisitedScope }>
  | Readonly<{ kind: "caught"; error: CompositionError; boundary: VisitedScope }>
  | Readonly<{ kind: "done"; summary: PassSummary }>
  | Readonly<{ kind: "idle"; summary: PassSummary }>
  | Readonly<{ kind: "failed"; error: CompositionError }>;

export type ScopeSnapshot = Readonly<{
  id: ScopeId;
  name: string;
  key: string | undefined;
  position: string;
  generation: number;
  /** Occupied child slots only; holes are omitted. */
  children: readonly ScopeSnapshot[];
}>;
