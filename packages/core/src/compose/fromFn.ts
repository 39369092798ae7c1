/**
 * packages/core/src/compose/fromFn.ts — Inline composables.
 */

import {
  type Children,
  type Composable,
  type ComposableType,
  createComposableType,
  makeComposable,
} from "../runtime/node.js";
import type { Scope } from "../runtime/scope.js";

const typesByName = new Map<string, ComposableType>();

function typeFor(name: string): ComposableType {
  const existing = typesByName.get(name);
  if (existing) return existing;
  const created = createComposableType(name);
  typesByName.set(name, created);
  return created;
}

/**
 * Build a composable from a function of its scope. Nodes made with the same
 * name share one type, so their scopes survive recomposition of the parent.
 * Give distinct names to functions that can take turns at one slot: under a
 * shared name the old scope is kept and the new hooks fail with
 * LOOM_HOOK_ORDER instead of the scope being replaced.
 */
export function fromFn(fn: (cx: Scope) => Children, name = "FromFn"): Composable {
  return makeComposable(typeFor(name), fn, fn);
}
