/**
 * packages/core/src/runtime/format.ts — Deterministic tree dumps.
 *
 * `formatScopeTree` renders `Name(Child, Child(Grandchild))`; a scope with
 * no occupied child slots renders as its bare name. Holes are skipped.
 */

import { formatPosition } from "./position.js";
import type { ScopeRecord } from "./scope.js";
import type { ScopeSnapshot } from "./types.js";

function occupiedChildren(record: ScopeRecord): ScopeRecord[] {
  const out: ScopeRecord[] = [];
  for (const slot of record.children) {
    if (slot) out.push(slot.scope);
  }
  return out;
}

export function formatScopeTree(record: ScopeRecord): string {
  const children = occupiedChildren(record);
  if (children.length === 0) return record.name;
  return `${record.name}(${children.map(formatScopeTree).join(", ")})`;
}

export function snapshotScopeTree(record: ScopeRecord): ScopeSnapshot {
  return Object.freeze({
    id: record.id,
    name: record.name,
    key: record.node.key,
    position: formatPosition(record.position),
    generation: record.generation,
    children: Object.freeze(occupiedChildren(record).map(snapshotScopeTree)),
  });
}
