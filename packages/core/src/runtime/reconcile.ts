/**
 * packages/core/src/runtime/reconcile.ts — Child slot reconciliation.
 *
 * Matches the nodes a scope just produced against its previous child slots
 * to decide which scopes are kept, which are replaced, which are new, and
 * which are removed.
 *
 * Reconciliation rules:
 *   - Keyed children match by key (deterministic across reordering)
 *   - Unkeyed children match by index (position-based)
 *   - Holes keep their index but own no scope
 *   - A matched slot whose node type changed is replaced in place (DynNode)
 *   - Duplicate keys within siblings are fatal errors, detected before any
 *     slot is touched
 */

import { DynNode, type DynNodeHost } from "./dynNode.js";
import type { Composable } from "./node.js";
import { childPosition } from "./position.js";
import type { ScopeRecord } from "./scope.js";

/** Slot identifier: keyed ("k:mykey") or indexed ("i:0"). */
export type SlotId = `k:${string}` | `i:${number}`;

export type ReconcileFatal = Readonly<{
  code: "LOOM_DUPLICATE_KEY";
  detail: string;
}>;

export type ReconciledChild = Readonly<{
  slotId: SlotId;
  dyn: DynNode;
  kind: "reused" | "replaced" | "new";
  prevIndex: number | null;
}>;

export type ReconcileChildrenOk = Readonly<{
  /** Next slot list, holes included. */
  nextSlots: readonly (DynNode | null)[];
  /** Occupied slots in output order. */
  children: readonly ReconciledChild[];
  /** Previous slots with no counterpart; the caller destroys them. */
  removed: readonly DynNode[];
}>;

export type ReconcileChildrenResult =
  | Readonly<{ ok: true; value: ReconcileChildrenOk }>
  | Readonly<{ ok: false; fatal: ReconcileFatal }>;

/** Compute the slot ID for a child: keyed if key present, indexed otherwise. */
export function slotIdForChild(key: string | undefined, childIndex: number): SlotId {
  if (key !== undefined) return `k:${key}`;
  return `i:${childIndex}`;
}

function duplicateKeyDetail(parent: ScopeRecord, key: string, aIndex: number, bIndex: number): string {
  return `duplicate sibling key "${key}" under ${parent.name} (scope ${String(
    parent.id,
  )}, child indices ${String(aIndex)} and ${String(bIndex)})`;
}

function findDuplicateKey(
  parent: ScopeRecord,
  nextNodes: readonly (Composable | null)[],
): ReconcileFatal | null {
  const seen = new Map<string, number>();
  for (let i = 0; i < nextNodes.length; i++) {
    const key = nextNodes[i]?.key;
    if (key === undefined) continue;
    const existing = seen.get(key);
    if (existing !== undefined) {
      return { code: "LOOM_DUPLICATE_KEY", detail: duplicateKeyDetail(parent, key, existing, i) };
    }
    seen.set(key, i);
  }
  return null;
}

function containsAnyKey(
  prevSlots: readonly (DynNode | null)[],
  nextNodes: readonly (Composable | null)[],
): boolean {
  for (const prev of prevSlots) {
    if (prev && prev.key !== undefined) return true;
  }
  for (const next of nextNodes) {
    if (next && next.key !== undefined) return true;
  }
  return false;
}

function createSlot(parent: ScopeRecord, node: Composable, host: DynNodeHost): DynNode {
  const position = childPosition(parent.position, parent.allocateChildSegment());
  return new DynNode(node, parent, position, host);
}

function reconcileUnkeyed(
  parent: ScopeRecord,
  prevSlots: readonly (DynNode | null)[],
  nextNodes: readonly (Composable | null)[],
  host: DynNodeHost,
): ReconcileChildrenOk {
  const nextSlots: (DynNode | null)[] = [];
  const children: ReconciledChild[] = [];
  const removed: DynNode[] = [];

  for (let i = 0; i < nextNodes.length; i++) {
    const node = nextNodes[i] ?? null;
    const prev = prevSlots[i] ?? null;
    const slotId: SlotId = `i:${i}`;

    if (node === null) {
      if (prev) removed.push(prev);
      nextSlots.push(null);
      continue;
    }
    if (prev) {
      const kind = prev.update(node);
      nextSlots.push(prev);
      children.push({ slotId, dyn: prev, kind, prevIndex: i });
      continue;
    }
    const dyn = createSlot(parent, node, host);
    nextSlots.push(dyn);
    children.push({ slotId, dyn, kind: "new", prevIndex: null });
  }

  for (let i = nextNodes.length; i < prevSlots.length; i++) {
    const prev = prevSlots[i];
    if (prev) removed.push(prev);
  }

  return { nextSlots, children, removed };
}

/**
 * Reconcile previous child slots against newly produced nodes, updating
 * matched slots in place and creating scopes for new ones.
 */
export function reconcileChildren(
  parent: ScopeRecord,
  prevSlots: readonly (DynNode | null)[],
  nextNodes: readonly (Composable | null)[],
  host: DynNodeHost,
): ReconcileChildrenResult {
  const fatal = findDuplicateKey(parent, nextNodes);
  if (fatal) return { ok: false, fatal };

  if (!containsAnyKey(prevSlots, nextNodes)) {
    return { ok: true, value: reconcileUnkeyed(parent, prevSlots, nextNodes, host) };
  }

  const prevBySlotId = new Map<SlotId, number>();
  for (let i = 0; i < prevSlots.length; i++) {
    const prev = prevSlots[i];
    if (!prev) continue;
    prevBySlotId.set(slotIdForChild(prev.key, i), i);
  }

  const usedPrev = new Array<boolean>(prevSlots.length).fill(false);
  const nextSlots: (DynNode | null)[] = [];
  const children: ReconciledChild[] = [];

  for (let nextIndex = 0; nextIndex < nextNodes.length; nextIndex++) {
    const node = nextNodes[nextIndex] ?? null;
    if (node === null) {
      nextSlots.push(null);
      continue;
    }
    const slotId = slotIdForChild(node.key, nextIndex);
    const prevIndex = prevBySlotId.get(slotId);
    const prev = prevIndex !== undefined ? prevSlots[prevIndex] : undefined;

    if (prevIndex !== undefined && prev && usedPrev[prevIndex] === false) {
      usedPrev[prevIndex] = true;
      const kind = prev.update(node);
      nextSlots.push(prev);
      children.push({ slotId, dyn: prev, kind, prevIndex });
      continue;
    }

    const dyn = createSlot(parent, node, host);
    nextSlots.push(dyn);
    children.push({ slotId, dyn, kind: "new", prevIndex: null });
  }

  const removed: DynNode[] = [];
  for (let i = 0; i < prevSlots.length; i++) {
    const prev = prevSlots[i];
    if (prev && !usedPrev[i]) removed.push(prev);
  }

  return { ok: true, value: { nextSlots, children, removed } };
}
