/**
 * packages/core/src/runtime/dirtyScheduler.ts — Position-ordered pending set.
 *
 * Holds the scopes awaiting recomposition in the current pass. Backed by a
 * binary min-heap on tree position plus an id index:
 *   - insert: O(log n), idempotent per id
 *   - popMin: O(log n), always yields an ancestor before its descendants
 *   - remove: O(1), lazily skipped by popMin
 */

import { type TreePosition, comparePositions } from "./position.js";

export type SchedulerItem = Readonly<{ id: number; position: TreePosition }>;

export type DirtyEntry<T extends SchedulerItem> = Readonly<{
  position: TreePosition;
  item: T;
}>;

type HeapEntry<T> = {
  readonly position: TreePosition;
  readonly item: T;
  live: boolean;
};

export type DirtyScheduler<T extends SchedulerItem> = Readonly<{
  /** Insert an item; returns false if it is already pending. */
  insert: (item: T) => boolean;
  /** Remove and return the lowest-position pending item. */
  popMin: () => T | undefined;
  has: (id: number) => boolean;
  /** Drop a pending item (e.g. its scope was destroyed). */
  remove: (id: number) => boolean;
  size: () => number;
  clear: () => void;
  /** Pending entries in pop order (for debugging/testing). */
  entries: () => readonly DirtyEntry<T>[];
}>;

export function createDirtyScheduler<T extends SchedulerItem>(): DirtyScheduler<T> {
  let heap: HeapEntry<T>[] = [];
  const byId = new Map<number, HeapEntry<T>>();

  function less(i: number, j: number): boolean {
    const a = heap[i];
    const b = heap[j];
    if (!a || !b) return false;
    return comparePositions(a.position, b.position) < 0;
  }

  function swap(i: number, j: number): void {
    const a = heap[i];
    const b = heap[j];
    if (!a || !b) return;
    heap[i] = b;
    heap[j] = a;
  }

  function siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!less(i, parent)) break;
      swap(i, parent);
      i = parent;
    }
  }

  function siftDown(index: number): void {
    let i = index;
    const n = heap.length;
    for (;;) {
      const left = i * 2 + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && less(left, smallest)) smallest = left;
      if (right < n && less(right, smallest)) smallest = right;
      if (smallest === i) return;
      swap(i, smallest);
      i = smallest;
    }
  }

  function popHead(): HeapEntry<T> | undefined {
    const head = heap[0];
    const last = heap.pop();
    if (heap.length > 0 && last) {
      heap[0] = last;
      siftDown(0);
    }
    return head;
  }

  function discardDeadHead(): void {
    while (heap.length > 0 && heap[0]?.live === false) {
      popHead();
    }
  }

  return Object.freeze({
    insert(item: T): boolean {
      if (byId.has(item.id)) return false;
      const entry: HeapEntry<T> = { position: item.position, item, live: true };
      byId.set(item.id, entry);
      heap.push(entry);
      siftUp(heap.length - 1);
      return true;
    },

    popMin(): T | undefined {
      discardDeadHead();
      const head = popHead();
      if (!head) return undefined;
      byId.delete(head.item.id);
      return head.item;
    },

    has(id: number): boolean {
      return byId.has(id);
    },

    remove(id: number): boolean {
      const entry = byId.get(id);
      if (!entry) return false;
      entry.live = false;
      byId.delete(id);
      return true;
    },

    size(): number {
      return byId.size;
    },

    clear(): void {
      heap = [];
      byId.clear();
    },

    entries(): readonly DirtyEntry<T>[] {
      return Object.freeze(
        Array.from(byId.values())
          .sort((a, b) => comparePositions(a.position, b.position))
          .map((e) => Object.freeze({ position: e.position, item: e.item })),
      );
    },
  });
}
