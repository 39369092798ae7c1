/**
 * packages/core/src/runtime/position.ts — Hierarchical tree positions.
 *
 * A position is the path of sibling segments from the root. Segments are
 * handed out by the parent in creation order and never renumbered, so a new
 * sibling gets a fresh segment while existing siblings keep theirs. Ordering
 * is lexicographic with a prefix sorting first: every ancestor sorts before
 * all of its descendants.
 */

export type TreePosition = readonly number[];

export const ROOT_POSITION: TreePosition = Object.freeze([]);

export function childPosition(parent: TreePosition, segment: number): TreePosition {
  return Object.freeze([...parent, segment]);
}

/** Negative when `a` sorts before `b`, zero when equal. */
export function comparePositions(a: TreePosition, b: TreePosition): number {
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    const sa = a[i] ?? 0;
    const sb = b[i] ?? 0;
    if (sa !== sb) return sa - sb;
  }
  return a.length - b.length;
}

export function formatPosition(position: TreePosition): string {
  return `/${position.join("/")}`;
}
