/**
 * packages/core/src/runtime/memoize.ts — Dependency comparison for memo,
 * useMemo and useEffect.
 *
 * Plain values compare structurally (lodash isEqual). Versioned values
 * (state cells) compare by identity plus generation, which skips the deep
 * walk for callers that already track changes by version.
 */

import lodash from "lodash";
import { type Versioned, VERSION, isVersioned } from "./stateCell.js";

export type MemoKey =
  | Readonly<{ kind: "value"; value: unknown }>
  | Readonly<{ kind: "version"; source: Versioned; version: number }>;

/** Custom equality for a dependency; receives the previous and next values. */
export type DependencyCompare = (prev: unknown, next: unknown) => boolean;

export function toMemoKey(dependency: unknown): MemoKey {
  if (isVersioned(dependency)) {
    return Object.freeze({ kind: "version", source: dependency, version: dependency[VERSION] });
  }
  return Object.freeze({ kind: "value", value: dependency });
}

export function memoKeysEqual(prev: MemoKey, next: MemoKey, compare?: DependencyCompare): boolean {
  if (prev.kind === "version" && next.kind === "version") {
    return prev.source === next.source && prev.version === next.version;
  }
  if (prev.kind === "value" && next.kind === "value") {
    return compare ? compare(prev.value, next.value) : lodash.isEqual(prev.value, next.value);
  }
  return false;
}
