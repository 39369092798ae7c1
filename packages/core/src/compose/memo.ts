/**
 * packages/core/src/compose/memo.ts — Skip a subtree while its input holds.
 */

import { useRef } from "../runtime/hooks.js";
import { type DependencyCompare, type MemoKey, memoKeysEqual, toMemoKey } from "../runtime/memoize.js";
import {
  type Composable,
  createComposableType,
  keepChildren,
  makeComposable,
} from "../runtime/node.js";

export type MemoOptions = Readonly<{
  /** Replaces structural equality for plain dependencies. */
  compare?: DependencyCompare;
  key?: string;
}>;

const MEMO_TYPE = createComposableType("Memo");

/**
 * Wrap `content` so that it is only recomposed when `dependency` changes.
 *
 * Plain values compare structurally; a state cell compares by its
 * generation. While the dependency is equal, `content` keeps its scope and
 * output untouched and only takes the new props for its next recomposition.
 *
 * @example
 * memo(props.rows, Table({ rows: props.rows }))
 * memo(cell, Summary({ cell }))
 */
export function memo(dependency: unknown, content: Composable, options?: MemoOptions): Composable {
  const compare = options?.compare;
  return makeComposable(
    MEMO_TYPE,
    dependency,
    (cx) => {
      const last = useRef<MemoKey | null>(cx, null);
      const next = toMemoKey(dependency);
      if (last.current !== null && memoKeysEqual(last.current, next, compare)) {
        return keepChildren(content);
      }
      last.current = next;
      return content;
    },
    options?.key,
  );
}
