/**
 * packages/core/src/compose/fromIter.ts — Keyed lists.
 */

import {
  type Composable,
  createComposableType,
  keyed,
  makeComposable,
} from "../runtime/node.js";

const FROM_ITER_TYPE = createComposableType("FromIter");

/**
 * One child per item, keyed by `getKey`. Children follow their key when the
 * list is reordered, so each keeps its state.
 */
export function fromIter<T>(
  items: readonly T[],
  getKey: (item: T, index: number) => string,
  render: (item: T, index: number) => Composable,
): Composable {
  return makeComposable(FROM_ITER_TYPE, items, () =>
    items.map((item, index) => keyed(getKey(item, index), render(item, index))),
  );
}
