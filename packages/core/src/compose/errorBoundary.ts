/**
 * packages/core/src/compose/errorBoundary.ts — Catch descendant failures.
 *
 * The boundary shows `content` until a descendant's composition fails. The
 * composer then swaps in `fallback` without re-running the boundary, and the
 * boundary keeps showing the fallback until `reset` is called. A failure
 * inside the fallback itself goes to the next boundary out.
 */

import type { CompositionError } from "../errors.js";
import { BOUNDARY_CONTEXT, type BoundaryHandle } from "../runtime/boundary.js";
import { useCallback, useProvider, useRef, useStateCell } from "../runtime/hooks.js";
import { type Children, defineComposable } from "../runtime/node.js";

export type ErrorBoundaryProps = Readonly<{
  content: Children;
  fallback: (error: CompositionError, reset: () => void) => Children;
  onError?: (error: CompositionError) => void;
}>;

export const errorBoundary = defineComposable<ErrorBoundaryProps>("ErrorBoundary", (props, cx) => {
  const latest = useRef(cx, props);
  latest.current = props;
  const caught = useRef<CompositionError | null>(cx, null);
  const epoch = useStateCell(cx, () => 0);

  const reset = useCallback(cx, () => {
    caught.current = null;
    epoch.update((n) => n + 1);
  });

  useProvider(cx, BOUNDARY_CONTEXT, (): BoundaryHandle => ({
    capture: (error) => {
      if (caught.current !== null) return null;
      caught.current = error;
      latest.current.onError?.(error);
      return latest.current.fallback(error, reset);
    },
  }));

  if (caught.current !== null) return props.fallback(caught.current, reset);
  return props.content;
});
