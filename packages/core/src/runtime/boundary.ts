/**
 * packages/core/src/runtime/boundary.ts — Error boundary capability.
 *
 * A scope becomes an error boundary by providing a BoundaryHandle under
 * BOUNDARY_CONTEXT. When a descendant's composition fails, the composer asks
 * the nearest boundary to capture the error; a non-null answer becomes the
 * boundary's new children and the pass goes on. A null answer passes the
 * error to the next boundary out.
 */

import type { CompositionError } from "../errors.js";
import { createContext } from "./hooks.js";
import type { Children } from "./node.js";

export type BoundaryHandle = Readonly<{
  capture: (error: CompositionError) => Children | null;
}>;

export const BOUNDARY_CONTEXT = createContext<BoundaryHandle>("loom.errorBoundary");

export function isBoundaryHandle(v: unknown): v is BoundaryHandle {
  return typeof v === "object" && v !== null && "capture" in v && typeof v.capture === "function";
}
