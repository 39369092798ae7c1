/**
 * packages/core/src/errors.ts — Error taxonomy for the composition runtime.
 *
 * Two families:
 *   - LoomError: programmer errors and deterministic runtime violations.
 *     Always thrown, never absorbed by an error boundary.
 *   - CompositionError / ContextError: recoverable failures reported to the
 *     caller (boundary, composable, or host) as values.
 */

import type { TreePosition } from "./runtime/position.js";

/**
 * Deterministic error codes for runtime violations.
 * These are surfaced as LoomError instances.
 */
export type LoomErrorCode =
  | "LOOM_HOOK_ORDER"
  | "LOOM_HOOK_COUNT"
  | "LOOM_STALE_SCOPE"
  | "LOOM_ALIASED_NODE"
  | "LOOM_REENTRANT_CALL"
  | "LOOM_DUPLICATE_KEY"
  | "LOOM_INVALID_NODE"
  | "LOOM_DEPTH_EXCEEDED"
  | "LOOM_INVALID_CONFIG"
  | "LOOM_DISPOSED";

/**
 * Error class for misuse of the hook discipline and other fatal violations.
 * The `code` property identifies the specific violation.
 */
export class LoomError extends Error {
  override readonly name = "LoomError";
  readonly code: LoomErrorCode;

  constructor(code: LoomErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LoomError);
    }
  }
}

export type CompositionErrorOptions = Readonly<{
  cause?: unknown;
  scopeName?: string;
  position?: TreePosition;
}>;

/**
 * A composable reported failure. Propagates to the nearest error boundary,
 * or to the host as a pass-level failure.
 */
export class CompositionError extends Error {
  override readonly name = "CompositionError";
  /** Name of the composable that failed; filled in by the composer when absent. */
  scopeName: string | undefined;
  position: TreePosition | undefined;

  constructor(message: string, options?: CompositionErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.scopeName = options?.scopeName;
    this.position = options?.position;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CompositionError);
    }
  }
}

/** No ancestor scope provides the requested context key. */
export class ContextError extends Error {
  override readonly name = "ContextError";
  readonly contextName: string;

  constructor(contextName: string) {
    super(`Context value not found for key: ${contextName}`);
    this.contextName = contextName;
  }
}

export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  return String(v);
}

/**
 * Normalize a value thrown by user code into a CompositionError carrying the
 * failing scope's location. LoomErrors are rethrown untouched.
 */
export function toCompositionError(
  thrown: unknown,
  scopeName: string,
  position: TreePosition,
): CompositionError {
  if (thrown instanceof LoomError) throw thrown;
  if (thrown instanceof CompositionError) {
    if (thrown.scopeName === undefined) {
      thrown.scopeName = scopeName;
      thrown.position = position;
    }
    return thrown;
  }
  return new CompositionError(`${scopeName} threw: ${describeThrown(thrown)}`, {
    cause: thrown,
    scopeName,
    position,
  });
}
