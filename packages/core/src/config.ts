/**
 * packages/core/src/config.ts — Composer configuration.
 */

import { DEV_MODE } from "./debug/warn.js";
import { LoomError } from "./errors.js";
import { type Executor, type TaskErrorHandler, createMicrotaskExecutor } from "./runtime/tasks.js";
import type { PassSummary } from "./runtime/types.js";

export type ComposerConfig = Readonly<{
  /** Runs background tasks. Defaults to a microtask executor. */
  executor?: Executor;
  /** Check hook counts between compositions. Defaults to NODE_ENV !== "production". */
  devChecks?: boolean;
  /** Deepest allowed scope; deeper trees throw LOOM_DEPTH_EXCEEDED. */
  maxDepth?: number;
  /** Depth past which a dev warning is printed once. */
  depthWarnThreshold?: number;
  onTaskError?: TaskErrorHandler;
  onPass?: (summary: PassSummary) => void;
}>;

export type ResolvedComposerConfig = Readonly<{
  executor: Executor;
  devChecks: boolean;
  maxDepth: number;
  depthWarnThreshold: number;
  onTaskError: TaskErrorHandler | undefined;
  onPass: ((summary: PassSummary) => void) | undefined;
}>;

/** Default configuration values. */
const DEFAULT_MAX_DEPTH = 500;
const DEFAULT_DEPTH_WARN_THRESHOLD = 200;

function invalidConfig(detail: string): never {
  throw new LoomError("LOOM_INVALID_CONFIG", detail);
}

function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidConfig(`${name} must be a positive integer`);
  return v;
}

function requireExecutor(v: Executor): Executor {
  if (typeof v !== "object" || v === null || typeof v.spawn !== "function") {
    invalidConfig("executor must provide a spawn function");
  }
  if (v.spawnLocal !== undefined && typeof v.spawnLocal !== "function") {
    invalidConfig("executor.spawnLocal must be a function when present");
  }
  return v;
}

export function resolveComposerConfig(config: ComposerConfig | undefined): ResolvedComposerConfig {
  const c = config ?? {};
  const executor = c.executor === undefined ? createMicrotaskExecutor() : requireExecutor(c.executor);
  const maxDepth =
    c.maxDepth === undefined ? DEFAULT_MAX_DEPTH : requirePositiveInt("maxDepth", c.maxDepth);
  const depthWarnThreshold =
    c.depthWarnThreshold === undefined
      ? Math.min(DEFAULT_DEPTH_WARN_THRESHOLD, maxDepth)
      : requirePositiveInt("depthWarnThreshold", c.depthWarnThreshold);
  if (depthWarnThreshold > maxDepth) {
    invalidConfig("depthWarnThreshold must not exceed maxDepth");
  }
  if (c.devChecks !== undefined && typeof c.devChecks !== "boolean") {
    invalidConfig("devChecks must be a boolean when present");
  }
  if (c.onTaskError !== undefined && typeof c.onTaskError !== "function") {
    invalidConfig("onTaskError must be a function when present");
  }
  if (c.onPass !== undefined && typeof c.onPass !== "function") {
    invalidConfig("onPass must be a function when present");
  }

  return Object.freeze({
    executor,
    devChecks: c.devChecks ?? DEV_MODE,
    maxDepth,
    depthWarnThreshold,
    onTaskError: c.onTaskError,
    onPass: c.onPass,
  });
}
