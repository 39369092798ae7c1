/**
 * @loomwork/core
 *
 * Incremental, stateful composition runtime. Composables describe a tree;
 * the composer keeps a persistent Scope per node and recomposes only the
 * scopes whose state changed, ancestors first.
 *
 * This package has no host-specific APIs; hosts supply an Executor for
 * background tasks.
 */

// =============================================================================
// Errors
// =============================================================================

export {
  LoomError,
  type LoomErrorCode,
  CompositionError,
  type CompositionErrorOptions,
  ContextError,
} from "./errors.js";

// =============================================================================
// Configuration
// =============================================================================

export {
  type ComposerConfig,
  type ResolvedComposerConfig,
  resolveComposerConfig,
} from "./config.js";

// =============================================================================
// Nodes
// =============================================================================

export {
  type Children,
  type ComposeChild,
  type ComposeOutput,
  type Composable,
  type ComposableFactory,
  type ComposableType,
  type KeepChildren,
  createComposableType,
  defineComposable,
  isComposable,
  keepChildren,
  keyed,
  makeComposable,
} from "./runtime/node.js";

// =============================================================================
// Composer
// =============================================================================

export { type Composer, createComposer, formatTree, snapshotTree } from "./runtime/composer.js";
export type {
  ComposeResult,
  PassSummary,
  ScopeSnapshot,
  StepResult,
  VisitedScope,
} from "./runtime/types.js";
export { type TreePosition, comparePositions, formatPosition } from "./runtime/position.js";
export { type DirtyScheduler, createDirtyScheduler } from "./runtime/dirtyScheduler.js";
export { DynNode, type DynNodeHost, type DynUpdate } from "./runtime/dynNode.js";

// =============================================================================
// Hooks
// =============================================================================

export type { Scope, ScopeId, TaskStatus, EffectCleanup } from "./runtime/scope.js";
export {
  type ContextKey,
  type ContextResult,
  type RefState,
  createContext,
  useCallback,
  useContext,
  useDrop,
  useEffect,
  useMemo,
  useProvider,
  useRef,
  useState,
  useStateCell,
} from "./runtime/hooks.js";
export { StateCell, type StateSetter, type Versioned, VERSION } from "./runtime/stateCell.js";
export type { DependencyCompare } from "./runtime/memoize.js";
export {
  type Executor,
  type TaskErrorHandler,
  type TaskHandle,
  type TaskWork,
  createMicrotaskExecutor,
  useLocalTask,
  useTask,
} from "./runtime/tasks.js";

// =============================================================================
// Built-in composables
// =============================================================================

export { type MemoOptions, memo } from "./compose/memo.js";
export { type ErrorBoundaryProps, errorBoundary } from "./compose/errorBoundary.js";
export { fromFn } from "./compose/fromFn.js";
export { fromIter } from "./compose/fromIter.js";
