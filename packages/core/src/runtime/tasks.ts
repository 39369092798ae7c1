/**
 * packages/core/src/runtime/tasks.ts — Background work bound to a scope.
 *
 * A task is registered on the first composition of its scope and started
 * after that pass has finished, through the host-supplied Executor. The
 * task receives an AbortSignal that fires when the scope is destroyed or the
 * task is cancelled. Setters of a destroyed scope are inert, so a task that
 * ignores the signal still cannot write into a dead scope.
 */

import { describeThrown } from "../errors.js";
import { warnDev } from "../debug/warn.js";
import { type Scope, type TaskKind, type TaskRecord, type TaskStatus, scopeRecordOf } from "./scope.js";

export type TaskWork = (signal: AbortSignal) => Promise<void>;

/**
 * Host capability that runs a unit of asynchronous work to completion
 * independently of the composition pass. Work handed to an executor never
 * rejects.
 */
export type Executor = Readonly<{
  /** Work that may run anywhere the host chooses. */
  spawn: (work: () => Promise<void>) => void;
  /** Work that must stay on the composing thread; falls back to `spawn`. */
  spawnLocal?: (work: () => Promise<void>) => void;
}>;

export type TaskHandle = Readonly<{
  status: () => TaskStatus;
  /** Resolves once the task finished, failed or was cancelled. */
  settled: Promise<void>;
  cancel: () => void;
}>;

export type TaskErrorHandler = (error: unknown, scopeName: string) => void;

/** Default executor: each unit of work starts on its own microtask. */
export function createMicrotaskExecutor(): Executor {
  return Object.freeze({
    spawn: (work: () => Promise<void>) => {
      queueMicrotask(() => {
        work().catch((err: unknown) => {
          warnDev("executor", `spawned work rejected: ${describeThrown(err)}`);
        });
      });
    },
  });
}

function createTaskRecord(kind: TaskKind, run: TaskWork, scopeName: string): TaskRecord {
  let settle: () => void = () => {};
  const settled = new Promise<void>((resolve) => {
    settle = resolve;
  });
  return {
    kind,
    controller: new AbortController(),
    run,
    settled,
    settle,
    scopeName,
    status: "pending",
  };
}

function toHandle(task: TaskRecord): TaskHandle {
  return Object.freeze({
    status: () => task.status,
    settled: task.settled,
    cancel: () => cancelTask(task),
  });
}

export function cancelTask(task: TaskRecord): void {
  if (task.status !== "pending" && task.status !== "running") return;
  task.status = "cancelled";
  task.controller.abort();
  task.settle();
}

function registerTask(cx: Scope, kind: TaskKind, work: TaskWork): TaskHandle {
  const record = scopeRecordOf(cx);
  let created = false;
  const slot = record.claim("task", () => {
    created = true;
    return { kind: "task", task: createTaskRecord(kind, work, record.name) };
  });
  if (created) record.pendingTasks.push(slot.task);
  return toHandle(slot.task);
}

/**
 * Register background work once for this scope. The work may be handed to
 * any executor thread; it is aborted when the scope is destroyed.
 */
export function useTask(cx: Scope, work: TaskWork): TaskHandle {
  return registerTask(cx, "shared", work);
}

/** Like useTask, but the work is submitted through `spawnLocal`. */
export function useLocalTask(cx: Scope, work: TaskWork): TaskHandle {
  return registerTask(cx, "local", work);
}

/**
 * Hand a registered task to the executor. Rejections are routed to
 * `onError`, or to a dev warning when no handler is configured.
 */
export function startTask(task: TaskRecord, executor: Executor, onError?: TaskErrorHandler): void {
  if (task.status !== "pending") return;
  task.status = "running";

  const job = async (): Promise<void> => {
    if (task.status !== "running") return;
    try {
      await task.run(task.controller.signal);
      if (task.status === "running") task.status = "done";
    } catch (err) {
      if (task.status !== "running") return;
      task.status = "failed";
      if (onError) {
        onError(err, task.scopeName);
      } else {
        warnDev("tasks", `task in ${task.scopeName} failed: ${describeThrown(err)}`);
      }
    } finally {
      task.settle();
    }
  };

  const submit = task.kind === "local" ? (executor.spawnLocal ?? executor.spawn) : executor.spawn;
  submit(job);
}
