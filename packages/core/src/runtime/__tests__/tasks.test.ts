import { assert, describe, flushMicrotasks, test } from "@loomwork/testkit";
import { createComposer } from "../composer.js";
import { useState, useStateCell } from "../hooks.js";
import { defineComposable } from "../node.js";
import type { StateCell } from "../stateCell.js";
import { type Executor, type TaskHandle, useLocalTask, useTask } from "../tasks.js";

type ManualExecutor = Readonly<{
  executor: Executor;
  shared: (() => Promise<void>)[];
  local: (() => Promise<void>)[];
  runAll: () => Promise<void>;
}>;

function createManualExecutor(): ManualExecutor {
  const shared: (() => Promise<void>)[] = [];
  const local: (() => Promise<void>)[] = [];
  return {
    executor: {
      spawn: (work) => {
        shared.push(work);
      },
      spawnLocal: (work) => {
        local.push(work);
      },
    },
    shared,
    local,
    runAll: async () => {
      for (let work = shared.shift(); work !== undefined; work = shared.shift()) await work();
      for (let work = local.shift(); work !== undefined; work = local.shift()) await work();
    },
  };
}

function createGate(): Readonly<{ wait: Promise<void>; open: () => void }> {
  let open: () => void = () => {};
  const wait = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { wait, open };
}

describe("tasks", () => {
  test("a task is registered once and starts after its pass", async () => {
    const manual = createManualExecutor();
    let starts = 0;
    const holder: { tick: ((n: number) => void) | null } = { tick: null };
    const Loader = defineComposable("Loader", (_props, cx) => {
      const [, setTick] = useState(cx, () => 0);
      holder.tick = setTick;
      useTask(cx, async () => {
        starts++;
      });
      return null;
    });

    const composer = createComposer(Loader(), { executor: manual.executor });
    composer.composeOnce();
    assert.equal(manual.shared.length, 1);
    assert.equal(starts, 0);

    holder.tick?.(1);
    composer.composeOnce();
    assert.equal(manual.shared.length, 1);

    await manual.runAll();
    assert.equal(starts, 1);
  });

  test("a finished task writes its result through a setter", async () => {
    const manual = createManualExecutor();
    const seen: string[] = [];
    const Loader = defineComposable("Loader", (_props, cx) => {
      const [value, setValue] = useState(cx, () => "loading");
      seen.push(value);
      useTask(cx, async () => {
        setValue("ready");
      });
      return null;
    });

    const composer = createComposer(Loader(), { executor: manual.executor });
    composer.composeOnce();
    await manual.runAll();
    assert.equal(composer.hasPendingWork(), true);
    composer.composeOnce();
    assert.deepEqual(seen, ["loading", "ready"]);
  });

  test("destroying the scope mid-flight aborts the task and drops its writes", async () => {
    const manual = createManualExecutor();
    const gate = createGate();
    const holders: {
      show: ((v: boolean) => void) | null;
      cell: StateCell<number> | null;
      handle: TaskHandle | null;
      signal: AbortSignal | null;
    } = { show: null, cell: null, handle: null, signal: null };
    let writesAfterWait = 0;

    const Worker = defineComposable("Worker", (_props, cx) => {
      const cell = useStateCell(cx, () => 0);
      holders.cell = cell;
      holders.handle = useTask(cx, async (signal) => {
        holders.signal = signal;
        await gate.wait;
        writesAfterWait++;
        cell.set(99);
      });
      return null;
    });
    const Host = defineComposable("Host", (_props, cx) => {
      const [show, setShow] = useState(cx, () => true);
      holders.show = setShow;
      return show ? Worker() : null;
    });

    const composer = createComposer(Host(), { executor: manual.executor });
    composer.composeOnce();
    const running = manual.runAll();
    await flushMicrotasks();
    assert.equal(holders.handle?.status(), "running");

    holders.show?.(false);
    const result = composer.composeOnce();
    assert.ok(result.ok);
    assert.equal(result.value.unmounted.length, 1);
    assert.equal(holders.signal?.aborted, true);
    assert.equal(holders.handle?.status(), "cancelled");

    gate.open();
    await running;
    assert.equal(writesAfterWait, 1);
    assert.equal(holders.cell?.value, 0);
    assert.equal(holders.cell?.generation, 0);
    assert.equal(composer.hasPendingWork(), false);
    assert.equal(composer.format(), "Host");
  });

  test("cancel aborts a single task and settles it", async () => {
    const manual = createManualExecutor();
    const holder: { handle: TaskHandle | null } = { handle: null };
    const Worker = defineComposable("Worker", (_props, cx) => {
      holder.handle = useTask(cx, async () => {});
      return null;
    });

    createComposer(Worker(), { executor: manual.executor }).composeOnce();
    const handle = holder.handle;
    assert.ok(handle);
    handle.cancel();
    await handle.settled;
    assert.equal(handle.status(), "cancelled");

    await manual.runAll();
    assert.equal(handle.status(), "cancelled");
  });

  test("rejections go to onTaskError with the scope name", async () => {
    const manual = createManualExecutor();
    const errors: string[] = [];
    const Failing = defineComposable("Failing", (_props, cx) => {
      useTask(cx, async () => {
        throw new Error("fetch failed");
      });
      return null;
    });

    createComposer(Failing(), {
      executor: manual.executor,
      onTaskError: (error, scopeName) => {
        errors.push(`${scopeName}: ${error instanceof Error ? error.message : String(error)}`);
      },
    }).composeOnce();
    await manual.runAll();
    assert.deepEqual(errors, ["Failing: fetch failed"]);
  });

  test("local tasks go through spawnLocal", () => {
    const manual = createManualExecutor();
    const Both = defineComposable("Both", (_props, cx) => {
      useTask(cx, async () => {});
      useLocalTask(cx, async () => {});
      return null;
    });

    createComposer(Both(), { executor: manual.executor }).composeOnce();
    assert.equal(manual.shared.length, 1);
    assert.equal(manual.local.length, 1);
  });

  test("the default executor runs tasks on the microtask queue", async () => {
    const holder: { handle: TaskHandle | null } = { handle: null };
    let ran = false;
    const Worker = defineComposable("Worker", (_props, cx) => {
      holder.handle = useLocalTask(cx, async () => {
        ran = true;
      });
      return null;
    });

    createComposer(Worker()).composeOnce();
    assert.equal(ran, false);
    await holder.handle?.settled;
    assert.equal(ran, true);
    assert.equal(holder.handle?.status(), "done");
  });
});
