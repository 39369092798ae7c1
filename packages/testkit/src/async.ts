/**
 * Let queued microtasks and promise continuations run. `rounds` macrotask
 * turns are awaited, which also drains microtasks queued along the way.
 */
export async function flushMicrotasks(rounds = 2): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => {
      setImmediate(resolve);
    });
  }
}
