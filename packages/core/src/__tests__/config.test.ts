import { assert, describe, test } from "@loomwork/testkit";
import { resolveComposerConfig } from "../config.js";
import { DEV_MODE } from "../debug/warn.js";
import { LoomError } from "../errors.js";

function isConfigError(err: unknown): boolean {
  return err instanceof LoomError && err.code === "LOOM_INVALID_CONFIG";
}

describe("composer config", () => {
  test("defaults", () => {
    const cfg = resolveComposerConfig(undefined);
    assert.equal(cfg.maxDepth, 500);
    assert.equal(cfg.depthWarnThreshold, 200);
    assert.equal(cfg.devChecks, DEV_MODE);
    assert.equal(cfg.onPass, undefined);
    assert.equal(cfg.onTaskError, undefined);
    assert.equal(typeof cfg.executor.spawn, "function");
  });

  test("the warn threshold follows a smaller maxDepth", () => {
    const cfg = resolveComposerConfig({ maxDepth: 50 });
    assert.equal(cfg.depthWarnThreshold, 50);
  });

  test("explicit values are kept", () => {
    const spawn = (): void => {};
    const cfg = resolveComposerConfig({
      executor: { spawn },
      devChecks: false,
      maxDepth: 64,
      depthWarnThreshold: 32,
    });
    assert.equal(cfg.executor.spawn, spawn);
    assert.equal(cfg.devChecks, false);
    assert.equal(cfg.maxDepth, 64);
    assert.equal(cfg.depthWarnThreshold, 32);
  });

  test("rejects non-positive or fractional depths", () => {
    assert.throws(() => resolveComposerConfig({ maxDepth: 0 }), isConfigError);
    assert.throws(() => resolveComposerConfig({ maxDepth: 2.5 }), isConfigError);
    assert.throws(() => resolveComposerConfig({ depthWarnThreshold: -1 }), isConfigError);
  });

  test("rejects a warn threshold above maxDepth", () => {
    assert.throws(
      () => resolveComposerConfig({ maxDepth: 10, depthWarnThreshold: 11 }),
      (err: unknown) =>
        isConfigError(err) &&
        err instanceof Error &&
        err.message === "depthWarnThreshold must not exceed maxDepth",
    );
  });
});
