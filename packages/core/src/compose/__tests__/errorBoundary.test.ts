import { assert, describe, test } from "@loomwork/testkit";
import type { CompositionError } from "../../errors.js";
import { createComposer } from "../../runtime/composer.js";
import { useState } from "../../runtime/hooks.js";
import { type Children, defineComposable } from "../../runtime/node.js";
import { errorBoundary } from "../errorBoundary.js";

function createFlaky() {
  const probe: {
    fail: boolean;
    reset: (() => void) | null;
    rerender: ((n: number) => void) | null;
    errors: CompositionError[];
  } = { fail: true, reset: null, rerender: null, errors: [] };
  const Flaky = defineComposable("Flaky", () => {
    if (probe.fail) throw new Error("boom");
    return null;
  });
  const Fallback = defineComposable("Fallback", () => null);
  const Root = defineComposable("Root", (_props, cx) => {
    const [, rerender] = useState(cx, () => 0);
    probe.rerender = rerender;
    return errorBoundary({
      content: Flaky(),
      fallback: (_error, reset) => {
        probe.reset = reset;
        return Fallback();
      },
      onError: (error) => {
        probe.errors.push(error);
      },
    });
  });
  return { probe, composer: createComposer(Root()) };
}

describe("errorBoundary", () => {
  test("a failing descendant is replaced by the fallback", () => {
    const { composer, probe } = createFlaky();
    const result = composer.composeOnce();
    assert.ok(result.ok);
    assert.equal(result.value.caught.length, 1);
    assert.equal(result.value.caught[0]?.message, "Flaky threw: Error: boom");
    assert.equal(composer.format(), "Root(ErrorBoundary(Fallback))");
    assert.equal(probe.errors.length, 1);
    assert.equal(probe.errors[0], result.value.caught[0]);
  });

  test("the step that fails reports the catching boundary", () => {
    const { composer } = createFlaky();
    const kinds: string[] = [];
    let boundaryName = "";
    for (const step of composer) {
      kinds.push(step.kind);
      if (step.kind === "caught") boundaryName = step.boundary.name;
    }
    assert.deepEqual(kinds, ["composed", "composed", "caught", "composed", "done"]);
    assert.equal(boundaryName, "ErrorBoundary");
  });

  test("reset shows the content again", () => {
    const { composer, probe } = createFlaky();
    composer.composeOnce();

    probe.fail = false;
    probe.reset?.();
    const result = composer.composeOnce();
    assert.ok(result.ok);
    assert.deepEqual(result.value.caught, []);
    assert.equal(composer.format(), "Root(ErrorBoundary(Flaky))");
    assert.equal(probe.errors.length, 1);
  });

  test("the fallback stays while the boundary recomposes", () => {
    const { composer, probe } = createFlaky();
    composer.composeOnce();

    probe.rerender?.(1);
    const result = composer.composeOnce();
    assert.ok(result.ok);
    assert.deepEqual(result.value.composed, [1, 2, 4]);
    assert.deepEqual(result.value.mounted, []);
    assert.equal(composer.format(), "Root(ErrorBoundary(Fallback))");
    assert.equal(probe.errors.length, 1);
  });

  test("a fallback with the content's type replaces the failed subtree", () => {
    const Broken = defineComposable("Broken", () => {
      throw new Error("boom");
    });
    const Leaf = defineComposable("Leaf", () => null);
    const Panel = defineComposable<Readonly<{ broken: boolean }>>("Panel", (props) =>
      props.broken ? Broken() : Leaf(),
    );
    const Root = defineComposable("Root", () =>
      errorBoundary({ content: Panel({ broken: true }), fallback: () => Panel({ broken: false }) }),
    );
    const composer = createComposer(Root());
    const result = composer.composeOnce();
    assert.ok(result.ok);
    assert.equal(result.value.caught.length, 1);
    assert.deepEqual(result.value.unmounted, [4, 3]);
    assert.deepEqual(result.value.composed, [1, 2, 3, 5, 6]);
    assert.equal(composer.format(), "Root(ErrorBoundary(Panel(Leaf)))");
  });

  test("a failing fallback propagates out of the boundary", () => {
    const Flaky = defineComposable("Flaky", () => {
      throw new Error("boom");
    });
    const Broken = defineComposable("Broken", () => {
      throw new Error("fallback broke");
    });
    const Root = defineComposable("Root", () =>
      errorBoundary({ content: Flaky(), fallback: () => Broken() }),
    );
    const composer = createComposer(Root());
    const result = composer.composeOnce();
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.message, "Broken threw: Error: fallback broke");
  });

  test("an outer boundary catches what the inner fallback throws", () => {
    const Flaky = defineComposable("Flaky", () => {
      throw new Error("boom");
    });
    const Broken = defineComposable("Broken", () => {
      throw new Error("fallback broke");
    });
    const Outer = defineComposable("Outer", () => null);
    const inner = (): Children => errorBoundary({ content: Flaky(), fallback: () => Broken() });
    const Root = defineComposable("Root", () =>
      errorBoundary({ content: inner(), fallback: () => Outer() }),
    );
    const composer = createComposer(Root());
    const result = composer.composeOnce();
    assert.ok(result.ok);
    assert.deepEqual(
      result.value.caught.map((e) => e.message),
      ["Flaky threw: Error: boom", "Broken threw: Error: fallback broke"],
    );
    assert.equal(composer.format(), "Root(ErrorBoundary(Outer))");
  });
});
