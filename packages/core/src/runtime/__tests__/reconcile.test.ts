import { assert, describe, test } from "@loomwork/testkit";
import type { DynNode } from "../dynNode.js";
import { defineComposable, keyed } from "../node.js";
import { reconcileChildren } from "../reconcile.js";
import { createTreeHarness } from "./treeHarness.js";

const Text = defineComposable<{ text: string }>("Text", () => null);
const Spacer = defineComposable("Spacer", () => null);

function slotsOrThrow(result: ReturnType<typeof reconcileChildren>): readonly (DynNode | null)[] {
  if (!result.ok) throw new Error(`unexpected fatal: ${result.fatal.detail}`);
  return result.value.nextSlots;
}

describe("child reconciliation", () => {
  test("unkeyed children match by index", () => {
    const h = createTreeHarness();
    const first = reconcileChildren(h.parent, [], [Text({ text: "a" }), Spacer()], h.host);
    assert.ok(first.ok);
    assert.deepEqual(
      first.value.children.map((c) => c.kind),
      ["new", "new"],
    );

    const second = reconcileChildren(
      h.parent,
      first.value.nextSlots,
      [Text({ text: "b" }), Spacer()],
      h.host,
    );
    assert.ok(second.ok);
    assert.deepEqual(
      second.value.children.map((c) => c.kind),
      ["reused", "reused"],
    );
    assert.equal(second.value.nextSlots[0], first.value.nextSlots[0]);
    assert.deepEqual(second.value.nextSlots[0]?.node.props, { text: "b" });
    assert.deepEqual(h.created(), ["Text#2", "Spacer#3"]);
  });

  test("a type change at an index replaces the scope at the same position", () => {
    const h = createTreeHarness();
    const prev = slotsOrThrow(reconcileChildren(h.parent, [], [Text({ text: "a" }), Spacer()], h.host));
    const oldScope = prev[1]?.scope;

    const next = reconcileChildren(h.parent, prev, [Text({ text: "a" }), Text({ text: "c" })], h.host);
    assert.ok(next.ok);
    assert.equal(next.value.children[1]?.kind, "replaced");
    assert.equal(next.value.nextSlots[1], prev[1]);
    assert.notEqual(next.value.nextSlots[1]?.scope, oldScope);
    assert.deepEqual(next.value.nextSlots[1]?.scope.position, oldScope?.position);
    assert.deepEqual(h.destroyed(), ["Spacer#3"]);
  });

  test("shrinking reports trailing slots as removed", () => {
    const h = createTreeHarness();
    const prev = slotsOrThrow(
      reconcileChildren(h.parent, [], [Spacer(), Spacer(), Spacer()], h.host),
    );
    const next = reconcileChildren(h.parent, prev, [Spacer()], h.host);
    assert.ok(next.ok);
    assert.deepEqual(
      next.value.removed.map((d) => d.scope.id),
      [3, 4],
    );
    assert.deepEqual(h.destroyed(), []);
  });

  test("keyed children follow their key across reordering", () => {
    const h = createTreeHarness();
    const row = (k: string) => keyed(k, Text({ text: k }));
    const prev = slotsOrThrow(reconcileChildren(h.parent, [], [row("a"), row("b"), row("c")], h.host));

    const next = reconcileChildren(h.parent, prev, [row("c"), row("a"), row("b")], h.host);
    assert.ok(next.ok);
    assert.deepEqual(
      next.value.nextSlots.map((s) => s?.scope.id),
      [4, 2, 3],
    );
    assert.deepEqual(
      next.value.children.map((c) => c.prevIndex),
      [2, 0, 1],
    );
    assert.deepEqual(
      next.value.children.map((c) => c.slotId),
      ["k:c", "k:a", "k:b"],
    );
    assert.equal(next.value.removed.length, 0);
  });

  test("keyed insertion creates only the new key", () => {
    const h = createTreeHarness();
    const row = (k: string) => keyed(k, Text({ text: k }));
    const prev = slotsOrThrow(reconcileChildren(h.parent, [], [row("a"), row("c")], h.host));
    const next = reconcileChildren(h.parent, prev, [row("a"), row("b"), row("c")], h.host);
    assert.ok(next.ok);
    assert.deepEqual(
      next.value.children.map((c) => c.kind),
      ["reused", "new", "reused"],
    );
    // New siblings get a fresh segment; existing siblings keep theirs.
    assert.deepEqual(
      next.value.nextSlots.map((s) => s?.position),
      [[0], [2], [1]],
    );
  });

  test("holes keep their index without a scope", () => {
    const h = createTreeHarness();
    const result = reconcileChildren(h.parent, [], [Spacer(), null, Spacer()], h.host);
    assert.ok(result.ok);
    assert.equal(result.value.nextSlots.length, 3);
    assert.equal(result.value.nextSlots[1], null);
    assert.deepEqual(
      result.value.children.map((c) => c.slotId),
      ["i:0", "i:2"],
    );
  });

  test("filling a hole creates a scope and emptying a slot removes it", () => {
    const h = createTreeHarness();
    const prev = slotsOrThrow(reconcileChildren(h.parent, [], [Spacer(), null], h.host));
    const next = reconcileChildren(h.parent, prev, [null, Spacer()], h.host);
    assert.ok(next.ok);
    assert.equal(next.value.nextSlots[0], null);
    assert.equal(next.value.children[0]?.kind, "new");
    assert.deepEqual(
      next.value.removed.map((d) => d.scope.id),
      [2],
    );
  });

  test("duplicate sibling keys are fatal before any slot is touched", () => {
    const h = createTreeHarness();
    const result = reconcileChildren(
      h.parent,
      [],
      [keyed("x", Spacer()), Spacer(), keyed("x", Text({ text: "t" }))],
      h.host,
    );
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.fatal.code, "LOOM_DUPLICATE_KEY");
    assert.equal(
      result.fatal.detail,
      'duplicate sibling key "x" under HookProbe (scope 1, child indices 0 and 2)',
    );
    assert.deepEqual(h.created(), []);
  });
});
