/**
 * packages/core/src/runtime/node.ts — Composable nodes.
 *
 * A Composable is an immutable description: a type identity, optional key,
 * the props it was created with, and a compose function closed over those
 * props. The composer re-runs `compose` against the node's persistent Scope.
 *
 * Type identity is the ComposableType object created once per definition,
 * so two nodes from the same factory are "the same concrete type" whatever
 * their props.
 */

import { LoomError } from "../errors.js";
import type { Scope } from "./scope.js";

/** Runtime type identity shared by every node of one definition. */
export type ComposableType = Readonly<{
  id: number;
  name: string;
}>;

/** A child slot: a node, or a hole that reserves its index without a Scope. */
export type ComposeChild = Composable | null | undefined | false;

/** Zero or more children; nested arrays are flattened in order. */
export type Children = ComposeChild | readonly Children[];

const KEEP_CHILDREN: unique symbol = Symbol("loom.keepChildren");

/**
 * Output that leaves the current children mounted and untraversed. Nodes in
 * `children` only rebind the props of same-type slots.
 */
export type KeepChildren = Readonly<{
  [KEEP_CHILDREN]: true;
  children: Children;
}>;

export type ComposeOutput = Children | KeepChildren;

export type Composable = Readonly<{
  type: ComposableType;
  key: string | undefined;
  props: unknown;
  compose: (cx: Scope) => ComposeOutput;
}>;

export type ComposableFactory<P> = ((props: P) => Composable) &
  Readonly<{ type: ComposableType }>;

let nextTypeId = 1;

export function createComposableType(name: string): ComposableType {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw new LoomError("LOOM_INVALID_NODE", "composable name must be a non-empty string");
  }
  return Object.freeze({ id: nextTypeId++, name: trimmed });
}

export function makeComposable(
  type: ComposableType,
  props: unknown,
  compose: (cx: Scope) => ComposeOutput,
  key?: string,
): Composable {
  return Object.freeze({ type, key, props, compose });
}

/**
 * Define a composable. The returned factory builds nodes; every node it
 * builds shares one type identity.
 *
 * @example
 * const Counter = defineComposable<{ label: string }>("Counter", (props, cx) => {
 *   const [count] = useState(cx, () => 0);
 *   return Label({ text: `${props.label}: ${String(count)}` });
 * });
 */
export function defineComposable<P = void>(
  name: string,
  compose: (props: P, cx: Scope) => Children,
): ComposableFactory<P> {
  const type = createComposableType(name);
  const factory = (props: P): Composable =>
    makeComposable(type, props, (cx) => compose(props, cx));
  return Object.assign(factory, { type });
}

/** Attach a sibling key; keyed siblings are matched by key instead of index. */
export function keyed(key: string, node: Composable): Composable {
  return Object.freeze({ ...node, key });
}

export function keepChildren(children: Children): KeepChildren {
  return Object.freeze<KeepChildren>({ [KEEP_CHILDREN]: true, children });
}

export function isKeepChildren(output: ComposeOutput): output is KeepChildren {
  return typeof output === "object" && output !== null && KEEP_CHILDREN in output;
}

export function isComposable(v: unknown): v is Composable {
  if (typeof v !== "object" || v === null) return false;
  if (!("type" in v) || !("compose" in v)) return false;
  const type = v.type;
  return (
    typeof v.compose === "function" &&
    typeof type === "object" &&
    type !== null &&
    "id" in type &&
    typeof type.id === "number"
  );
}

function flattenInto(children: Children, out: (Composable | null)[]): void {
  if (children === null || children === undefined || children === false) {
    out.push(null);
    return;
  }
  if (Array.isArray(children)) {
    for (const child of children) flattenInto(child, out);
    return;
  }
  if (!isComposable(children)) {
    throw new LoomError(
      "LOOM_INVALID_NODE",
      `composable produced a non-composable child: ${typeof children}`,
    );
  }
  out.push(children);
}

/**
 * Flatten compose output into an ordered slot list. Holes stay in the list
 * as null so that sibling indices remain stable.
 */
export function normalizeChildren(children: Children): readonly (Composable | null)[] {
  // A bare hole means "no children", not "one empty slot".
  if (children === null || children === undefined || children === false) return [];
  const out: (Composable | null)[] = [];
  flattenInto(children, out);
  return out;
}
