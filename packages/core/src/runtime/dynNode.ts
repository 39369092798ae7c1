/**
 * packages/core/src/runtime/dynNode.ts — Type-erased child slot.
 *
 * Every child slot in the tree is a DynNode: the runtime type identity of
 * the node it holds, the node itself, and the Scope composed for it. When a
 * parent produces a new node for the slot:
 *   - same type identity: the node is rebound in place and the Scope (and
 *     all of its state) is kept
 *   - different type identity: the old Scope is destroyed and a fresh one
 *     is created at the same tree position
 *
 * Only one lease on a DynNode may be live at a time. A second lease (or a
 * rebind while leased) means two call sites hold the same erased node and
 * is rejected with LOOM_ALIASED_NODE.
 */

import { LoomError } from "../errors.js";
import type { Composable } from "./node.js";
import { type TreePosition, formatPosition } from "./position.js";
import type { ScopeRecord } from "./scope.js";

export type DynNodeHost = Readonly<{
  createScope: (node: Composable, parent: ScopeRecord | null, position: TreePosition) => ScopeRecord;
  /** Destroy a scope and its whole subtree. */
  destroyScope: (scope: ScopeRecord) => void;
}>;

export type DynUpdate = "reused" | "replaced";

export class DynNode {
  readonly position: TreePosition;
  readonly parent: ScopeRecord | null;

  private current: Composable;
  private record: ScopeRecord;
  private leased = false;
  private readonly host: DynNodeHost;

  constructor(
    node: Composable,
    parent: ScopeRecord | null,
    position: TreePosition,
    host: DynNodeHost,
  ) {
    this.position = position;
    this.parent = parent;
    this.host = host;
    this.current = node;
    this.record = host.createScope(node, parent, position);
    this.record.slot = this;
  }

  get typeId(): number {
    return this.current.type.id;
  }

  get node(): Composable {
    return this.current;
  }

  get key(): string | undefined {
    return this.current.key;
  }

  get scope(): ScopeRecord {
    return this.record;
  }

  isLeased(): boolean {
    return this.leased;
  }

  /** Bind the node produced for this slot in the latest parent composition. */
  update(next: Composable): DynUpdate {
    this.assertNotLeased("update");
    if (next.type.id === this.current.type.id) {
      this.current = next;
      this.record.node = next;
      return "reused";
    }

    this.host.destroyScope(this.record);
    this.current = next;
    this.record = this.host.createScope(next, this.parent, this.position);
    this.record.slot = this;
    return "replaced";
  }

  /** Rebind props without touching the scope; only for the same type. */
  rebind(next: Composable): boolean {
    this.assertNotLeased("rebind");
    if (next.type.id !== this.current.type.id) return false;
    this.current = next;
    this.record.node = next;
    return true;
  }

  /** Run `fn` with exclusive access to the erased node and its scope. */
  lease<T>(fn: (node: Composable, scope: ScopeRecord) => T): T {
    this.assertNotLeased("lease");
    this.leased = true;
    try {
      return fn(this.current, this.record);
    } finally {
      this.leased = false;
    }
  }

  private assertNotLeased(op: string): void {
    if (this.leased) {
      throw new LoomError(
        "LOOM_ALIASED_NODE",
        `${op} on ${this.current.type.name} at ${formatPosition(this.position)} while another reference to it is live`,
      );
    }
  }
}
