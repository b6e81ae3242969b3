import { badAccess } from "./error"
import { isArrayIndex, Json, type JsonInput, type JsonKey } from "./json"

/**
 * Where a reference points.
 * - bound: an existing node
 * - arraySlot: an index past the end of an array, materialized on write
 *   (the gap is filled with undefined nodes)
 * - objectSlot: a missing key of an object, materialized on write
 * - unbound: nothing to read or write
 */
export type NodePointer =
  | { readonly kind: "bound"; readonly node: Json }
  | { readonly kind: "arraySlot"; readonly parent: Json; readonly index: number }
  | { readonly kind: "objectSlot"; readonly parent: Json; readonly key: string }
  | { readonly kind: "unbound" }

export type NodeRefState = NodePointer["kind"]

const UNBOUND: NodePointer = { kind: "unbound" }

/**
 * A transient cursor into a json tree.
 *
 * Reading through a reference never fails; missing nodes read as the shared
 * undefined node. Writing materializes at most one missing level:
 * `ref(tree).at("a").set(1)` adds `a`, but `ref(tree).at("a").at("b").set(1)`
 * fails when `a` does not exist yet.
 *
 * Do not keep references around across other mutations of the same tree;
 * a pending slot remembers its parent container, not its path.
 */
export class NodeRef {
  private constructor(private pointer: NodePointer) {}

  /**
   * A reference bound to `node`.
   */
  static of(node: Json): NodeRef {
    return new NodeRef({ kind: "bound", node })
  }

  get state(): NodeRefState {
    return this.pointer.kind
  }

  isBound(): boolean {
    return this.pointer.kind === "bound"
  }

  /**
   * The referenced node, or the shared undefined node when there is none.
   */
  get value(): Json {
    return this.pointer.kind === "bound" ? this.pointer.node : Json.undefinedRef()
  }

  /**
   * Reads a child without creating anything.
   */
  get(key: JsonKey): Json {
    return this.value.get(key)
  }

  /**
   * A reference to a child. Missing children of a bound container become
   * pending slots; anything else is unbound.
   */
  at(key: JsonKey): NodeRef {
    if (this.pointer.kind !== "bound") {
      return new NodeRef(UNBOUND)
    }
    const node = this.pointer.node

    const child = node.child(key)
    if (child) {
      return new NodeRef({ kind: "bound", node: child })
    }

    if (typeof key === "number") {
      return node.isArray() && isArrayIndex(key)
        ? new NodeRef({ kind: "arraySlot", parent: node, index: key })
        : new NodeRef(UNBOUND)
    }
    return node.isObject()
      ? new NodeRef({ kind: "objectSlot", parent: node, key })
      : new NodeRef(UNBOUND)
  }

  /**
   * Writes a copy of `value` where this reference points. A pending slot is
   * materialized and the reference becomes bound to the new node.
   *
   * @returns The stored node.
   * @throws BadAccessError when the reference is unbound.
   */
  set(value: JsonInput): Json {
    switch (this.pointer.kind) {
      case "bound":
        return this.pointer.node.assign(value)

      case "arraySlot": {
        const node = this.pointer.parent.put(this.pointer.index, value)
        this.pointer = { kind: "bound", node }
        return node
      }

      case "objectSlot": {
        const node = this.pointer.parent.put(this.pointer.key, value)
        this.pointer = { kind: "bound", node }
        return node
      }

      case "unbound":
        return badAccess("cannot write through an unbound reference")
    }
  }

  equals(other: NodeRef | Json): boolean {
    const otherValue = other instanceof NodeRef ? other.value : other
    return this.value.equals(otherValue)
  }
}

/**
 * Shorthand for `NodeRef.of(node)`.
 */
export function ref(node: Json): NodeRef {
  return NodeRef.of(node)
}
