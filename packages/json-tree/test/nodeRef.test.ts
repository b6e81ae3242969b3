import { describe, expect, it } from "vitest"
import { BadAccessError, BadValueError, Json, NodeRef, ref, serialize } from "../src/index"

describe("NodeRef", () => {
  it("binds to existing children", () => {
    const tree = Json.from({ list: [1, 2], name: "x" })

    expect(ref(tree).state).toBe("bound")
    expect(ref(tree).at("list").at(1).value.getInteger()).toBe(2n)
    expect(ref(tree).at("name").isBound()).toBe(true)
  })

  it("points past the end of arrays and at missing keys", () => {
    const tree = Json.from({ list: [1, 2] })

    expect(ref(tree).at("list").at(2).state).toBe("arraySlot")
    expect(ref(tree).at("missing").state).toBe("objectSlot")
  })

  it("is unbound for anything it cannot write", () => {
    const tree = Json.from({ list: [1, 2], n: 3 })

    expect(ref(tree).at(0).state).toBe("unbound")
    expect(ref(tree).at("list").at("key").state).toBe("unbound")
    expect(ref(tree).at("list").at(-1).state).toBe("unbound")
    expect(ref(tree).at("list").at(1.5).state).toBe("unbound")
    expect(ref(tree).at("n").at("x").state).toBe("unbound")
    expect(ref(tree).at("missing").at("deeper").state).toBe("unbound")
  })

  it("reads missing nodes as the undefined node", () => {
    const tree = Json.from({ a: {} })

    expect(ref(tree).at("a").at("b").value).toBe(Json.undefinedRef())
    expect(ref(tree).at("x").at("y").at(3).value.isUndefined()).toBe(true)
    expect(ref(tree).get("a").isObject()).toBe(true)
  })

  it("grows arrays with undefined slots", () => {
    const tree = Json.from({ list: [1, 2] })
    const stored = ref(tree).at("list").at(5).set("x")

    expect(stored.getString()).toBe("x")
    expect(tree.get("list").getArray().map((item) => item.type)).toStrictEqual([
      "integer",
      "integer",
      "undefined",
      "undefined",
      "undefined",
      "string",
    ])
    expect(() => serialize(tree)).toThrow(BadValueError)
  })

  it("serializes a grown array once the gap is filled", () => {
    const tree = Json.array()
    ref(tree).at(2).set(10)

    expect(() => serialize(tree)).toThrow("undefined is not allowed")

    ref(tree).at(0).set(null)
    ref(tree).at(1).set("y")
    expect(serialize(tree)).toBe('[null,"y",10]')
  })

  it("appends missing keys", () => {
    const tree = Json.from({ a: 1 })
    ref(tree).at("b").set({ c: [true] })

    expect(tree.keys()).toStrictEqual(["a", "b"])
    expect(serialize(tree)).toBe('{"a":1,"b":{"c":[true]}}')
  })

  it("becomes bound after materializing", () => {
    const tree = Json.object()
    const slot = ref(tree).at("k")

    expect(slot.state).toBe("objectSlot")
    slot.set(1)
    expect(slot.state).toBe("bound")

    slot.set(2)
    expect(tree.get("k").getInteger()).toBe(2n)
    expect(tree.size).toBe(1)
  })

  it("overwrites bound nodes in place", () => {
    const tree = Json.from([1, 2, 3])
    const second = tree.get(1)

    ref(tree).at(1).set("two")
    expect(tree.get(1)).toBe(second)
    expect(serialize(tree)).toBe('[1,"two",3]')
  })

  it("fails to write through an unbound reference", () => {
    const tree = Json.integer(1)

    expect(() => ref(tree).at("x").set(1)).toThrow(BadAccessError)
    expect(() => ref(tree).at("x").set(1)).toThrow("cannot write through an unbound reference")
    expect(tree.getInteger()).toBe(1n)
  })

  it("materializes a single level per write", () => {
    const tree = Json.object()

    expect(() => ref(tree).at("a").at("b").set(1)).toThrow(BadAccessError)
    expect(tree.size).toBe(0)

    ref(tree).at("a").set({})
    ref(tree).at("a").at("b").set(1)
    expect(serialize(tree)).toBe('{"a":{"b":1}}')
  })

  it("writes through nested containers one level at a time", () => {
    const tree = Json.array()

    tree.set(0, [])
    tree.at(0).at(2).set(true)
    expect(tree.get(0).getArray().map((item) => item.type)).toStrictEqual([
      "undefined",
      "undefined",
      "boolean",
    ])
    expect(() => serialize(tree)).toThrow(BadValueError)
  })

  it("compares referenced values", () => {
    const tree = Json.from({ a: [1] })

    expect(ref(tree).at("a").equals(Json.from([1]))).toBe(true)
    expect(ref(tree).at("a").equals(NodeRef.of(Json.from([1])))).toBe(true)
    expect(ref(tree).at("b").equals(Json.undefined())).toBe(true)
  })
})
