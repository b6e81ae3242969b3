import { describe, expect, it } from "vitest"
import { Json, parse, ParseOption, serialize } from "../src/index"

const documents = [
  "null",
  "[]",
  '{"a":{"b":{"c":[]}}}',
  '[1,2.0,-3.5e-7,"x\\u0001y",{"k":[true,false,null]}]',
  '{"int":-9223372036854775808,"big":1e300,"tiny":5e-324}',
  '"\\uD83D\\uDE00 and \\u00e9"',
]

describe("round trip", () => {
  it.each(documents)("reads back what it writes for %s", (text) => {
    const tree = parse(text)

    const compact = parse(serialize(tree))
    const pretty = parse(serialize(tree, { pretty: true }))

    expect(compact.equals(tree)).toBe(true)
    expect(pretty.equals(tree)).toBe(true)
  })

  it("keeps serialized text stable", () => {
    const text = serialize(parse('{ "b" : [ 1 , 2.50 ] , "a" : "\\/" }'))

    expect(text).toBe('{"b":[1,2.5],"a":"\\/"}')
    expect(serialize(parse(text))).toBe(text)
  })

  it("keeps integers and floating values apart", () => {
    const tree = parse(serialize(Json.from([Json.integer(2), Json.floating(2)])))

    expect(tree.get(0).type).toBe("integer")
    expect(tree.get(1).type).toBe("floating")
  })

  it("reads infinity back", () => {
    const tree = parse(serialize(Json.from([Infinity, -Infinity])))

    expect(tree.get(0).getFloating()).toBe(Infinity)
    expect(tree.get(1).getFloating()).toBe(-Infinity)
  })

  it("parses loose text into strict text", () => {
    const tree = parse('// settings\n{ name: "app", retries: +3, }', ParseOption.All)
    expect(serialize(tree)).toBe('{"name":"app","retries":3}')
  })
})
