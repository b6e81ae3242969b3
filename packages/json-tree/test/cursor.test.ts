import { describe, expect, it } from "vitest"
import { SourceCursor } from "../src/cursor"
import { INT64_MAX, INT64_MIN } from "../src/json"
import { addSaturating } from "../src/number"

describe("SourceCursor", () => {
  it("tracks offset, line and column", () => {
    const cursor = new SourceCursor("a\nb")

    expect(cursor.next()).toBe("a")
    expect(cursor.position()).toStrictEqual({ offset: 1, line: 0, column: 1 })
    expect(cursor.next()).toBe("\n")
    expect(cursor.position()).toStrictEqual({ offset: 2, line: 1, column: 0 })
    expect(cursor.next()).toBe("b")
    expect(cursor.position()).toStrictEqual({ offset: 3, line: 1, column: 1 })
    expect(cursor.atEnd()).toBe(true)
    expect(cursor.next()).toBeUndefined()
  })

  it("reads whole code points", () => {
    const cursor = new SourceCursor("\u{1F600}x")

    expect(cursor.peek()).toBe("\u{1F600}")
    cursor.next()
    expect(cursor.position().offset).toBe(1)
    expect(cursor.eat("y")).toBe(false)
    expect(cursor.eat("x")).toBe(true)
  })

  it("reports errors one-based", () => {
    const cursor = new SourceCursor("ab")
    cursor.next()

    const error = cursor.error("oops", true)
    expect(error.message).toBe("bad format: oops but encountered 'b' at line 1 column 2.")
    expect(cursor.error("oops").encountered).toBeUndefined()
  })
})

describe("addSaturating", () => {
  it("clamps to the 64-bit range", () => {
    expect(addSaturating(2n, 3n)).toBe(5n)
    expect(addSaturating(INT64_MAX, 1n)).toBe(INT64_MAX)
    expect(addSaturating(INT64_MIN, -5n)).toBe(INT64_MIN)
    expect(addSaturating(12n, INT64_MAX)).toBe(INT64_MAX)
    expect(addSaturating(-5n, INT64_MIN)).toBe(INT64_MIN)
    expect(addSaturating(12n, INT64_MIN)).toBe(INT64_MIN + 12n)
  })
})
