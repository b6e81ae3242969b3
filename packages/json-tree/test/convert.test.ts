import { afterEach, describe, expect, it } from "vitest"
import { BadValueError, clearConversions, Json, registerConversion, serialize } from "../src/index"

class Point {
  constructor(
    readonly x: number,
    readonly y: number
  ) {}
}

class Point3 extends Point {
  constructor(
    x: number,
    y: number,
    readonly z: number
  ) {
    super(x, y)
  }
}

describe("conversions", () => {
  afterEach(() => {
    clearConversions()
  })

  it("fails for unregistered classes", () => {
    expect(() => Json.convert(new Point(1, 2))).toThrow("no json conversion for Point")
  })

  it("uses registered conversions", () => {
    registerConversion(Point, (p) => [p.x, p.y])

    expect(serialize(Json.convert(new Point(1, 2)))).toBe("[1,2]")
    expect(serialize(Json.convert({ at: new Point(3, 4) }))).toBe('{"at":[3,4]}')
  })

  it("applies conversions to subclasses", () => {
    registerConversion(Point, (p) => ({ x: p.x, y: p.y }))

    expect(serialize(Json.convert(new Point3(1, 2, 3)))).toBe('{"x":1,"y":2}')
  })

  it("prefers the latest registration", () => {
    registerConversion(Point, (p) => p.x)
    registerConversion(Point3, (p) => p.z)

    expect(Json.convert(new Point3(1, 2, 3)).getInteger()).toBe(3n)
    expect(Json.convert(new Point(1, 2)).getInteger()).toBe(1n)
  })

  it("unregisters", () => {
    const unregister = registerConversion(Point, (p) => p.x)
    unregister()
    unregister()

    expect(() => Json.convert(new Point(1, 2))).toThrow(BadValueError)
  })

  it("uses toJson without registration", () => {
    const color = {
      toJson: () => "#ff0000",
    }
    expect(Json.from(color).getString()).toBe("#ff0000")
    expect(serialize(Json.from([color]))).toBe('["#ff0000"]')
  })

  it("stores converted values into trees", () => {
    registerConversion(Date, (d) => d.toISOString())
    const tree = Json.object()

    tree.at("when").set(Json.convert(new Date(Date.UTC(2020, 0, 2))))
    expect(tree.get("when").getString()).toBe("2020-01-02T00:00:00.000Z")
  })
})
