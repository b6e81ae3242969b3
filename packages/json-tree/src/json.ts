import { applyConversion, isJsonConvertible, type JsonConvertible } from "./convert"
import { badAccess, badValue } from "./error"
import { NodeRef } from "./nodeRef"
import { isObject, isPlainObject, lazy } from "./utils"

/**
 * The kind of value a json node holds.
 */
export type JsonType =
  | "undefined"
  | "null"
  | "boolean"
  | "integer"
  | "floating"
  | "string"
  | "array"
  | "object"

/**
 * Array payload. Elements are owned by the array.
 */
export type JsonArray = Json[]

/**
 * Object payload. Keeps first-insertion order, keys are unique.
 */
export type JsonObject = Map<string, Json>

/**
 * The tagged payload of a json node.
 */
export type JsonData =
  | { readonly type: "undefined" }
  | { readonly type: "null" }
  | { readonly type: "boolean"; readonly value: boolean }
  | { readonly type: "integer"; readonly value: bigint }
  | { readonly type: "floating"; readonly value: number }
  | { readonly type: "string"; readonly value: string }
  | { readonly type: "array"; readonly value: JsonArray }
  | { readonly type: "object"; readonly value: JsonObject }

/**
 * An array index or an object key.
 */
export type JsonKey = number | string

/**
 * Anything `Json.from` can turn into a json node.
 * Foreign types go through `registerConversion` or a `toJson()` method.
 */
export type JsonInput =
  | Json
  | undefined
  | null
  | boolean
  | number
  | bigint
  | string
  | readonly JsonInput[]
  | ReadonlyMap<string, JsonInput>
  | Iterable<JsonInput>
  | JsonConvertible
  | { readonly [key: string]: JsonInput }

export const INT64_MIN = -(2n ** 63n)
export const INT64_MAX = 2n ** 63n - 1n

export function isInt64(value: bigint): boolean {
  return value >= INT64_MIN && value <= INT64_MAX
}

/**
 * Checks if a key is usable as an array index.
 */
export function isArrayIndex(key: JsonKey): key is number {
  return typeof key === "number" && Number.isSafeInteger(key) && key >= 0
}

function checkedInteger(value: bigint): bigint {
  if (!isInt64(value)) {
    badValue(`integer ${value} does not fit in 64 bits`)
  }
  return value
}

function isIterable(value: object): value is Iterable<unknown> {
  return Symbol.iterator in value && typeof value[Symbol.iterator] === "function"
}

function scalarOf(data: JsonData): boolean | bigint | number | string | undefined {
  switch (data.type) {
    case "boolean":
    case "integer":
    case "floating":
    case "string":
      return data.value
    default:
      return undefined
  }
}

function describe(value: unknown): string {
  if (isObject(value)) {
    return value.constructor?.name ?? "object"
  }
  return typeof value
}

let wrap: (data: JsonData) => Json

/**
 * Wraps an element list whose nodes have no other parent, without copying.
 * Internal to the package; the parser builds its containers this way.
 */
export function ownArray(items: JsonArray): Json {
  return wrap({ type: "array", value: items })
}

/**
 * Wraps a member map whose nodes have no other parent, without copying.
 * Internal to the package.
 */
export function ownObject(members: JsonObject): Json {
  return wrap({ type: "object", value: members })
}

/**
 * A json value: one of undefined, null, boolean, integer, floating, string,
 * array or object.
 *
 * A node owns its children; the tree never shares nodes. Anything stored into
 * a tree is deep cloned first, and containers are only handed out as
 * read-only views.
 */
export class Json {
  static {
    wrap = (data) => new Json(data)
  }

  private static readonly sentinel = lazy(() => {
    const sentinel = new Json({ type: "undefined" })
    Object.freeze(sentinel)
    return sentinel
  })

  private data: JsonData

  private constructor(data: JsonData) {
    this.data = data
  }

  /**
   * The shared, read-only `undefined` node returned by failed lookups.
   */
  static undefinedRef(): Json {
    return Json.sentinel()
  }

  static undefined(): Json {
    return new Json({ type: "undefined" })
  }

  static null(): Json {
    return new Json({ type: "null" })
  }

  static boolean(value: boolean): Json {
    return new Json({ type: "boolean", value })
  }

  /**
   * Creates an integer node.
   * Fails with `BadValueError` for non-integral numbers or values outside 64 bits.
   */
  static integer(value: bigint | number): Json {
    if (typeof value === "number" && !Number.isInteger(value)) {
      badValue(`${value} is not an integer`)
    }
    return new Json({ type: "integer", value: checkedInteger(BigInt(value)) })
  }

  static floating(value: number): Json {
    return new Json({ type: "floating", value })
  }

  static string(value: string): Json {
    return new Json({ type: "string", value })
  }

  static array(items: Iterable<JsonInput> = []): Json {
    return new Json({ type: "array", value: Array.from(items, (item) => Json.from(item)) })
  }

  static object(entries: Iterable<readonly [string, JsonInput]> = []): Json {
    const members: JsonObject = new Map()
    for (const [key, item] of entries) {
      members.set(key, Json.from(item))
    }
    return new Json({ type: "object", value: members })
  }

  /**
   * Converts a value into a new json tree.
   *
   * Numbers that are safe integers become integers, other numbers floating.
   * `Json` inputs are deep cloned.
   */
  static from(input: JsonInput): Json {
    return new Json(Json.dataOf(input))
  }

  /**
   * Like `from`, for values typed only by the conversion registry.
   */
  static convert(value: unknown): Json {
    return new Json(Json.dataOf(value))
  }

  private static dataOf(input: unknown): JsonData {
    switch (typeof input) {
      case "undefined":
        return { type: "undefined" }
      case "boolean":
        return { type: "boolean", value: input }
      case "bigint":
        return { type: "integer", value: checkedInteger(input) }
      case "number":
        return Number.isSafeInteger(input) && !Object.is(input, -0)
          ? { type: "integer", value: BigInt(input) }
          : { type: "floating", value: input }
      case "string":
        return { type: "string", value: input }
      default:
        break
    }

    if (input === null) {
      return { type: "null" }
    }
    if (input instanceof Json) {
      return input.clone().data
    }
    if (Array.isArray(input)) {
      return { type: "array", value: input.map((item: unknown) => new Json(Json.dataOf(item))) }
    }
    if (input instanceof Map) {
      const source: Map<unknown, unknown> = input
      const members: JsonObject = new Map()
      for (const [key, item] of source) {
        if (typeof key !== "string") {
          badValue(`object keys must be strings, got ${describe(key)}`)
        }
        members.set(key, new Json(Json.dataOf(item)))
      }
      return { type: "object", value: members }
    }
    if (isJsonConvertible(input)) {
      return Json.dataOf(input.toJson())
    }

    const registered = applyConversion(input)
    if (registered) {
      return Json.dataOf(registered.converted)
    }

    if (isObject(input) && isIterable(input)) {
      return { type: "array", value: Array.from(input, (item) => new Json(Json.dataOf(item))) }
    }
    if (isPlainObject(input)) {
      const members: JsonObject = new Map()
      for (const [key, item] of Object.entries(input)) {
        members.set(key, new Json(Json.dataOf(item)))
      }
      return { type: "object", value: members }
    }

    return badValue(`no json conversion for ${describe(input)}`)
  }

  // ── Type queries ───────────────────────────────────────────────

  get type(): JsonType {
    return this.data.type
  }

  isUndefined(): boolean {
    return this.data.type === "undefined"
  }

  isDefined(): boolean {
    return this.data.type !== "undefined"
  }

  isNull(): boolean {
    return this.data.type === "null"
  }

  isBoolean(): boolean {
    return this.data.type === "boolean"
  }

  isInteger(): boolean {
    return this.data.type === "integer"
  }

  isFloating(): boolean {
    return this.data.type === "floating"
  }

  /**
   * True for both integers and floating values.
   */
  isNumber(): boolean {
    return this.data.type === "integer" || this.data.type === "floating"
  }

  isString(): boolean {
    return this.data.type === "string"
  }

  isArray(): boolean {
    return this.data.type === "array"
  }

  isObject(): boolean {
    return this.data.type === "object"
  }

  // ── Views (never throw) ────────────────────────────────────────

  asNull(): null | undefined {
    return this.data.type === "null" ? null : undefined
  }

  asBoolean(): boolean | undefined {
    return this.data.type === "boolean" ? this.data.value : undefined
  }

  asInteger(): bigint | undefined {
    return this.data.type === "integer" ? this.data.value : undefined
  }

  asFloating(): number | undefined {
    return this.data.type === "floating" ? this.data.value : undefined
  }

  /**
   * Integers and floating values as a number. Integers beyond 2^53 lose precision.
   */
  asNumber(): number | undefined {
    if (this.data.type === "integer") return Number(this.data.value)
    if (this.data.type === "floating") return this.data.value
    return undefined
  }

  asString(): string | undefined {
    return this.data.type === "string" ? this.data.value : undefined
  }

  asArray(): readonly Json[] | undefined {
    return this.data.type === "array" ? this.data.value : undefined
  }

  asObject(): ReadonlyMap<string, Json> | undefined {
    return this.data.type === "object" ? this.data.value : undefined
  }

  // ── Strict getters ─────────────────────────────────────────────

  getNull(): null {
    return this.data.type === "null" ? null : this.mismatch("null")
  }

  getBoolean(): boolean {
    return this.asBoolean() ?? this.mismatch("boolean")
  }

  getInteger(): bigint {
    return this.asInteger() ?? this.mismatch("integer")
  }

  getFloating(): number {
    return this.asFloating() ?? this.mismatch("floating")
  }

  getNumber(): number {
    return this.asNumber() ?? this.mismatch("number")
  }

  getString(): string {
    return this.asString() ?? this.mismatch("string")
  }

  getArray(): readonly Json[] {
    return this.asArray() ?? this.mismatch("array")
  }

  getObject(): ReadonlyMap<string, Json> {
    return this.asObject() ?? this.mismatch("object")
  }

  // ── Defaulted getters ──────────────────────────────────────────

  getBooleanOr(defaultValue: boolean): boolean {
    return this.asBoolean() ?? defaultValue
  }

  getIntegerOr(defaultValue: bigint): bigint {
    return this.asInteger() ?? defaultValue
  }

  getFloatingOr(defaultValue: number): number {
    return this.asFloating() ?? defaultValue
  }

  getNumberOr(defaultValue: number): number {
    return this.asNumber() ?? defaultValue
  }

  getStringOr(defaultValue: string): string {
    return this.asString() ?? defaultValue
  }

  getArrayOr(defaultValue: readonly Json[]): readonly Json[] {
    return this.asArray() ?? defaultValue
  }

  getObjectOr(defaultValue: ReadonlyMap<string, Json>): ReadonlyMap<string, Json> {
    return this.asObject() ?? defaultValue
  }

  private mismatch(expected: string): never {
    return badAccess(`expected ${expected} but the value is ${this.data.type}`)
  }

  // ── Children ───────────────────────────────────────────────────

  /**
   * Reads a child. Never throws: a missing index or key, or a node that is
   * not a container, yields the shared undefined node.
   */
  get(key: JsonKey): Json {
    return this.child(key) ?? Json.undefinedRef()
  }

  /**
   * The stored child at `key`, if there is one.
   */
  child(key: JsonKey): Json | undefined {
    if (typeof key === "number") {
      const items = this.asArray()
      return items && isArrayIndex(key) && key < items.length ? items[key] : undefined
    }
    return this.asObject()?.get(key)
  }

  has(key: JsonKey): boolean {
    return this.child(key) !== undefined
  }

  /**
   * Element count of an array, member count of an object, 0 otherwise.
   */
  get size(): number {
    if (this.data.type === "array") return this.data.value.length
    if (this.data.type === "object") return this.data.value.size
    return 0
  }

  /**
   * Object keys in insertion order; empty for anything else.
   */
  keys(): string[] {
    const members = this.asObject()
    return members ? Array.from(members.keys()) : []
  }

  /**
   * Object members in insertion order; empty for anything else.
   */
  entries(): [string, Json][] {
    const members = this.asObject()
    return members ? Array.from(members.entries()) : []
  }

  /**
   * A write reference to a child, see `NodeRef.at`.
   */
  at(key: JsonKey): NodeRef {
    return NodeRef.of(this).at(key)
  }

  /**
   * Shorthand for `at(key).set(value)`.
   */
  set(key: JsonKey, value: JsonInput): Json {
    return this.at(key).set(value)
  }

  /**
   * Stores a copy of `value` as a child. An existing child is overwritten in
   * place; an index past the end of an array grows it, filling the gap with
   * undefined nodes; a missing object key is appended.
   *
   * @returns The stored node.
   * @throws BadAccessError when this node cannot hold `key`.
   */
  put(key: JsonKey, value: JsonInput): Json {
    const existing = this.child(key)
    if (existing) {
      return existing.assign(value)
    }

    if (this.data.type === "array" && isArrayIndex(key)) {
      const items = this.data.value
      const node = Json.from(value)
      while (items.length < key) {
        items.push(Json.undefined())
      }
      items.push(node)
      return node
    }
    if (this.data.type === "object" && typeof key === "string") {
      const members = this.data.value
      const node = Json.from(value)
      members.set(key, node)
      return node
    }
    return badAccess(`cannot store key ${String(key)} into ${this.data.type}`)
  }

  /**
   * Removes an object member or an array element.
   * @returns true if something was removed
   */
  remove(key: JsonKey): boolean {
    if (this.data.type === "array") {
      const items = this.data.value
      if (!isArrayIndex(key) || key >= items.length) return false
      items.splice(key, 1)
      return true
    }
    if (this.data.type === "object" && typeof key === "string") {
      return this.data.value.delete(key)
    }
    return false
  }

  // ── Mutation & comparison ──────────────────────────────────────

  /**
   * Overwrites this node in place with a copy of `value`.
   * The shared undefined node cannot be written.
   */
  assign(value: JsonInput): this {
    if (this === Json.undefinedRef()) {
      badAccess("cannot write to the undefined sentinel")
    }
    this.data = Json.dataOf(value)
    return this
  }

  /**
   * Deep structural equality on type and payload. Object members compare in
   * insertion order; floating values compare as numbers, so NaN never equals
   * anything and -0 equals 0.
   */
  equals(other: Json): boolean {
    const a = this.data
    const b = other.data

    switch (a.type) {
      case "undefined":
      case "null":
        return a.type === b.type

      case "array": {
        if (b.type !== "array" || a.value.length !== b.value.length) return false
        for (let i = 0; i < a.value.length; i++) {
          if (!a.value[i].equals(b.value[i])) return false
        }
        return true
      }

      case "object": {
        if (b.type !== "object" || a.value.size !== b.value.size) return false
        const others = b.value.entries()
        for (const [key, item] of a.value) {
          const next = others.next()
          if (next.done || next.value[0] !== key || !item.equals(next.value[1])) return false
        }
        return true
      }

      default:
        return a.type === b.type && a.value === scalarOf(b)
    }
  }

  clone(): Json {
    switch (this.data.type) {
      case "array":
        return new Json({ type: "array", value: this.data.value.map((item) => item.clone()) })
      case "object": {
        const members: JsonObject = new Map()
        for (const [key, item] of this.data.value) {
          members.set(key, item.clone())
        }
        return new Json({ type: "object", value: members })
      }
      default:
        return new Json(this.data)
    }
  }
}
