import { badValue } from "./error"
import type { Json } from "./json"
import { normalizeSerializeOptions, type ResolvedSerializeOptions, type SerializeOptions } from "./options"
import { utf8ByteLength } from "./utils"

const INDENT = "  "

// Written for Infinity; large enough to read back as Infinity.
const POSITIVE_INFINITY_TEXT = "1.0e999999999"
const NEGATIVE_INFINITY_TEXT = "-1.0e999999999"

/**
 * Substitutions for the first 128 code units; anything not listed is written as is.
 */
const ESCAPES: readonly (string | undefined)[] = (() => {
  const table: (string | undefined)[] = new Array<string | undefined>(0x80).fill(undefined)
  for (let code = 0; code < 0x20; code++) {
    table[code] = `\\u${code.toString(16).toUpperCase().padStart(4, "0")}`
  }
  table[0x08] = "\\b"
  table[0x09] = "\\t"
  table[0x0a] = "\\n"
  table[0x0c] = "\\f"
  table[0x0d] = "\\r"
  table[0x22] = '\\"'
  table[0x2f] = "\\/"
  table[0x5c] = "\\\\"
  table[0x7f] = "\\u007F"
  return table
})()

/**
 * Escapes and quotes a string.
 */
export function quoteString(value: string): string {
  let result = '"'
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i)
    const escaped = code < 0x80 ? ESCAPES[code] : undefined
    result += escaped ?? value[i]
  }
  return result + '"'
}

/**
 * Makes sure the text of a floating value reads back as floating, not integer.
 */
function keepFloating(text: string): string {
  return /[.eE]/.test(text) ? text : `${text}.0`
}

function trimFractionZeros(text: string): string {
  const [mantissa, exponent] = text.split("e")
  if (!mantissa.includes(".")) return text
  const trimmed = mantissa.replace(/0+$/, "").replace(/\.$/, "")
  return exponent === undefined ? trimmed : `${trimmed}e${exponent}`
}

function withSign(value: number, text: string): string {
  return Object.is(value, -0) && !text.startsWith("-") ? `-${text}` : text
}

/**
 * Formats a finite floating value.
 */
export function formatFloating(value: number, options: ResolvedSerializeOptions): string {
  const { precision } = options
  if (precision === undefined) {
    return keepFloating(withSign(value, String(value)))
  }

  const magnitude = Math.abs(value)
  const inRange = magnitude >= 10 ** -precision && magnitude <= 10 ** precision
  const format = inRange ? options.floatFormat : "general"

  switch (format) {
    case "fixed":
      return keepFloating(withSign(value, value.toFixed(precision)))
    case "scientific":
      return keepFloating(withSign(value, value.toExponential(precision)))
    case "general":
      return keepFloating(withSign(value, trimFractionZeros(value.toPrecision(Math.max(precision, 1)))))
  }
}

class Serializer {
  private output = ""
  private indent = ""

  constructor(private readonly options: ResolvedSerializeOptions) {}

  run(value: Json): string {
    this.writeValue(value)
    return this.output
  }

  private write(text: string): void {
    this.output += text
  }

  private annotate(label: string): void {
    if (this.options.debugDump) {
      this.write(`/***  ${label}  ***/ `)
    }
  }

  private writeValue(value: Json): void {
    switch (value.type) {
      case "undefined":
        if (!this.options.debugDump) badValue("undefined is not allowed")
        this.write("/***  UNDEFINED  ***/ undefined /* not allowed */")
        return
      case "null":
        this.annotate("NULL")
        this.write("null")
        return
      case "boolean":
        this.annotate("BOOLEAN")
        this.write(value.getBoolean() ? "true" : "false")
        return
      case "integer":
        this.annotate("INTEGER")
        this.write(value.getInteger().toString())
        return
      case "floating":
        this.annotate("FLOATING")
        this.writeFloating(value.getFloating())
        return
      case "string": {
        const text = value.getString()
        this.annotate(`STRING[${utf8ByteLength(text)}]`)
        this.write(quoteString(text))
        return
      }
      case "array":
        this.writeArray(value.getArray())
        return
      case "object":
        this.writeObject(value.getObject())
        return
    }
  }

  private writeFloating(value: number): void {
    if (Number.isNaN(value)) {
      if (!this.options.debugDump) badValue("NaN is not allowed")
      this.write("NaN /* not allowed */")
    } else if (!Number.isFinite(value)) {
      this.write(value > 0 ? POSITIVE_INFINITY_TEXT : NEGATIVE_INFINITY_TEXT)
    } else {
      this.write(formatFloating(value, this.options))
    }
  }

  private writeArray(items: readonly Json[]): void {
    this.annotate(`ARRAY[${items.length}]`)
    if (items.length === 0) {
      this.write("[]")
      return
    }

    this.write("[")
    this.enter()
    items.forEach((item, i) => {
      this.separator(i)
      this.writeValue(item)
    })
    this.leave()
    this.write("]")
  }

  private writeObject(members: ReadonlyMap<string, Json>): void {
    this.annotate(`OBJECT[${members.size}]`)
    if (members.size === 0) {
      this.write("{}")
      return
    }

    this.write("{")
    this.enter()
    let i = 0
    for (const [key, item] of members) {
      this.separator(i++)
      this.write(quoteString(key))
      this.write(this.options.pretty ? ": " : ":")
      this.writeValue(item)
    }
    this.leave()
    this.write("}")
  }

  private enter(): void {
    this.indent += INDENT
    if (this.options.pretty) this.write("\n")
  }

  private separator(index: number): void {
    if (index > 0) {
      this.write(this.options.pretty ? ",\n" : ",")
    }
    if (this.options.pretty) this.write(this.indent)
  }

  private leave(): void {
    this.indent = this.indent.slice(INDENT.length)
    if (this.options.pretty) this.write(`\n${this.indent}`)
  }
}

/**
 * Writes a json tree as text.
 *
 * @throws BadValueError when the tree holds `undefined` or `NaN` and
 * `debugDump` is off.
 */
export function serialize(value: Json, options?: SerializeOptions): string {
  return new Serializer(normalizeSerializeOptions(options)).run(value)
}
