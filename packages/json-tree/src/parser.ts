import { type JsonSource, SourceCursor } from "./cursor"
import { Json, type JsonArray, type JsonObject, ownArray, ownObject } from "./json"
import { readNumber } from "./number"
import { hasOption, ParseOption, type ParseOptions } from "./options"

const BYTE_ORDER_MARK = "\uFEFF"

function isSpace(ch: string | undefined): boolean {
  return ch === " " || ch === "\t" || ch === "\r" || ch === "\n"
}

function hexValue(ch: string | undefined): number | undefined {
  if (ch === undefined || ch.length !== 1) return undefined
  if (ch >= "0" && ch <= "9") return ch.charCodeAt(0) - 0x30
  if (ch >= "A" && ch <= "F") return ch.charCodeAt(0) - 0x41 + 10
  if (ch >= "a" && ch <= "f") return ch.charCodeAt(0) - 0x61 + 10
  return undefined
}

function isHighSurrogate(code: number): boolean {
  return (code & 0xfc00) === 0xd800
}

function isLowSurrogate(code: number): boolean {
  return (code & 0xfc00) === 0xdc00
}

class Parser {
  private readonly input: SourceCursor
  private readonly options: ParseOptions

  constructor(source: JsonSource, options: ParseOptions) {
    this.input = new SourceCursor(source)
    this.options = options
  }

  private has(flag: ParseOption): boolean {
    return hasOption(this.options, flag)
  }

  // ── Document ────────────────────────────────────────────────────

  parseDocument(): Json {
    this.skipByteOrderMark()
    this.skipWs()
    const result = this.parseElement()
    this.skipWs()
    if (!this.input.atEnd()) {
      throw this.input.error("invalid json format: unexpected content after the element", true)
    }
    return result
  }

  private skipByteOrderMark(): void {
    if (this.input.peek() !== BYTE_ORDER_MARK) return
    if (!this.has(ParseOption.AllowUtf8Bom)) {
      throw this.input.error("invalid json format: expected an element (UTF-8 BOM not allowed)", true)
    }
    this.input.next()
  }

  // ── Whitespace & Comments ───────────────────────────────────────

  private skipWs(): void {
    for (;;) {
      while (isSpace(this.input.peek())) {
        this.input.next()
      }

      if (!this.has(ParseOption.AllowComment) || !this.input.eat("/")) {
        return
      }

      if (this.input.eat("*")) {
        this.skipBlockComment()
      } else if (this.input.eat("/")) {
        this.skipLineComment()
      } else {
        throw this.input.error("invalid comment: expected '*' or '/' after '/'", true)
      }
    }
  }

  private skipBlockComment(): void {
    for (;;) {
      const ch = this.input.next()
      if (ch === undefined) {
        throw this.input.error("invalid comment: unterminated block comment", true)
      }
      if (ch === "*" && this.input.eat("/")) {
        return
      }
    }
  }

  private skipLineComment(): void {
    for (;;) {
      const ch = this.input.next()
      if (ch === undefined || ch === "\n") return
    }
  }

  // ── Element Dispatch ────────────────────────────────────────────

  private parseElement(): Json {
    const ch = this.input.peek()
    switch (ch) {
      case "n":
        this.expectLiteral("null")
        return Json.null()
      case "t":
        this.expectLiteral("true")
        return Json.boolean(true)
      case "f":
        this.expectLiteral("false")
        return Json.boolean(false)
      case '"':
        return Json.string(this.parseString())
      case "[":
        return this.parseArray()
      case "{":
        return this.parseObject()
      case "+":
      case "-":
      case "0":
      case "1":
      case "2":
      case "3":
      case "4":
      case "5":
      case "6":
      case "7":
      case "8":
      case "9":
        return readNumber(this.input, this.has(ParseOption.AllowNumberWithPlusSign))
      default:
        throw this.input.error("invalid json format: expected an element", true)
    }
  }

  private expectLiteral(literal: string): void {
    for (const ch of literal) {
      if (!this.input.eat(ch)) {
        throw this.input.error(`invalid '${literal}' literal: expected '${ch}'`, true)
      }
    }
  }

  // ── Strings ─────────────────────────────────────────────────────

  private parseString(): string {
    this.input.next() // opening quote
    let result = ""

    for (;;) {
      const ch = this.input.peek()

      if (ch === undefined) {
        throw this.input.error("invalid string format: unexpected eof", true)
      }
      if (ch === '"') {
        this.input.next()
        return result
      }
      if (ch === "\\") {
        this.input.next()
        result += this.parseEscape()
        continue
      }

      const code = ch.codePointAt(0) ?? 0
      if (code < 0x20 || code === 0x7f) {
        throw this.input.error("invalid string format: control character is not allowed", true)
      }
      if (ch === "/" && !this.has(ParseOption.AllowUnescapedForwardSlash)) {
        throw this.input.error("invalid string format: unescaped '/' is not allowed", true)
      }
      result += ch
      this.input.next()
    }
  }

  private parseEscape(): string {
    const ch = this.input.peek()
    switch (ch) {
      case "n":
        this.input.next()
        return "\n"
      case "t":
        this.input.next()
        return "\t"
      case "b":
        this.input.next()
        return "\b"
      case "f":
        this.input.next()
        return "\f"
      case "r":
        this.input.next()
        return "\r"
      case "\\":
      case "/":
      case '"':
        this.input.next()
        return ch
      case "u":
        this.input.next()
        return this.parseUnicodeEscape()
      default:
        throw this.input.error("invalid string format: invalid escape sequence", true)
    }
  }

  /**
   * Reads the XXXX of `\uXXXX` (the `\u` is already consumed), and its
   * surrogate partner when the code unit is one half of a pair.
   */
  private parseUnicodeEscape(): string {
    let code = this.parseHex4()
    if ((code & 0xf800) !== 0xd800) {
      return String.fromCharCode(code)
    }

    if (!this.input.eat("\\") || !this.input.eat("u")) {
      throw this.input.error("invalid string format: expected surrogate pair", true)
    }
    let partner = this.parseHex4()

    // tolerate low-high order
    if (isLowSurrogate(code) && isHighSurrogate(partner)) {
      ;[code, partner] = [partner, code]
    }
    if (!isHighSurrogate(code) || !isLowSurrogate(partner)) {
      throw this.input.error("invalid string format: invalid surrogate pair sequence")
    }

    return String.fromCodePoint((((code & 0x3ff) << 10) | (partner & 0x3ff)) + 0x10000)
  }

  private parseHex4(): number {
    let code = 0
    for (let i = 0; i < 4; i++) {
      const digit = hexValue(this.input.peek())
      if (digit === undefined) {
        throw this.input.error("invalid string format: expected hexadecimal digit for \\u????", true)
      }
      this.input.next()
      code = (code << 4) | digit
    }
    return code
  }

  // ── Containers ──────────────────────────────────────────────────

  private parseArray(): Json {
    this.input.next() // [
    const items: JsonArray = []
    const result = ownArray(items)

    this.skipWs()
    if (this.input.eat("]")) return result

    for (;;) {
      items.push(this.parseElement())
      this.skipWs()

      if (this.input.eat(",")) {
        this.skipWs()
        if (this.input.peek() === "]") {
          if (!this.has(ParseOption.AllowTrailingComma)) {
            throw this.input.error(
              "invalid array format: expected an element (trailing comma not allowed)",
              true
            )
          }
          this.input.next()
          return result
        }
      } else if (this.input.eat("]")) {
        return result
      } else {
        throw this.input.error("invalid array format: ',' or ']' expected", true)
      }
    }
  }

  private parseObject(): Json {
    this.input.next() // {
    const members: JsonObject = new Map()
    const result = ownObject(members)

    this.skipWs()
    if (this.input.eat("}")) return result

    for (;;) {
      const key = this.parseKey()

      this.skipWs()
      if (!this.input.eat(":")) {
        throw this.input.error("invalid object format: expected a ':'", true)
      }
      this.skipWs()

      // a repeated key keeps its first position and takes the last value
      members.set(key, this.parseElement())
      this.skipWs()

      if (this.input.eat(",")) {
        this.skipWs()
        if (this.input.peek() === "}") {
          if (!this.has(ParseOption.AllowTrailingComma)) {
            throw this.input.error(
              "invalid object format: expected an element (trailing comma not allowed)",
              true
            )
          }
          this.input.next()
          return result
        }
      } else if (this.input.eat("}")) {
        return result
      } else {
        throw this.input.error("invalid object format: expected ',' or '}'", true)
      }
    }
  }

  private parseKey(): string {
    if (this.input.peek() === '"') {
      return this.parseString()
    }
    if (!this.has(ParseOption.AllowUnquotedObjectKey)) {
      throw this.input.error("invalid object format: expected object key", true)
    }

    let key = ""
    for (;;) {
      const ch = this.input.peek()
      if (ch === undefined || ch === ":" || (ch.codePointAt(0) ?? 0) <= 0x20) break
      key += ch
      this.input.next()
    }
    if (key === "") {
      throw this.input.error("invalid object format: expected object key", true)
    }
    return key
  }
}

/**
 * Parses a json document.
 *
 * @param source - Text, UTF-8 bytes, or a character iterable.
 * @param options - `ParseOption` flags; strict json plus BOM and unescaped `/` by default.
 * @throws BadFormatError on the first syntax violation.
 */
export function parse(source: JsonSource, options: ParseOptions = ParseOption.Default): Json {
  return new Parser(source, options).parseDocument()
}
