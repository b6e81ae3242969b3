import { BadFormatError, type Encountered } from "./error"

/**
 * Text to parse: a string, UTF-8 bytes, or any character source.
 */
export type JsonSource = string | Uint8Array | Iterable<string>

/**
 * 0-based position of the next character.
 */
export interface SourcePosition {
  offset: number
  line: number
  column: number
}

/**
 * Single-character lookahead over a character source.
 * Characters are whole code points; `undefined` marks the end of input.
 */
export class SourceCursor {
  private readonly iterator: Iterator<string>
  private current: string | undefined

  private offset = 0
  private line = 0
  private column = 0

  constructor(source: JsonSource) {
    this.iterator = characters(source)[Symbol.iterator]()
    this.current = this.pull()
  }

  private pull(): string | undefined {
    const next = this.iterator.next()
    return next.done ? undefined : next.value
  }

  peek(): string | undefined {
    return this.current
  }

  /**
   * Consumes and returns the lookahead character.
   */
  next(): string | undefined {
    const ch = this.current
    if (ch === undefined) return undefined

    this.offset++
    this.column++
    if (ch === "\n") {
      this.line++
      this.column = 0
    }
    this.current = this.pull()
    return ch
  }

  /**
   * Consumes the lookahead character if it equals `ch`.
   */
  eat(ch: string): boolean {
    if (this.current === ch) {
      this.next()
      return true
    }
    return false
  }

  atEnd(): boolean {
    return this.current === undefined
  }

  position(): SourcePosition {
    return { offset: this.offset, line: this.line, column: this.column }
  }

  /**
   * Builds a format error at the current position. Pass `encountered` as true to
   * report the lookahead character.
   */
  error(reason: string, encountered = false): BadFormatError {
    const seen: Encountered | undefined = encountered
      ? this.current === undefined
        ? { kind: "eof" }
        : { kind: "char", char: this.current }
      : undefined
    return new BadFormatError(reason, seen, this.line + 1, this.column + 1, this.offset)
  }
}

function characters(source: JsonSource): Iterable<string> {
  if (typeof source === "string") return source
  if (source instanceof Uint8Array) return decodeUtf8(source)
  return source
}

function decodeUtf8(bytes: Uint8Array): string {
  try {
    // keep a leading BOM so the parser can decide whether it is allowed
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes)
  } catch (e) {
    if (e instanceof TypeError) {
      throw new BadFormatError("invalid UTF-8 sequence", undefined, 1, 1, 0)
    }
    throw e
  }
}
