/**
 * Base class of every error thrown by json-tree.
 */
export class JsonTreeError extends Error {
  constructor(msg: string) {
    super(msg)

    // Set the prototype explicitly for better instanceof support
    Object.setPrototypeOf(this, JsonTreeError.prototype)
  }
}

/**
 * What the parser was looking at when it failed.
 */
export type Encountered = { kind: "char"; char: string } | { kind: "eof" }

/**
 * Thrown when text cannot be decoded as a json document.
 * Line and column are 1-based.
 */
export class BadFormatError extends JsonTreeError {
  constructor(
    readonly reason: string,
    readonly encountered: Encountered | undefined,
    readonly line: number,
    readonly column: number,
    readonly offset: number
  ) {
    super(formatMessage(reason, encountered, line, column))
    Object.setPrototypeOf(this, BadFormatError.prototype)
  }
}

/**
 * Thrown by strict getters on a type mismatch and by writes through a reference
 * that has nothing to write into.
 */
export class BadAccessError extends JsonTreeError {
  constructor(msg: string) {
    super(msg)
    Object.setPrototypeOf(this, BadAccessError.prototype)
  }
}

/**
 * Thrown when a value cannot be represented: serializing `undefined` or `NaN`,
 * or converting something no conversion exists for.
 */
export class BadValueError extends JsonTreeError {
  constructor(msg: string) {
    super(msg)
    Object.setPrototypeOf(this, BadValueError.prototype)
  }
}

export function badAccess(message: string): never {
  throw new BadAccessError(message)
}

export function badValue(message: string): never {
  throw new BadValueError(message)
}

function describeEncountered(encountered: Encountered): string {
  if (encountered.kind === "eof") return "EOF"
  const code = encountered.char.codePointAt(0) ?? 0
  if (code >= 0x20 && code !== 0x7f) return `'${encountered.char}'`
  return `(char)${code.toString(16).padStart(2, "0")}`
}

function formatMessage(
  reason: string,
  encountered: Encountered | undefined,
  line: number,
  column: number
): string {
  const but = encountered ? ` but encountered ${describeEncountered(encountered)}` : ""
  return `bad format: ${reason}${but} at line ${line} column ${column}.`
}
