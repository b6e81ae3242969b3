import type { SourceCursor } from "./cursor"
import { INT64_MAX, INT64_MIN, isInt64, Json } from "./json"

// Buffer limits, measured from the start of the digit buffer (sign included).
const INTEGER_LIMIT = 48
const FRACTION_LIMIT = 64
const EXPONENT_DIGITS_LIMIT = 32

// Bounds on how many digits may be dropped before the number is rejected.
const INT32_MAX = 2147483647n
const INT32_MIN = -2147483648n

export function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9"
}

/**
 * `a + b` clamped to the signed 64-bit range.
 */
export function addSaturating(a: bigint, b: bigint): bigint {
  const sum = a + b
  if (sum > INT64_MAX) return INT64_MAX
  if (sum < INT64_MIN) return INT64_MIN
  return sum
}

function clampInt64(value: bigint): bigint {
  if (value > INT64_MAX) return INT64_MAX
  if (value < INT64_MIN) return INT64_MIN
  return value
}

/**
 * Reads a json number.
 *
 * Digits go into a bounded buffer. Integer digits past the integer region are
 * dropped and counted into an exponent offset, leading zeros of a zero-integer
 * fraction likewise, so arbitrarily long inputs keep their magnitude without
 * growing the buffer. The document's own exponent is added to the offset with
 * saturating arithmetic.
 *
 * Plain integers that fit in 64 bits become integers; everything else becomes
 * floating. Floating values out of range turn into signed infinity (offset >= 0)
 * or signed zero (offset < 0).
 */
export function readNumber(input: SourceCursor, allowPlusSign: boolean): Json {
  let buffer = ""
  let exponentOffset = 0n
  let integral = true

  // integer part
  if (input.eat("-")) {
    buffer += "-"
  } else if (allowPlusSign) {
    input.eat("+")
  }

  if (input.eat("0")) {
    buffer += "0"
    if (isDigit(input.peek())) {
      throw input.error("invalid number format: leading zeros are not allowed", true)
    }
  } else if (isDigit(input.peek())) {
    while (isDigit(input.peek())) {
      if (buffer.length < INTEGER_LIMIT) {
        buffer += input.next() ?? ""
      } else if (exponentOffset < INT32_MAX) {
        exponentOffset++
        input.next()
      } else {
        throw input.error("invalid number format: too long integer sequence")
      }
    }
  } else {
    throw input.error("invalid number format: expected a digit", true)
  }

  // fraction part
  if (input.eat(".")) {
    buffer += "."
    integral = false

    if (!isDigit(input.peek())) {
      throw input.error("invalid number format: expected a digit", true)
    }

    if (buffer === "0." || buffer === "-0.") {
      while (input.peek() === "0") {
        if (exponentOffset > INT32_MIN) {
          exponentOffset--
          input.next()
        } else {
          throw input.error("invalid number format: too long fraction sequence")
        }
      }
    }

    while (isDigit(input.peek())) {
      if (buffer.length < FRACTION_LIMIT) {
        buffer += input.next() ?? ""
      } else {
        input.next()
      }
    }
  }

  // exponent part
  const e = input.peek()
  if (e === "e" || e === "E") {
    input.next()
    integral = false

    let exponent = ""
    if (input.eat("-")) {
      exponent += "-"
    } else {
      input.eat("+")
    }

    if (!isDigit(input.peek())) {
      throw input.error("invalid number format: expected a digit", true)
    }
    while (input.peek() === "0") {
      input.next()
    }
    let digits = 0
    while (isDigit(input.peek())) {
      if (digits < EXPONENT_DIGITS_LIMIT) {
        exponent += input.next() ?? ""
        digits++
      } else {
        // already far beyond 64 bits; saturation takes care of it
        input.next()
      }
    }

    const value = digits === 0 ? 0n : BigInt(exponent)
    exponentOffset = addSaturating(exponentOffset, clampInt64(value))
  }

  if (exponentOffset !== 0n) {
    integral = false
    buffer = `${buffer}e${exponentOffset}`
  }

  if (integral) {
    const value = BigInt(buffer)
    if (isInt64(value)) {
      return Json.integer(value)
    }
  }

  return Json.floating(toFloating(buffer, exponentOffset))
}

function toFloating(buffer: string, exponentOffset: bigint): number {
  const value = Number(buffer)
  const negative = buffer.startsWith("-")
  const mantissa = buffer.split("e")[0]
  const outOfRange = !Number.isFinite(value) || (value === 0 && /[1-9]/.test(mantissa))

  if (!outOfRange) return value
  if (exponentOffset >= 0n) {
    return negative ? -Infinity : Infinity
  }
  return negative ? -0 : 0
}
