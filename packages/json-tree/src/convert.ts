import type { JsonInput } from "./json"

/**
 * Any class constructor, abstract or not.
 */
export type ConvertibleType<T> = abstract new (...args: never[]) => T

/**
 * Conversion of a foreign type into json input.
 */
export type ConvertFn<T> = (value: T) => JsonInput

/**
 * An object that knows how to turn itself into json input.
 */
export interface JsonConvertible {
  toJson(): JsonInput
}

interface Conversion {
  readonly type: ConvertibleType<unknown>
  apply(value: unknown): { converted: JsonInput } | undefined
}

const conversions: Conversion[] = []

/**
 * Registers a conversion for instances of `type`.
 * Later registrations take precedence over earlier ones.
 *
 * @returns A function that removes the registration.
 */
export function registerConversion<T>(type: ConvertibleType<T>, convert: ConvertFn<T>): () => void {
  const conversion: Conversion = {
    type,
    apply(value) {
      return value instanceof type ? { converted: convert(value) } : undefined
    },
  }
  conversions.push(conversion)

  return () => {
    const index = conversions.indexOf(conversion)
    if (index >= 0) {
      conversions.splice(index, 1)
    }
  }
}

/**
 * Removes every registered conversion.
 */
export function clearConversions(): void {
  conversions.length = 0
}

/**
 * Looks up a registered conversion for a value and applies it.
 * Returns undefined when nothing is registered for the value's type.
 */
export function applyConversion(value: unknown): { converted: JsonInput } | undefined {
  for (let i = conversions.length - 1; i >= 0; i--) {
    const result = conversions[i].apply(value)
    if (result) return result
  }
  return undefined
}

/**
 * Checks if a value exposes a `toJson()` method.
 */
export function isJsonConvertible(value: unknown): value is JsonConvertible {
  return (
    typeof value === "object" &&
    value !== null &&
    "toJson" in value &&
    typeof value.toJson === "function"
  )
}
