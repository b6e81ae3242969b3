/**
 * Checks if a value is an object (typeof === "object" && !== null).
 */
export function isObject(value: unknown): value is object {
  return value !== null && typeof value === "object"
}

/**
 * Checks if a value is a plain object literal (or a null-prototype object).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!isObject(value)) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Wraps a factory so it runs once, on first call.
 */
export function lazy<T>(factory: () => T): () => T {
  let cache: { value: T } | undefined
  return () => {
    if (!cache) {
      cache = { value: factory() }
    }
    return cache.value
  }
}

/**
 * Number of bytes the string takes once encoded as UTF-8.
 */
export function utf8ByteLength(text: string): number {
  let length = 0
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0
    if (code < 0x80) length += 1
    else if (code < 0x800) length += 2
    else if (code < 0x10000) length += 3
    else length += 4
  }
  return length
}
