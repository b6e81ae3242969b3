/**
 * Parser leniency flags. Combine with `|`.
 */
export enum ParseOption {
  None = 0,
  /** Accept a byte order mark at the start of the document. */
  AllowUtf8Bom = 1 << 0,
  /** Accept `/` inside strings without a backslash. */
  AllowUnescapedForwardSlash = 1 << 1,
  /** Skip `/* block *\/` and `// line` comments wherever whitespace may appear. */
  AllowComment = 1 << 2,
  /** Accept a comma right before `]` or `}`. */
  AllowTrailingComma = 1 << 3,
  /** Accept object keys without quotes. */
  AllowUnquotedObjectKey = 1 << 4,
  /** Accept a leading `+` on numbers. */
  AllowNumberWithPlusSign = 1 << 5,

  Default = AllowUtf8Bom | AllowUnescapedForwardSlash,
  All = AllowUtf8Bom |
    AllowUnescapedForwardSlash |
    AllowComment |
    AllowTrailingComma |
    AllowUnquotedObjectKey |
    AllowNumberWithPlusSign,
}

/**
 * A set of `ParseOption` flags.
 */
export type ParseOptions = number

export function hasOption(options: ParseOptions, flag: ParseOption): boolean {
  return (options & flag) !== 0
}

/**
 * How floating values are written.
 * - general: fixed or exponent notation, whichever is shorter
 * - fixed: always fixed notation with `precision` fraction digits
 * - scientific: always exponent notation with `precision` fraction digits
 */
export type FloatFormat = "general" | "fixed" | "scientific"

export interface SerializeOptions {
  /** Indent with two spaces and put one item per line. Defaults to false. */
  pretty?: boolean
  /**
   * Prefix every value with a type comment and print `undefined` / `NaN`
   * instead of failing. The output is not valid json.
   */
  debugDump?: boolean
  /** Defaults to "general". */
  floatFormat?: FloatFormat
  /**
   * Significant digits (general) or fraction digits (fixed, scientific),
   * clamped to [0, 64]. When omitted, floating values use the shortest text
   * that reads back to the same number.
   */
  precision?: number
}

export interface ResolvedSerializeOptions {
  readonly pretty: boolean
  readonly debugDump: boolean
  readonly floatFormat: FloatFormat
  readonly precision: number | undefined
}

export const MAX_PRECISION = 64

export function normalizeSerializeOptions(options: SerializeOptions = {}): ResolvedSerializeOptions {
  const precision =
    options.precision === undefined
      ? undefined
      : Math.min(Math.max(Math.trunc(options.precision), 0), MAX_PRECISION)

  return {
    pretty: options.pretty ?? false,
    debugDump: options.debugDump ?? false,
    floatFormat: options.floatFormat ?? "general",
    precision,
  }
}
