// CHANGE: define leniency and output flag sets plus float formatting parameters
// WHY: parser dialect and writer layout are independent bits chosen per call
// REF: req-options-1
// FORMAT THEOREM: ∀f: hasFlag(f, b) ⇔ (f & b) = b
// PURITY: CORE
// INVARIANT: Default ⊂ Lenient
// COMPLEXITY: O(1)/O(1)

export const ParseFlag = {
  None: 0,
  AllowUtf8Bom: 1 << 0,
  AllowUnescapedForwardSlash: 1 << 1,
  AllowComments: 1 << 2,
  AllowTrailingComma: 1 << 3,
  AllowUnquotedObjectKeys: 1 << 4,
  AllowNumberWithPlusSign: 1 << 5,
  Default: (1 << 0) | (1 << 1),
  Lenient: (1 << 6) - 1
} as const

export const WriteFlag = {
  Compact: 0,
  Pretty: 1 << 0,
  DebugDump: 1 << 1
} as const

export const hasFlag = (flags: number, bit: number): boolean => (flags & bit) === bit

export type FloatMode = "general" | "fixed" | "scientific" | "shortest"

export interface FloatFormat {
  readonly mode: FloatMode
  /** Significant digits for general, fraction digits for fixed/scientific. Clamped to [0, 64]. */
  readonly precision: number
}

export const defaultFloatFormat: FloatFormat = { mode: "general", precision: 7 }

export const DEFAULT_MAX_DEPTH = 512

export const floatModes: ReadonlyArray<FloatMode> = ["general", "fixed", "scientific", "shortest"]

export const isFloatMode = (value: string): value is FloatMode => floatModes.some((mode) => mode === value)
