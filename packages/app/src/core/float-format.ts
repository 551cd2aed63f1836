import type { FloatFormat } from "./options.js"

// CHANGE: printf-style rendering of finite doubles (%g, %f, %e) plus shortest round-trip
// WHY: the writer's numeric policy picks a mode and precision per call
// REF: req-float-format-1
// FORMAT THEOREM: ∀v finite, p ≥ 17: Number(formatFloat(v, {general, p})) = v
// PURITY: CORE
// INVARIANT: output is a valid JSON number literal for every finite input
// COMPLEXITY: O(p)

export const MAX_PRECISION = 64

/** Above this magnitude Number#toFixed falls back to exponent notation. */
const FIXED_NOTATION_LIMIT = 1e21

export const clampPrecision = (precision: number): number =>
  Number.isFinite(precision) ? Math.min(MAX_PRECISION, Math.max(0, Math.trunc(precision))) : 0

/** `1.5e-7` → `1.5e-07`: sign always present, at least two exponent digits. */
const normalizeExponent = (text: string): string => {
  const index = text.indexOf("e")
  if (index === -1) {
    return text
  }
  const mantissa = text.slice(0, index)
  const exponent = text.slice(index + 1)
  const sign = exponent.startsWith("-") ? "-" : "+"
  const digits = exponent.replace(/^[+-]/, "")
  return `${mantissa}e${sign}${digits.padStart(2, "0")}`
}

const stripTrailingZeros = (mantissa: string): string =>
  mantissa.includes(".") ? mantissa.replace(/\.?0+$/, "") : mantissa

const toFixedExact = (value: number, digits: number): string => {
  if (Math.abs(value) < FIXED_NOTATION_LIMIT) {
    return value.toFixed(digits)
  }
  // Doubles this large are integers; BigInt spells out every digit.
  const integer = BigInt(value).toString()
  return digits > 0 ? `${integer}.${"0".repeat(digits)}` : integer
}

const decimalExponent = (value: number, significant: number): number => {
  if (value === 0) {
    return 0
  }
  const text = value.toExponential(significant - 1)
  return Number.parseInt(text.slice(text.indexOf("e") + 1), 10)
}

export const formatGeneral = (value: number, precision: number): string => {
  const significant = precision === 0 ? 1 : precision
  const exponent = decimalExponent(value, significant)
  if (exponent >= -4 && exponent < significant) {
    return stripTrailingZeros(toFixedExact(value, significant - 1 - exponent))
  }
  const text = value.toExponential(significant - 1)
  const index = text.indexOf("e")
  return normalizeExponent(`${stripTrailingZeros(text.slice(0, index))}${text.slice(index)}`)
}

export const formatFixed = (value: number, precision: number): string => toFixedExact(value, precision)

export const formatScientific = (value: number, precision: number): string =>
  normalizeExponent(value.toExponential(precision))

export const formatShortest = (value: number): string => normalizeExponent(String(value))

/**
 * Render a finite double.
 *
 * fixed and scientific apply only while 10^-p < |v| < 10^p; outside that band
 * the value is rendered in general form instead of being padded with zeros.
 *
 * @pure true
 * @complexity O(p)
 */
export const formatFloat = (value: number, format: FloatFormat): string => {
  if (Object.is(value, -0)) {
    // toFixed/toExponential/String drop the sign of negative zero
    return `-${formatFloat(0, format)}`
  }
  const precision = clampPrecision(format.precision)
  const magnitude = Math.abs(value)
  const inBand = magnitude < 10 ** precision && magnitude > 10 ** -precision
  switch (format.mode) {
    case "shortest":
      return formatShortest(value)
    case "fixed":
      return inBand ? formatFixed(value, precision) : formatGeneral(value, precision)
    case "scientific":
      return inBand ? formatScientific(value, precision) : formatGeneral(value, precision)
    case "general":
      return formatGeneral(value, precision)
  }
}

/** Append `.0` to a rendering that would otherwise read back as an integer. */
export const withFloatMarker = (text: string): string => /[.eE]/.test(text) ? text : `${text}.0`
