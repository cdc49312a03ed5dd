import type { LosslessNumber } from "lossless-json"
import { ConversionError } from "./error"

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n

const integerPattern = /^-?\d+$/

/**
 * Converts a lossless number to a signed 64-bit integer.
 * Throws if it has a fraction or exponent part, or is out of range.
 */
export function toInt64(num: LosslessNumber): bigint {
  const text = num.toString()
  if (!integerPattern.test(text)) {
    throw new ConversionError(text, "int64")
  }
  const value = BigInt(text)
  if (value < INT64_MIN || value > INT64_MAX) {
    throw new ConversionError(text, "int64")
  }
  return value
}

/**
 * Converts a lossless number to a 64-bit float, rounding to the nearest value.
 * Throws if the number is too large to be represented.
 */
export function toFloat64(num: LosslessNumber): number {
  const text = num.toString()
  const value = Number(text)
  if (!Number.isFinite(value)) {
    throw new ConversionError(text, "float64")
  }
  return value
}
