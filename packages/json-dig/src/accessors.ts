import { LosslessNumber } from "lossless-json"
import { type JSONRecord, type JSONValue, isJSONRecord } from "./json"
import { toFloat64, toInt64 } from "./numbers"
import type { PathSegment } from "./options"
import { getPropertyWithType } from "./resolvePath"

// Each accessor returns null when the property is null (and ErrorOnNull was not given).
// The narrowing checks below can only fail for null, since the type was already asserted.

/**
 * Returns the array found at the given keys.
 * Its elements are untyped; read them with further calls.
 */
export function getArray(root: JSONValue, ...path: PathSegment[]): JSONValue[] | null {
  const value = getPropertyWithType(root, "array", ...path)
  return Array.isArray(value) ? value : null
}

export function getObject(root: JSONValue, ...path: PathSegment[]): JSONRecord | null {
  const value = getPropertyWithType(root, "object", ...path)
  return isJSONRecord(value) ? value : null
}

/**
 * Returns the number found at the given keys, still in its lossless textual form.
 */
export function getNumber(root: JSONValue, ...path: PathSegment[]): LosslessNumber | null {
  const value = getPropertyWithType(root, "number", ...path)
  return value instanceof LosslessNumber ? value : null
}

export function getInt(root: JSONValue, ...path: PathSegment[]): bigint | null {
  const num = getNumber(root, ...path)
  return num === null ? null : toInt64(num)
}

export function getFloat(root: JSONValue, ...path: PathSegment[]): number | null {
  const num = getNumber(root, ...path)
  return num === null ? null : toFloat64(num)
}

export function getString(root: JSONValue, ...path: PathSegment[]): string | null {
  const value = getPropertyWithType(root, "string", ...path)
  return typeof value === "string" ? value : null
}

export function getBool(root: JSONValue, ...path: PathSegment[]): boolean | null {
  const value = getPropertyWithType(root, "boolean", ...path)
  return typeof value === "boolean" ? value : null
}
