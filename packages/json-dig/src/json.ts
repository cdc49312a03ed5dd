import { LosslessNumber } from "lossless-json"

/**
 * A JSON primitive.
 * Numbers stay in their textual form until converted explicitly.
 */
export type JSONPrimitive = null | boolean | LosslessNumber | string

/**
 * A JSON record.
 */
export type JSONRecord = { [k: string]: JSONValue }

/**
 * A JSON value.
 */
export type JSONValue = JSONPrimitive | JSONValue[] | JSONRecord

/**
 * Runtime tag of a JSON value.
 */
export type JSONKind = "null" | "boolean" | "number" | "string" | "array" | "object"

/**
 * Tags a resolved value can be asserted to have.
 * Null is never asserted: it is a valid value of every type.
 */
export type JSONType = Exclude<JSONKind, "null">

function hasRecordPrototype(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

export function isJSONRecord(value: JSONValue): value is JSONRecord {
  return (
    value !== null && typeof value === "object" && !Array.isArray(value) && hasRecordPrototype(value)
  )
}

export function kindOf(value: JSONValue): JSONKind {
  if (value === null) return "null"
  if (typeof value === "boolean") return "boolean"
  if (typeof value === "string") return "string"
  if (Array.isArray(value)) return "array"
  if (isJSONRecord(value)) return "object"
  return "number"
}

/**
 * Checks that an arbitrary value is a tree made only of JSON values.
 * Records must have a plain (or null) prototype.
 */
export function isJSONValue(value: unknown): value is JSONValue {
  if (value === null || typeof value === "boolean" || typeof value === "string") {
    return true
  }
  if (Array.isArray(value)) {
    return value.every(isJSONValue)
  }
  if (typeof value !== "object") {
    return false
  }
  if (hasRecordPrototype(value)) {
    return Object.values(value).every(isJSONValue)
  }
  return (
    value instanceof LosslessNumber && Object.getPrototypeOf(value) === LosslessNumber.prototype
  )
}
