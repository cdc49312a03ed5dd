import { LosslessNumber, parse } from "lossless-json"
import { DecodeError } from "./error"
import type { JSONValue } from "./json"

function notJSONValue(): never {
  throw new DecodeError(new TypeError("Decoded value is not a JSON value"))
}

// lossless-json assigns members, so a "__proto__" member becomes the prototype of its object
function losslessMember(lossless: object, key: string): unknown {
  return key === "__proto__" ? Object.getPrototypeOf(lossless) : Reflect.get(lossless, key)
}

/**
 * Rebuilds the tree parsed by JSON.parse, taking each number from the
 * lossless-json tree at the same place.
 */
function withLosslessNumbers(value: unknown, lossless: unknown): JSONValue {
  if (value === null || typeof value === "boolean" || typeof value === "string") {
    return value
  }
  if (typeof value === "number") {
    return lossless instanceof LosslessNumber ? lossless : notJSONValue()
  }
  if (Array.isArray(value)) {
    if (!Array.isArray(lossless) || lossless.length !== value.length) {
      notJSONValue()
    }
    return value.map((item, index) => withLosslessNumbers(item, lossless[index]))
  }
  if (typeof value !== "object" || typeof lossless !== "object" || lossless === null) {
    notJSONValue()
  }
  // fromEntries defines own properties, "__proto__" included
  return Object.fromEntries(
    Object.entries(value).map(([key, item]): [string, JSONValue] => [
      key,
      withLosslessNumbers(item, losslessMember(lossless, key)),
    ])
  )
}

/**
 * Decodes JSON text. Numbers are kept as LosslessNumber instances.
 * Throws a DecodeError if the text is not valid JSON.
 */
export function decodeString(text: string): JSONValue {
  let value: unknown
  let lossless: unknown
  try {
    lossless = parse(text)
    value = JSON.parse(text)
  } catch (error) {
    throw new DecodeError(error)
  }
  return withLosslessNumbers(value, lossless)
}

/**
 * Decodes UTF-8 encoded JSON. A leading byte order mark is skipped.
 */
export function decodeBytes(bytes: Uint8Array): JSONValue {
  let text: string
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(bytes)
  } catch (error) {
    throw new DecodeError(error)
  }
  return decodeString(text)
}
