import { NullValueError, resolutionFailure } from "./error"
import { type JSONType, type JSONValue, isJSONRecord, kindOf } from "./json"
import { LookupOption, type PathSegment, type ResolveOptions } from "./options"

function describeSegment(segment: unknown): string {
  if (segment instanceof LookupOption) return segment.name
  if (segment === null) return "null"
  switch (typeof segment) {
    case "object":
      return Object.prototype.toString.call(segment)
    case "function":
      return "function"
    default:
      return String(segment)
  }
}

/**
 * Resolves a path within a decoded JSON value.
 * Throws a ResolutionError if any segment is missing or has the wrong container type,
 * or if the resolved value does not match `options.expectedType`.
 *
 * When no key or index was processed, errors report index -1 and key "".
 */
export function resolvePath(
  root: JSONValue,
  path: readonly PathSegment[],
  options: ResolveOptions = {}
): JSONValue {
  let current = root
  let errorOnNull = options.errorOnNull ?? false
  let expectOptions = true
  let lastIndex = -1
  let lastKey = ""

  for (const [index, segment] of path.entries()) {
    if (segment instanceof LookupOption) {
      if (!expectOptions) {
        resolutionFailure({ reason: "optionAfterKey" }, index, segment.name)
      }
      if (segment === LookupOption.ErrorOnNull) {
        errorOnNull = true
      }
    } else if (typeof segment === "number" && Number.isInteger(segment)) {
      const key = String(segment)
      if (!Array.isArray(current)) {
        resolutionFailure({ reason: "noArray" }, index, key)
      }
      if (segment < 0 || segment >= current.length) {
        resolutionFailure({ reason: "indexOutOfBounds" }, index, key)
      }
      current = current[segment]
      expectOptions = false
      lastIndex = index
      lastKey = key
    } else if (typeof segment === "string") {
      if (!isJSONRecord(current)) {
        resolutionFailure({ reason: "noObject" }, index, segment)
      }
      if (!Object.prototype.hasOwnProperty.call(current, segment)) {
        resolutionFailure({ reason: "propertyNotFound" }, index, segment)
      }
      current = current[segment]
      expectOptions = false
      lastIndex = index
      lastKey = segment
    } else {
      // non-integer numbers, or anything an untyped caller slipped in
      resolutionFailure({ reason: "unsupportedSegment" }, index, describeSegment(segment))
    }
  }

  const { expectedType } = options
  if (expectedType !== undefined && current !== null && kindOf(current) !== expectedType) {
    resolutionFailure({ reason: "typeMismatch", expectedType }, lastIndex, lastKey)
  }

  // null is a valid value of any type, unless the caller asked otherwise
  if (current === null && errorOnNull) {
    throw new NullValueError(lastKey)
  }

  return current
}

/**
 * Returns the property found at the given keys, checking that it is of type `type`
 * (or null).
 */
export function getPropertyWithType(
  root: JSONValue,
  type: JSONType,
  ...path: PathSegment[]
): JSONValue {
  return resolvePath(root, path, { expectedType: type })
}

/**
 * Returns the property found at the given keys, whatever its type.
 */
export function getProperty(root: JSONValue, ...path: PathSegment[]): JSONValue {
  return resolvePath(root, path)
}
