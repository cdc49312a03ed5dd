import type { LosslessNumber } from "lossless-json"
import { getArray, getBool, getFloat, getInt, getNumber, getObject, getString } from "./accessors"
import { decodeBytes, decodeString } from "./decode"
import type { JSONRecord, JSONType, JSONValue } from "./json"
import type { PathSegment } from "./options"
import { getProperty, getPropertyWithType } from "./resolvePath"

export interface JsonReader {
  /**
   * The decoded document.
   */
  readonly root: JSONValue

  /**
   * Returns the value at the given path, whatever its type.
   */
  get(...path: PathSegment[]): JSONValue

  /**
   * Returns the value at the given path, checking that it is of type `type` (or null).
   */
  getWithType(type: JSONType, ...path: PathSegment[]): JSONValue

  getArray(...path: PathSegment[]): JSONValue[] | null
  getObject(...path: PathSegment[]): JSONRecord | null
  getNumber(...path: PathSegment[]): LosslessNumber | null
  getInt(...path: PathSegment[]): bigint | null
  getFloat(...path: PathSegment[]): number | null
  getString(...path: PathSegment[]): string | null
  getBool(...path: PathSegment[]): boolean | null

  /**
   * Returns a reader rooted at the value found at the given path.
   */
  at(...path: PathSegment[]): JsonReader
}

/**
 * Binds the lookup functions to a decoded document.
 */
export function createJsonReader(root: JSONValue): JsonReader {
  return {
    root,
    get: (...path) => getProperty(root, ...path),
    getWithType: (type, ...path) => getPropertyWithType(root, type, ...path),
    getArray: (...path) => getArray(root, ...path),
    getObject: (...path) => getObject(root, ...path),
    getNumber: (...path) => getNumber(root, ...path),
    getInt: (...path) => getInt(root, ...path),
    getFloat: (...path) => getFloat(root, ...path),
    getString: (...path) => getString(root, ...path),
    getBool: (...path) => getBool(root, ...path),
    at: (...path) => createJsonReader(getProperty(root, ...path)),
  }
}

/**
 * Decodes JSON text or UTF-8 bytes and returns a reader for it.
 */
export function readJson(input: string | Uint8Array): JsonReader {
  return createJsonReader(typeof input === "string" ? decodeString(input) : decodeBytes(input))
}
