import type { JSONType } from "./json"

/**
 * A flag that changes how a lookup behaves.
 * Flags may be passed inline in a path, but only before any key or index.
 */
export class LookupOption {
  private constructor(readonly name: string) {}

  static readonly ErrorOnNull = new LookupOption("ErrorOnNull")
}

/**
 * Makes a lookup throw a NullValueError when the resolved value is null.
 */
export const ErrorOnNull = LookupOption.ErrorOnNull

/**
 * One step of a lookup path: an object key, an array index or an option.
 */
export type PathSegment = string | number | LookupOption

export type ResolveOptions = {
  /**
   * Type the resolved value must have. Null values always pass.
   */
  expectedType?: JSONType
  /**
   * Same as passing ErrorOnNull inline.
   */
  errorOnNull?: boolean
}
