import type { JSONType } from "./json"

export class JsonDigError extends Error {
  constructor(msg: string, options?: ErrorOptions) {
    super(msg, options)

    // Set the prototype explicitly for better instanceof support
    Object.setPrototypeOf(this, JsonDigError.prototype)
  }
}

/**
 * Why a path could not be resolved.
 */
export type ResolutionFailure =
  | { reason: "noArray" }
  | { reason: "indexOutOfBounds" }
  | { reason: "noObject" }
  | { reason: "propertyNotFound" }
  | { reason: "optionAfterKey" }
  | { reason: "unsupportedSegment" }
  | { reason: "typeMismatch"; expectedType: JSONType }

export type ResolutionReason = ResolutionFailure["reason"]

function describeFailure(failure: ResolutionFailure): string {
  switch (failure.reason) {
    case "noArray":
      return "No array found"
    case "indexOutOfBounds":
      return "Array index out of bounds"
    case "noObject":
      return "No object found"
    case "propertyNotFound":
      return "Object property not found"
    case "optionAfterKey":
      return "Options must be specified before the actual keys"
    case "unsupportedSegment":
      return "Not an index or key"
    case "typeMismatch":
      return `Property is not of type ${failure.expectedType}`
  }
}

/**
 * Thrown when a path segment cannot be followed, or when the resolved value
 * does not have the expected type.
 */
export class ResolutionError extends JsonDigError {
  readonly reason: ResolutionReason

  constructor(
    failure: ResolutionFailure,
    /** Position of the failing segment in the path, -1 if there was none. */
    readonly index: number,
    readonly key: string
  ) {
    super(`${describeFailure(failure)} for key "${key}" at index ${index}`)
    this.reason = failure.reason
    Object.setPrototypeOf(this, ResolutionError.prototype)
  }
}

/**
 * Thrown when the resolved value is null and null was requested to be an error.
 */
export class NullValueError extends JsonDigError {
  constructor(readonly key: string) {
    super(`Value is null for key "${key}"`)
    Object.setPrototypeOf(this, NullValueError.prototype)
  }
}

export type ConversionTarget = "int64" | "float64"

/**
 * Thrown when a number exists but cannot be represented as the requested kind.
 */
export class ConversionError extends JsonDigError {
  constructor(
    readonly value: string,
    readonly target: ConversionTarget
  ) {
    super(`Cannot convert ${value} to ${target}`)
    Object.setPrototypeOf(this, ConversionError.prototype)
  }
}

export class DecodeError extends JsonDigError {
  constructor(cause: unknown) {
    super(`Invalid JSON: ${cause instanceof Error ? cause.message : String(cause)}`, { cause })
    Object.setPrototypeOf(this, DecodeError.prototype)
  }
}

export function resolutionFailure(failure: ResolutionFailure, index: number, key: string): never {
  throw new ResolutionError(failure, index, key)
}
