export { getArray, getBool, getFloat, getInt, getNumber, getObject, getString } from "./accessors"
export { createJsonReader, type JsonReader, readJson } from "./createJsonReader"
export { decodeBytes, decodeString } from "./decode"
export {
  ConversionError,
  type ConversionTarget,
  DecodeError,
  JsonDigError,
  NullValueError,
  ResolutionError,
  type ResolutionFailure,
  type ResolutionReason,
} from "./error"
export {
  isJSONRecord,
  isJSONValue,
  type JSONKind,
  type JSONPrimitive,
  type JSONRecord,
  type JSONType,
  type JSONValue,
  kindOf,
} from "./json"
export { toFloat64, toInt64 } from "./numbers"
export { ErrorOnNull, LookupOption, type PathSegment, type ResolveOptions } from "./options"
export { getProperty, getPropertyWithType, resolvePath } from "./resolvePath"
export { LosslessNumber } from "lossless-json"
