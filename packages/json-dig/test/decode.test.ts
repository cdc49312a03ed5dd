import { LosslessNumber } from "lossless-json"
import { describe, expect, it } from "vitest"
import { getInt, getNumber, getObject, getString } from "../src/accessors"
import { decodeBytes, decodeString } from "../src/decode"
import { DecodeError, JsonDigError } from "../src/error"
import { kindOf } from "../src/json"
import { getProperty } from "../src/resolvePath"
import { catchError } from "./fixtures"

describe("decode", () => {
  it("decodes every kind of value", () => {
    const value = decodeString('[1, "a", true, null, {"k": 2.50}, []]')
    expect(Array.isArray(value) && value.map(kindOf)).toStrictEqual([
      "number",
      "string",
      "boolean",
      "null",
      "object",
      "array",
    ])
  })

  it("keeps numbers as text", () => {
    const value = decodeString('{"k": 2.50, "big": 12345678901234567890}')
    expect(value).toStrictEqual({
      k: new LosslessNumber("2.50"),
      big: new LosslessNumber("12345678901234567890"),
    })
  })

  it("keeps a __proto__ member as an own property", () => {
    const root = decodeString('{"__proto__": 5}')
    expect(kindOf(root)).toBe("object")
    expect(Object.getPrototypeOf(root)).toBe(Object.prototype)
    expect(Object.keys(root ?? {})).toStrictEqual(["__proto__"])
    expect(getNumber(root, "__proto__")?.toString()).toBe("5")
    expect(getObject(root)).toBe(root)
  })

  it("keeps numbers inside a __proto__ member lossless", () => {
    const root = decodeString('{"__proto__": {"x": 1.50, "list": [7]}, "y": 2}')
    expect(Object.keys(root ?? {})).toStrictEqual(["__proto__", "y"])
    expect(getNumber(root, "__proto__", "x")?.toString()).toBe("1.50")
    expect(getInt(root, "__proto__", "list", 0)).toBe(7n)
    expect(getInt(root, "y")).toBe(2n)
  })

  it("keeps scalar __proto__ members", () => {
    expect(getString(decodeString('{"__proto__": "text"}'), "__proto__")).toBe("text")
    expect(getProperty(decodeString('{"__proto__": null}'), "__proto__")).toBeNull()
  })

  it("decodes top-level scalars", () => {
    expect(decodeString("null")).toBeNull()
    expect(decodeString('"text"')).toBe("text")
    expect(decodeString("false")).toBe(false)
  })

  it("throws a DecodeError for malformed text", () => {
    for (const text of ["{", "[1,]", "{'a': 1}"]) {
      const error = catchError(() => decodeString(text))
      expect(error).toBeInstanceOf(DecodeError)
      expect(error).toBeInstanceOf(JsonDigError)
      expect(error).toHaveProperty("cause")
    }
  })

  it("decodes UTF-8 bytes", () => {
    const bytes = new TextEncoder().encode('{"name": "Zoë"}')
    expect(decodeBytes(bytes)).toStrictEqual({ name: "Zoë" })
  })

  it("skips a byte order mark", () => {
    const body = new TextEncoder().encode("[true]")
    const bytes = new Uint8Array([0xef, 0xbb, 0xbf, ...body])
    expect(decodeBytes(bytes)).toStrictEqual([true])
  })

  it("throws a DecodeError for invalid UTF-8", () => {
    const bytes = new Uint8Array([0x22, 0xff, 0x22])
    expect(() => decodeBytes(bytes)).toThrow(DecodeError)
  })
})
