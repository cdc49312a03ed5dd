export const sampleDocument = `
{
  "data": {
    "subData": {
      "array": [{ "str": "a string", "int": 42 }, "string in array", 12.34, true],
      "bool": false
    },
    "int": 123,
    "str": "string in data"
  },
  "array": [1, 2, 3]
}`

export const nullDocument = `{ "a": { "b": null }, "list": [null] }`

export const numbersDocument = `{
  "fraction": 1.5,
  "exponent": 1e3,
  "beyondSafe": 9007199254740993,
  "max": 9223372036854775807,
  "min": -9223372036854775808,
  "overflow": 9223372036854775808,
  "huge": 1e400,
  "tiny": 1e-400,
  "padded": 2.50
}`

/**
 * Runs fn and returns what it threw.
 */
export function catchError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  throw new Error("expected function to throw")
}
