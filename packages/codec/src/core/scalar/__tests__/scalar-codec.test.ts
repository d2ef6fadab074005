import { QueryError } from "../../errors/query-error"
import { decodeScalar, encodeScalar } from "../scalar-codec"

function decodeFailure(run: () => unknown): QueryError {
  try {
    run()
  } catch (err) {
    if (err instanceof QueryError) return err
    throw err
  }
  throw new Error("expected decode to fail")
}

describe("decodeScalar", () => {
  describe("integers", () => {
    it("parses narrow integers as numbers", () => {
      expect(decodeScalar("i32", "37")).toBe(37)
      expect(decodeScalar("i8", "-128")).toBe(-128)
      expect(decodeScalar("u16", "65535")).toBe(65535)
    })

    it("accepts a leading plus sign", () => {
      expect(decodeScalar("u8", "+5")).toBe(5)
      expect(decodeScalar("i32", "+0")).toBe(0)
    })

    it("parses wide integers as bigint", () => {
      expect(decodeScalar("i64", "9223372036854775807")).toBe(9223372036854775807n)
      expect(decodeScalar("i64", "-9223372036854775808")).toBe(-9223372036854775808n)
      expect(decodeScalar("u128", "340282366920938463463374607431768211455")).toBe(
        2n ** 128n - 1n,
      )
    })

    it("rejects values outside the exact kind even if a wider kind would fit", () => {
      const err = decodeFailure(() => decodeScalar("i16", "40000"))

      expect(err.code).toBe("invalid_literal")
      expect(err.message).toBe("invalid i16 literal")
      expect(err.cause).toBeInstanceOf(RangeError)
      expect(err.cause).toHaveProperty("message", "number too large to fit in target type")
    })

    it("reports underflow", () => {
      const err = decodeFailure(() => decodeScalar("i8", "-129"))

      expect(err.cause).toHaveProperty("message", "number too small to fit in target type")
    })

    it("rejects a minus sign on unsigned kinds, even for zero", () => {
      const err = decodeFailure(() => decodeScalar("u8", "-0"))

      expect(err.cause).toBeInstanceOf(SyntaxError)
      expect(err.cause).toHaveProperty("message", "invalid digit found in string")
    })

    it("carries the native parse failure as cause", () => {
      const err = decodeFailure(() => decodeScalar("i32", "notanumber", { key: "age" }))

      expect(err.code).toBe("invalid_literal")
      expect(err.context).toEqual({ key: "age", kind: "i32", literal: "notanumber" })
      expect(err.cause).toBeInstanceOf(SyntaxError)
      expect(err.cause).toHaveProperty("message", "invalid digit found in string")
    })

    it("rejects empty text", () => {
      const err = decodeFailure(() => decodeScalar("u32", ""))

      expect(err.cause).toHaveProperty("message", "cannot parse integer from empty string")
    })

    it("rejects fractional and padded literals", () => {
      expect(() => decodeScalar("i32", "1.5")).toThrow("invalid i32 literal")
      expect(() => decodeScalar("i32", " 1")).toThrow("invalid i32 literal")
    })
  })

  describe("floats", () => {
    it("parses decimal and exponent forms", () => {
      expect(decodeScalar("f64", "1.5")).toBe(1.5)
      expect(decodeScalar("f64", "1e3")).toBe(1000)
      expect(decodeScalar("f64", ".5")).toBe(0.5)
      expect(decodeScalar("f64", "-2")).toBe(-2)
    })

    it("parses special values", () => {
      expect(decodeScalar("f64", "inf")).toBe(Number.POSITIVE_INFINITY)
      expect(decodeScalar("f64", "-Infinity")).toBe(Number.NEGATIVE_INFINITY)
      expect(decodeScalar("f64", "NaN")).toBeNaN()
    })

    it("rounds f32 to single precision", () => {
      expect(decodeScalar("f32", "0.1")).toBe(Math.fround(0.1))
    })

    it("rejects non-numeric text", () => {
      const err = decodeFailure(() => decodeScalar("f64", "abc"))

      expect(err.cause).toHaveProperty("message", "invalid float literal")
    })
  })

  describe("booleans", () => {
    it("accepts exactly true and false", () => {
      expect(decodeScalar("bool", "true")).toBe(true)
      expect(decodeScalar("bool", "false")).toBe(false)
    })

    it("rejects other spellings", () => {
      const err = decodeFailure(() => decodeScalar("bool", "TRUE"))

      expect(err.cause).toHaveProperty("message", "provided string was not `true` or `false`")
    })
  })

  describe("chars", () => {
    it("accepts one code point", () => {
      expect(decodeScalar("char", "x")).toBe("x")
      expect(decodeScalar("char", "😀")).toBe("😀")
    })

    it("rejects empty and multi-character text", () => {
      expect(decodeFailure(() => decodeScalar("char", "")).cause).toHaveProperty(
        "message",
        "cannot parse char from empty string",
      )
      expect(decodeFailure(() => decodeScalar("char", "ab")).cause).toHaveProperty(
        "message",
        "too many characters in string",
      )
    })
  })

  describe("strings and bytes", () => {
    it("returns strings verbatim, including empty", () => {
      expect(decodeScalar("string", "")).toBe("")
      expect(decodeScalar("string", "a b")).toBe("a b")
    })

    it("decodes padded base64", () => {
      expect(decodeScalar("bytes", "aGk=")).toEqual(new Uint8Array([104, 105]))
      expect(decodeScalar("bytes", "")).toEqual(new Uint8Array([]))
    })

    it("rejects unpadded base64", () => {
      const err = decodeFailure(() => decodeScalar("bytes", "aGk"))

      expect(err.message).toBe("invalid bytes literal")
      expect(err.cause).toHaveProperty("message", "invalid base64 text")
    })
  })
})

describe("encodeScalar", () => {
  it("renders integers in decimal", () => {
    expect(encodeScalar("i32", -42)).toBe("-42")
    expect(encodeScalar("u64", 18446744073709551615n)).toBe("18446744073709551615")
  })

  it("renders booleans, chars, strings", () => {
    expect(encodeScalar("bool", false)).toBe("false")
    expect(encodeScalar("char", "z")).toBe("z")
    expect(encodeScalar("string", "")).toBe("")
  })

  it("renders floats", () => {
    expect(encodeScalar("f64", 1.5)).toBe("1.5")
    expect(encodeScalar("f64", Number.NaN)).toBe("NaN")
    expect(encodeScalar("f64", Number.POSITIVE_INFINITY)).toBe("inf")
    expect(encodeScalar("f64", Number.NEGATIVE_INFINITY)).toBe("-inf")
  })

  it("keeps the sign of negative zero", () => {
    expect(encodeScalar("f64", -0)).toBe("-0")
    expect(encodeScalar("f32", -0)).toBe("-0")
    expect(Object.is(decodeScalar("f64", encodeScalar("f64", -0)), -0)).toBe(true)
  })

  it("renders large and small floats without exponent notation", () => {
    expect(encodeScalar("f64", 1e21)).toBe("1000000000000000000000")
    expect(encodeScalar("f64", 1.5e-7)).toBe("0.00000015")
    expect(encodeScalar("f64", -2.5e22)).toBe("-25000000000000000000000")
    expect(decodeScalar("f64", encodeScalar("f64", 1.5e-7))).toBe(1.5e-7)
  })

  it("renders f32 with the shortest round-tripping text", () => {
    expect(encodeScalar("f32", Math.fround(0.1))).toBe("0.1")
    expect(encodeScalar("f32", 3.5)).toBe("3.5")
  })

  it("renders bytes as padded base64", () => {
    expect(encodeScalar("bytes", new Uint8Array([104, 105]))).toBe("aGk=")
  })

  it("rejects values of the wrong type", () => {
    try {
      encodeScalar("bool", "true", { key: "active" })
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(QueryError)
      expect(err).toMatchObject({
        code: "invalid_value",
        message: "invalid bool value",
        context: { key: "active", kind: "bool", received: "string" },
      })
    }
  })

  it("rejects integers outside the kind", () => {
    expect(() => encodeScalar("u8", 256)).toThrow("invalid u8 value")
    expect(() => encodeScalar("i32", 1.5)).toThrow("invalid i32 value")
    expect(() => encodeScalar("i64", 5)).toThrow("invalid i64 value")
  })

  it("rejects multi-character chars", () => {
    expect(() => encodeScalar("char", "ab")).toThrow("invalid char value")
  })
})
