import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("BaseError", () => {
    it("keeps code, context and flags", () => {
      const err = new BaseError("boom", {
        code: "internal_consistency",
        context: { attempt: 3 },
        isOperational: false,
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "internal_consistency",
        message: "boom",
        context: { attempt: 3 },
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("serializes the cause chain", () => {
      const root = new Error("connection reset")
      const err = new BaseError("call failed", { code: "call_failed", cause: root })

      const result = serializeError(err)

      expect(result.cause).toEqual({
        name: "Error",
        code: "unknown",
        message: "connection reset",
        context: {},
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("omits the stack unless asked", () => {
      const err = new BaseError("boom", { code: "test" })

      expect(serializeError(err)).not.toHaveProperty("stack")
      expect(serializeError(err, { includeStack: true }).stack).toBe(err.stack)
    })
  })

  describe("plain Error", () => {
    it("uses code unknown and marks it non-operational", () => {
      const result = serializeError(new TypeError("bad"))

      expect(result).toMatchObject({
        name: "TypeError",
        code: "unknown",
        message: "bad",
        isOperational: false,
      })
    })
  })

  describe("non-Error values", () => {
    it("uses a string as the message", () => {
      const result = serializeError("plain failure")

      expect(result).toEqual({
        name: "NonErrorThrown",
        code: "unknown",
        message: "plain failure",
        context: { value: "plain failure" },
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("keeps other values in context", () => {
      const result = serializeError({ status: 14 })

      expect(result.message).toBe("Unknown error")
      expect(result.context).toEqual({ value: { status: 14 } })
    })
  })
})
