import { BaseError } from "../base-error"

class DeadlineError extends BaseError<"deadline_exceeded"> {
  constructor(deadline: number) {
    super("Deadline passed", {
      code: "deadline_exceeded",
      context: { deadline },
      isRetryable: true,
    })
  }
}

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("creates error with required fields", () => {
      const err = new BaseError("Call rejected", { code: "call_failed" })

      expect(err.message).toBe("Call rejected")
      expect(err.code).toBe("call_failed")
    })

    it("applies defaults", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.context).toEqual({})
      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
      expect(err.cause).toBeUndefined()
    })

    it("sets timestamp to current time", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("keeps the cause instance", () => {
      const cause = new Error("socket closed")
      const err = new BaseError("wrapped", { code: "test", cause })

      expect(err.cause).toBe(cause)
    })

    it("freezes context", () => {
      const err = new BaseError("test", { code: "test", context: { attempt: 2 } })

      expect(err.context).toEqual({ attempt: 2 })
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("does not share the caller's context object", () => {
      const context = { attempt: 1 }
      const err = new BaseError("test", { code: "test", context })

      context.attempt = 2

      expect(err.context).toEqual({ attempt: 1 })
    })
  })

  describe("subclassing", () => {
    it("names the error after the subclass", () => {
      const err = new DeadlineError(1000)

      expect(err.name).toBe("DeadlineError")
      expect(err.stack).toContain("DeadlineError")
    })

    it("is instanceof Error, BaseError and the subclass", () => {
      const err = new DeadlineError(1000)

      expect(err).toBeInstanceOf(Error)
      expect(err).toBeInstanceOf(BaseError)
      expect(err).toBeInstanceOf(DeadlineError)
    })

    it("preserves the narrowed code type", () => {
      const code: "deadline_exceeded" = new DeadlineError(1000).code

      expect(code).toBe("deadline_exceeded")
    })
  })

  describe("toJSON", () => {
    it("returns the serialized error", () => {
      const err = new DeadlineError(1000)

      expect(err.toJSON()).toEqual({
        name: "DeadlineError",
        code: "deadline_exceeded",
        message: "Deadline passed",
        context: { deadline: 1000 },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("is what JSON.stringify emits", () => {
      const err = new BaseError("test", { code: "test" })

      expect(JSON.parse(JSON.stringify(err))).toEqual(err.toJSON())
    })
  })
})
