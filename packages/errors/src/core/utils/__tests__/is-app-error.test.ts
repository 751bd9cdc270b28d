import { BaseError } from "../../base-error"
import { isAppError } from "../is-app-error"

describe("isAppError", () => {
  it("accepts a BaseError", () => {
    expect(isAppError(new BaseError("x", { code: "x" }))).toBe(true)
  })

  it("accepts a structurally matching Error", () => {
    const err = Object.assign(new Error("x"), {
      code: "remote",
      context: {},
      isRetryable: false,
      isOperational: true,
      timestamp: new Date(),
    })

    expect(isAppError(err)).toBe(true)
  })

  it("rejects a plain Error", () => {
    expect(isAppError(new Error("x"))).toBe(false)
  })

  it("rejects an invalid timestamp", () => {
    const err = Object.assign(new Error("x"), {
      code: "remote",
      context: {},
      isRetryable: false,
      isOperational: true,
      timestamp: new Date(Number.NaN),
    })

    expect(isAppError(err)).toBe(false)
  })

  it("rejects plain objects and primitives", () => {
    expect(isAppError({ code: "x", message: "x" })).toBe(false)
    expect(isAppError(null)).toBe(false)
    expect(isAppError("x")).toBe(false)
  })
})
