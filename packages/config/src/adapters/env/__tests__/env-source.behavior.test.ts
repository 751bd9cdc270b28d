import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("returns every variable when no prefix is given", async () => {
    const source = new EnvSource({ env: { RETRY_MAX_ATTEMPTS: "3", DEBUG: "true" } })

    await expect(source.load()).resolves.toEqual({ RETRY_MAX_ATTEMPTS: "3", DEBUG: "true" })
    expect(source.name).toBe("env")
  })

  it("filters and strips the prefix", async () => {
    const source = new EnvSource({
      prefix: "RETRY_",
      env: {
        RETRY_INITIAL_DELAY_MS: "250",
        RETRY_RETRYABLE_CODES: "UNAVAILABLE",
        PATH: "/usr/bin",
      },
    })

    await expect(source.load()).resolves.toEqual({
      INITIAL_DELAY_MS: "250",
      RETRYABLE_CODES: "UNAVAILABLE",
    })
  })

  it("skips blank and undefined variables", async () => {
    const source = new EnvSource({
      prefix: "RETRY_",
      env: { RETRY_MAX_ATTEMPTS: "", RETRY_MULTIPLIER: "  ", RETRY_JITTER_FRACTION: undefined },
    })

    await expect(source.load()).resolves.toEqual({})
  })

  it("names itself after the prefix", () => {
    expect(new EnvSource({ prefix: "RETRY_", env: {} }).name).toBe("env:RETRY_")
  })

  it("uses injected env over process.env", async () => {
    const source = new EnvSource({ env: { CUSTOM: "injected_value" } })
    const result = await source.load()

    expect(result).toEqual({ CUSTOM: "injected_value" })
    expect(result).not.toHaveProperty("PATH")
  })
})
