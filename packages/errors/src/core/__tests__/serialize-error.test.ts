import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("serializes a BaseError with its cause chain", () => {
    const root = new Error("config is empty")
    const err = new BaseError("clouds: cannot parse clouds.yaml: config is empty", {
      code: "clouds_parse_failed",
      context: { file: "clouds.yaml" },
      cause: root,
    })

    expect(serializeError(err)).toEqual({
      name: "BaseError",
      code: "clouds_parse_failed",
      message: "clouds: cannot parse clouds.yaml: config is empty",
      context: { file: "clouds.yaml" },
      isOperational: true,
      timestamp: "2024-01-15T10:30:00.000Z",
      cause: {
        name: "Error",
        code: "unknown",
        message: "config is empty",
        context: {},
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      },
    })
  })

  it("omits stack unless requested", () => {
    const err = new BaseError("test", { code: "test" })

    expect("stack" in serializeError(err)).toBe(false)
    expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
  })

  it("passes includeStack down the cause chain", () => {
    const err = new BaseError("outer", { code: "outer", cause: new Error("inner") })

    const serialized = serializeError(err, { includeStack: true })

    expect(serialized.cause?.stack).toContain("inner")
  })

  it("wraps string throws", () => {
    expect(serializeError("boom")).toEqual({
      name: "NonErrorThrown",
      code: "unknown",
      message: "boom",
      context: { value: "boom" },
      isOperational: false,
      timestamp: "2024-01-15T10:30:00.000Z",
    })
  })

  it("wraps other thrown values", () => {
    const serialized = serializeError({ reason: 42 })

    expect(serialized.message).toBe("Unknown error")
    expect(serialized.context).toEqual({ value: { reason: 42 } })
  })
})
