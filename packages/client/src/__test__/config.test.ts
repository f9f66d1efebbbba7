import { describe, test, expect } from "vitest"
import { ClientConfig, DEFAULT_ADDRESS, DEFAULT_READY_TIMEOUT_MS } from "../config.js"
import { DEFAULT_PROTO_PATH } from "../grpc/contract.js"
import { ErrInvalidConfig } from "../errors.js"

describe("ClientConfig", () => {
  test("defaults", () => {
    const config = new ClientConfig({}, {})
    expect(config.address).toBe(DEFAULT_ADDRESS)
    expect(config.address).toBe("127.0.0.1:20086")
    expect(config.readyTimeoutMs).toBe(DEFAULT_READY_TIMEOUT_MS)
    expect(config.waitForReady).toBe(true)
    expect(config.protoPath).toBe(DEFAULT_PROTO_PATH)
    expect(DEFAULT_PROTO_PATH.endsWith("cafe_sdk.proto")).toBe(true)
  })

  test("environment overrides defaults", () => {
    const config = new ClientConfig({}, {
      CAFESDK_ADDRESS: "10.0.0.5:9000",
      CAFESDK_READY_TIMEOUT_MS: "250",
      CAFESDK_PROTO_PATH: "/etc/cafe/contract.proto",
    })
    expect(config.address).toBe("10.0.0.5:9000")
    expect(config.readyTimeoutMs).toBe(250)
    expect(config.protoPath).toBe("/etc/cafe/contract.proto")
  })

  test("options override the environment", () => {
    const config = new ClientConfig(
      { address: "localhost:1234", readyTimeoutMs: 100, waitForReady: false },
      { CAFESDK_ADDRESS: "10.0.0.5:9000", CAFESDK_READY_TIMEOUT_MS: "250" },
    )
    expect(config.address).toBe("localhost:1234")
    expect(config.readyTimeoutMs).toBe(100)
    expect(config.waitForReady).toBe(false)
  })

  test("empty environment values are ignored", () => {
    const config = new ClientConfig({}, { CAFESDK_ADDRESS: "", CAFESDK_READY_TIMEOUT_MS: "" })
    expect(config.address).toBe(DEFAULT_ADDRESS)
    expect(config.readyTimeoutMs).toBe(DEFAULT_READY_TIMEOUT_MS)
  })

  test("a timeout that is not a positive integer is rejected", () => {
    let caught: unknown
    try {
      new ClientConfig({}, { CAFESDK_READY_TIMEOUT_MS: "soon" })
    } catch (err) {
      caught = err
    }
    expect(ErrInvalidConfig.is(caught)).toBe(true)
    expect(() => new ClientConfig({ readyTimeoutMs: 0 }, {})).toThrow('Invalid value for readyTimeoutMs: "0"')
  })

  test("an empty address option is rejected", () => {
    expect(() => new ClientConfig({ address: "" }, {})).toThrow('Invalid value for address: ""')
  })
})
