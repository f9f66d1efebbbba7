import { DEFAULT_PROTO_PATH } from "./grpc/contract.js"
import { ErrInvalidConfig } from "./errors.js"

export const DEFAULT_ADDRESS = "127.0.0.1:20086"
export const DEFAULT_READY_TIMEOUT_MS = 5000

export interface ClientConfigOptions {
  address?: string
  protoPath?: string
  waitForReady?: boolean
  readyTimeoutMs?: number
}

/**
 * Where and how CafeClient connects. Explicit options win over the
 * environment (CAFESDK_ADDRESS, CAFESDK_PROTO_PATH, CAFESDK_READY_TIMEOUT_MS),
 * which wins over the defaults.
 */
export class ClientConfig {
  readonly address: string
  readonly protoPath: string
  readonly waitForReady: boolean
  readonly readyTimeoutMs: number

  constructor(opts: ClientConfigOptions = {}, env: NodeJS.ProcessEnv = process.env) {
    this.address = opts.address ?? nonEmpty(env.CAFESDK_ADDRESS) ?? DEFAULT_ADDRESS
    if (this.address.trim() === "") {
      throw ErrInvalidConfig.create({ key: "address", value: this.address })
    }

    this.protoPath = opts.protoPath ?? nonEmpty(env.CAFESDK_PROTO_PATH) ?? DEFAULT_PROTO_PATH

    this.waitForReady = opts.waitForReady ?? true

    const envTimeout = nonEmpty(env.CAFESDK_READY_TIMEOUT_MS)
    this.readyTimeoutMs = opts.readyTimeoutMs
      ?? (envTimeout === undefined ? DEFAULT_READY_TIMEOUT_MS : parseTimeout("CAFESDK_READY_TIMEOUT_MS", envTimeout))
    if (!Number.isInteger(this.readyTimeoutMs) || this.readyTimeoutMs <= 0) {
      throw ErrInvalidConfig.create({ key: "readyTimeoutMs", value: String(this.readyTimeoutMs) })
    }
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value
}

function parseTimeout(key: string, value: string): number {
  if (!/^\d+$/.test(value)) throw ErrInvalidConfig.create({ key, value })
  return Number(value)
}
