import type { Transport } from "@cafesdk/core"
import { CapabilityProxy } from "./capability-proxy.js"
import { decodeResponse, encode } from "../protocol/codec.js"
import { LogMethod, type CallOptions, type LogCapability } from "../protocol/services.js"
import type { LogEntry } from "../model/log-level.js"
import type { PlatformResponse } from "../model/platform-response.js"

export class LogProxy extends CapabilityProxy implements LogCapability {
  constructor(transport: Transport) {
    super(transport, "Log")
  }

  debug(text: string, options?: CallOptions): Promise<PlatformResponse> {
    return this.write({ level: "debug", text }, options)
  }

  info(text: string, options?: CallOptions): Promise<PlatformResponse> {
    return this.write({ level: "info", text }, options)
  }

  warn(text: string, options?: CallOptions): Promise<PlatformResponse> {
    return this.write({ level: "warn", text }, options)
  }

  error(text: string, options?: CallOptions): Promise<PlatformResponse> {
    return this.write({ level: "error", text }, options)
  }

  write(entry: LogEntry, options?: CallOptions): Promise<PlatformResponse> {
    return this.rpc(LogMethod.forLevel(entry.level), encode.logBody(entry.text), decodeResponse.response, options)
  }
}
