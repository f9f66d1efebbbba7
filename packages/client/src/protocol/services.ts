/**
 * The three capability groups, their wire method names, and the two
 * interfaces each group is seen through:
 *
 *   - *Capability: what a caller holds (implemented by the proxies)
 *   - *Service: what the platform implements (dispatched to by the handlers)
 *
 * Adding a method requires updating:
 * 1. the .proto contract and the method table here
 * 2. the Capability interface and its proxy
 * 3. the Service interface and its handler case (caught by the roundtrip tests)
 */

import { StaticTypeCompanion, type SendOptions } from "@cafesdk/core"
import { LogLevel, type LogEntry } from "../model/log-level.js"
import type { TableHeader } from "../model/table-header.js"
import type { PlatformResponse } from "../model/platform-response.js"

/** Package name of the services in cafe_sdk.proto */
export const PROTO_PACKAGE = "cafesdk"

const SERVICE_NAMES = ["Parameter", "Result", "Log"] as const

export type ServiceName = (typeof SERVICE_NAMES)[number]

export const ServiceName = StaticTypeCompanion({
  all: SERVICE_NAMES,
  Parameter: "Parameter",
  Result: "Result",
  Log: "Log",

  is(value: unknown): value is ServiceName {
    const names: readonly unknown[] = SERVICE_NAMES
    return names.includes(value)
  },
})

export const ParameterMethod = {
  GetInputJSONString: "GetInputJSONString",
} as const

export const ResultMethod = {
  SetTableHeader: "SetTableHeader",
  PushData: "PushData",
} as const

const LOG_METHODS = {
  debug: "Debug",
  info: "Info",
  warn: "Warn",
  error: "Error",
} as const satisfies Record<LogLevel, string>

export type LogMethod = (typeof LOG_METHODS)[LogLevel]

export const LogMethod = StaticTypeCompanion({
  forLevel(level: LogLevel): LogMethod {
    return LOG_METHODS[level]
  },

  /** Inverse of forLevel; undefined for anything that is not a Log method */
  levelOf(method: string): LogLevel | undefined {
    return LogLevel.all.find((level) => LOG_METHODS[level] === method)
  },
})

/** Methods of a service, by service name */
export const SERVICE_METHODS: Record<ServiceName, readonly string[]> = {
  Parameter: Object.values(ParameterMethod),
  Result: Object.values(ResultMethod),
  Log: Object.values(LOG_METHODS),
}

// ============================================================================
// Caller side
// ============================================================================

/** Per-call options. Cancellation and deadlines come only from the signal. */
export type CallOptions = SendOptions

/** One result record: a JSON object string, or an object to be encoded */
export type DataRow = string | Readonly<Record<string, unknown>>

export interface ParameterCapability {
  /** The run's input parameters, exactly as the platform stores them */
  getInputJSON(options?: CallOptions): Promise<string>
  /** getInputJSON, parsed. The type argument is not checked. */
  getInput<T = unknown>(options?: CallOptions): Promise<T>
}

export interface ResultCapability {
  setTableHeader(header: TableHeader, options?: CallOptions): Promise<PlatformResponse>
  pushData(row: DataRow, options?: CallOptions): Promise<PlatformResponse>
}

export interface LogCapability {
  debug(text: string, options?: CallOptions): Promise<PlatformResponse>
  info(text: string, options?: CallOptions): Promise<PlatformResponse>
  warn(text: string, options?: CallOptions): Promise<PlatformResponse>
  error(text: string, options?: CallOptions): Promise<PlatformResponse>
  write(entry: LogEntry, options?: CallOptions): Promise<PlatformResponse>
}

// ============================================================================
// Platform side
// ============================================================================

export interface ParameterService {
  getInputJSONString(): Promise<string>
}

export interface ResultService {
  setTableHeader(header: TableHeader): Promise<PlatformResponse>
  /** `row` is the JSON string as received */
  pushData(row: string): Promise<PlatformResponse>
}

export interface LogService {
  log(level: LogLevel, text: string): Promise<PlatformResponse>
}

export interface PlatformServices {
  readonly parameter: ParameterService
  readonly result: ResultService
  readonly log: LogService
}
