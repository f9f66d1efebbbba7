/**
 * InMemoryPlatform - all three platform services, held in memory.
 *
 * Records what a run declared, pushed and logged, and applies the checks
 * the real platform applies to rows: each row is a JSON object and, once a
 * header is declared, uses only declared keys. Rows pushed before any header
 * are accepted as they are.
 */

import type { LogEntry, LogLevel } from "../model/log-level.js"
import type { TableHeader } from "../model/table-header.js"
import { PlatformResponse } from "../model/platform-response.js"
import type { LogService, ParameterService, PlatformServices, ResultService } from "../protocol/services.js"
import { isRecord } from "../protocol/codec.js"
import { PlatformDispatcher } from "../handlers/platform-dispatcher.js"
import { ErrDuplicateColumn, ErrInvalidRow, ErrUndeclaredColumn } from "../errors.js"

export class InMemoryPlatform implements ParameterService, ResultService, LogService {
  private declared: TableHeader | undefined
  private readonly pushed: Record<string, unknown>[] = []
  private readonly logged: LogEntry[] = []

  constructor(private readonly inputJson: string = "{}") {}

  get header(): TableHeader | undefined {
    return this.declared
  }

  get rows(): readonly Record<string, unknown>[] {
    return this.pushed
  }

  get logs(): readonly LogEntry[] {
    return this.logged
  }

  get services(): PlatformServices {
    return { parameter: this, result: this, log: this }
  }

  dispatcher(): PlatformDispatcher {
    return new PlatformDispatcher(this.services)
  }

  async getInputJSONString(): Promise<string> {
    return this.inputJson
  }

  /** Replaces any earlier declaration. */
  async setTableHeader(header: TableHeader): Promise<PlatformResponse> {
    const seen = new Set<string>()
    for (const item of header) {
      if (seen.has(item.key)) throw ErrDuplicateColumn.create({ key: item.key })
      seen.add(item.key)
    }
    this.declared = [...header]
    return PlatformResponse.ok()
  }

  async pushData(row: string): Promise<PlatformResponse> {
    const parsed = parseRow(row)
    if (this.declared) {
      const keys = new Set(this.declared.map((item) => item.key))
      for (const key of Object.keys(parsed)) {
        if (!keys.has(key)) throw ErrUndeclaredColumn.create({ key })
      }
    }
    this.pushed.push(parsed)
    return PlatformResponse.ok()
  }

  async log(level: LogLevel, text: string): Promise<PlatformResponse> {
    this.logged.push({ level, text })
    return PlatformResponse.ok()
  }
}

function parseRow(row: string): Record<string, unknown> {
  let parsed: unknown
  try {
    parsed = JSON.parse(row)
  } catch (err) {
    throw ErrInvalidRow.create({ reason: "not valid JSON" }, undefined, err)
  }
  if (!isRecord(parsed)) {
    throw ErrInvalidRow.create({ reason: "expected a JSON object" })
  }
  return parsed
}
