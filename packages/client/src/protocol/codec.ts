/**
 * Wire messages of cafe_sdk.proto, as plain objects with proto field names,
 * and the checks that turn an untrusted value into one.
 *
 * Decoding a request payload fails with ErrInvalidPayload (the caller sent
 * it); decoding a response fails with ErrMalformedResponse (the peer did).
 */

import { ErrInvalidPayload, ErrMalformedResponse } from "@cafesdk/core"
import { ColumnFormat } from "../model/column-format.js"
import { TableHeaderItem, type TableHeader } from "../model/table-header.js"
import type { PlatformResponse } from "../model/platform-response.js"

export type CallRef = {
  readonly service: string
  readonly method: string
}

export interface EmptyMessage {}

export interface ParameterResponseMessage {
  readonly json_string: string
}

export interface TableHeaderItemMessage {
  readonly label: string
  readonly key: string
  readonly format: string
}

export interface TableHeaderMessage {
  readonly headers: readonly TableHeaderItemMessage[]
}

export interface DataMessage {
  readonly json_string: string
}

export interface LogBodyMessage {
  readonly log: string
}

export interface ResponseMessage {
  readonly code: number
  readonly message: string
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

// ============================================================================
// Encoding
// ============================================================================

export const encode = {
  empty(): EmptyMessage {
    return {}
  },

  tableHeader(header: TableHeader): TableHeaderMessage {
    return { headers: header.map(({ label, key, format }) => ({ label, key, format })) }
  },

  data(json: string): DataMessage {
    return { json_string: json }
  },

  logBody(text: string): LogBodyMessage {
    return { log: text }
  },

  parameterResponse(json: string): ParameterResponseMessage {
    return { json_string: json }
  },

  response(response: PlatformResponse): ResponseMessage {
    return { code: response.code, message: response.message }
  },
}

// ============================================================================
// Requests (platform side)
// ============================================================================

function invalid(call: CallRef, reason: string) {
  return ErrInvalidPayload.create({ ...call, reason })
}

function stringField(payload: unknown, field: string, call: CallRef): string {
  if (!isRecord(payload)) throw invalid(call, "expected an object")
  const value = payload[field]
  if (typeof value !== "string") throw invalid(call, `field "${field}" must be a string`)
  return value
}

export const decodeRequest = {
  tableHeader(payload: unknown, call: CallRef): TableHeader {
    if (!isRecord(payload)) throw invalid(call, "expected an object")
    const headers = payload.headers
    if (!Array.isArray(headers)) throw invalid(call, `field "headers" must be a list`)
    return headers.map((item: unknown, index) => {
      const label = stringField(item, "label", call)
      const key = stringField(item, "key", call)
      const value = stringField(item, "format", call)
      const format = ErrInvalidPayload.wrap({ ...call, reason: `headers[${index}] has an unknown format` }, () =>
        ColumnFormat.parse(value),
      )
      return TableHeaderItem.create({ label, key, format })
    })
  },

  data(payload: unknown, call: CallRef): string {
    return stringField(payload, "json_string", call)
  },

  logBody(payload: unknown, call: CallRef): string {
    return stringField(payload, "log", call)
  },
}

// ============================================================================
// Responses (caller side)
// ============================================================================

export const decodeResponse = {
  parameterResponse(value: unknown, call: CallRef): string {
    if (!isRecord(value) || typeof value.json_string !== "string") {
      throw ErrMalformedResponse.create({ ...call, reason: `expected { json_string: string }` })
    }
    return value.json_string
  },

  response(value: unknown, call: CallRef): PlatformResponse {
    if (!isRecord(value)) {
      throw ErrMalformedResponse.create({ ...call, reason: "expected an object" })
    }
    const { code, message } = value
    if (typeof code !== "number" || typeof message !== "string") {
      throw ErrMalformedResponse.create({ ...call, reason: `expected { code: number, message: string }` })
    }
    return { code, message }
  },
}
