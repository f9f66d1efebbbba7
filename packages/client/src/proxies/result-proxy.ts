import type { Transport } from "@cafesdk/core"
import { CapabilityProxy } from "./capability-proxy.js"
import { decodeResponse, encode } from "../protocol/codec.js"
import { ResultMethod, type CallOptions, type DataRow, type ResultCapability } from "../protocol/services.js"
import type { TableHeader } from "../model/table-header.js"
import type { PlatformResponse } from "../model/platform-response.js"
import { ErrUnencodableRow } from "../errors.js"

export class ResultProxy extends CapabilityProxy implements ResultCapability {
  constructor(transport: Transport) {
    super(transport, "Result")
  }

  setTableHeader(header: TableHeader, options?: CallOptions): Promise<PlatformResponse> {
    return this.rpc(ResultMethod.SetTableHeader, encode.tableHeader(header), decodeResponse.response, options)
  }

  /** One call, one row. String rows are sent as given. */
  async pushData(row: DataRow, options?: CallOptions): Promise<PlatformResponse> {
    this.checkNotAborted(ResultMethod.PushData, options)
    const json = typeof row === "string" ? row : encodeRow(row)
    return this.rpc(ResultMethod.PushData, encode.data(json), decodeResponse.response, options)
  }
}

function encodeRow(row: Exclude<DataRow, string>): string {
  const json: string | undefined = ErrUnencodableRow.wrap({}, () => JSON.stringify(row))
  // undefined when the row's toJSON() returns undefined
  if (typeof json !== "string") throw ErrUnencodableRow.create({})
  return json
}
