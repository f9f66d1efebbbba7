/**
 * ResultHandler - receiver-side mirror of ResultProxy.
 *
 * Payloads arrive untrusted; a payload of the wrong shape is rejected
 * before the service is called.
 */

import { ErrUnknownMethod } from "@cafesdk/core"
import { decodeRequest, encode, type CallRef } from "../protocol/codec.js"
import { ResultMethod, type ResultService } from "../protocol/services.js"

export class ResultHandler {
  constructor(private readonly service: ResultService) {}

  async dispatch(method: string, payload: unknown): Promise<unknown> {
    const call: CallRef = { service: "Result", method }
    switch (method) {
      case ResultMethod.SetTableHeader:
        return encode.response(await this.service.setTableHeader(decodeRequest.tableHeader(payload, call)))
      case ResultMethod.PushData:
        return encode.response(await this.service.pushData(decodeRequest.data(payload, call)))
      default:
        throw ErrUnknownMethod.create(call)
    }
  }
}
