/**
 * LogHandler - receiver-side mirror of LogProxy. One service method serves
 * all four severities.
 */

import { ErrUnknownMethod } from "@cafesdk/core"
import { decodeRequest, encode, type CallRef } from "../protocol/codec.js"
import { LogMethod, type LogService } from "../protocol/services.js"

export class LogHandler {
  constructor(private readonly service: LogService) {}

  async dispatch(method: string, payload: unknown): Promise<unknown> {
    const call: CallRef = { service: "Log", method }
    const level = LogMethod.levelOf(method)
    if (level === undefined) {
      throw ErrUnknownMethod.create(call)
    }
    return encode.response(await this.service.log(level, decodeRequest.logBody(payload, call)))
  }
}
