/**
 * ParameterHandler - receiver-side mirror of ParameterProxy.
 */

import { ErrUnknownMethod } from "@cafesdk/core"
import { encode } from "../protocol/codec.js"
import { ParameterMethod, type ParameterService } from "../protocol/services.js"

export class ParameterHandler {
  constructor(private readonly service: ParameterService) {}

  async dispatch(method: string, _payload: unknown): Promise<unknown> {
    switch (method) {
      case ParameterMethod.GetInputJSONString:
        return encode.parameterResponse(await this.service.getInputJSONString())
      default:
        throw ErrUnknownMethod.create({ service: "Parameter", method })
    }
  }
}
