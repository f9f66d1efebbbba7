import type { Transport } from "@cafesdk/core"
import { CapabilityProxy } from "./capability-proxy.js"
import { decodeResponse, encode } from "../protocol/codec.js"
import { ParameterMethod, type CallOptions, type ParameterCapability } from "../protocol/services.js"
import { ErrInvalidInputJson } from "../errors.js"

export class ParameterProxy extends CapabilityProxy implements ParameterCapability {
  constructor(transport: Transport) {
    super(transport, "Parameter")
  }

  getInputJSON(options?: CallOptions): Promise<string> {
    return this.rpc(ParameterMethod.GetInputJSONString, encode.empty(), decodeResponse.parameterResponse, options)
  }

  async getInput<T = unknown>(options?: CallOptions): Promise<T> {
    const json = await this.getInputJSON(options)
    return ErrInvalidInputJson.wrap({}, (): T => JSON.parse(json))
  }
}
