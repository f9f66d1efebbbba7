/**
 * PlatformDispatcher - routes RpcRequests to the capability handlers.
 *
 * The platform side of the contract: anything that receives calls (the
 * loopback in tests, the local gRPC server) hands them to one of these.
 */

import { RpcResponse, SdkError, ErrUnknownService, type RpcRequest } from "@cafesdk/core"
import type { PlatformServices } from "../protocol/services.js"
import { ParameterHandler } from "./parameter-handler.js"
import { ResultHandler } from "./result-handler.js"
import { LogHandler } from "./log-handler.js"

export class PlatformDispatcher {
  private readonly parameter: ParameterHandler
  private readonly result: ResultHandler
  private readonly log: LogHandler

  constructor(services: PlatformServices) {
    this.parameter = new ParameterHandler(services.parameter)
    this.result = new ResultHandler(services.result)
    this.log = new LogHandler(services.log)
  }

  /** Never rejects: failures come back as an error response. */
  async dispatch(request: RpcRequest): Promise<RpcResponse> {
    try {
      const result = await this.call(request.service, request.method, request.payload)
      return RpcResponse.ok(request.id, result)
    } catch (err) {
      return RpcResponse.error(request.id, SdkError.serialize(err))
    }
  }

  /** Like dispatch, but resolves with the response message or rejects with the error. */
  async call(service: string, method: string, payload: unknown): Promise<unknown> {
    switch (service) {
      case "Parameter":
        return this.parameter.dispatch(method, payload)
      case "Result":
        return this.result.dispatch(method, payload)
      case "Log":
        return this.log.dispatch(method, payload)
      default:
        throw ErrUnknownService.create({ service })
    }
  }
}
