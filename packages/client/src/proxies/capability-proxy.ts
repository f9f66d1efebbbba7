/**
 * CapabilityProxy - shared base of the caller-side proxies.
 *
 * Each proxy is a thin forwarder: encode the arguments, send one request,
 * decode the reply. No state, no retries, no buffering.
 */

import { randomUUID } from "node:crypto"
import { ErrCallCancelled, type RpcRequest, type Transport } from "@cafesdk/core"
import type { CallRef } from "../protocol/codec.js"
import type { CallOptions, ServiceName } from "../protocol/services.js"

export abstract class CapabilityProxy {
  protected constructor(
    private readonly transport: Transport,
    private readonly service: ServiceName,
  ) {}

  /** An already-aborted signal rejects here, before the transport sees the call. */
  protected async rpc<T>(
    method: string,
    payload: unknown,
    decode: (value: unknown, call: CallRef) => T,
    options: CallOptions = {},
  ): Promise<T> {
    const call = this.checkNotAborted(method, options)
    const request: RpcRequest = { id: randomUUID(), service: this.service, method, payload }
    const result = await this.transport.send(request, options)
    return decode(result, call)
  }

  /** For proxies that do work of their own before rpc() */
  protected checkNotAborted(method: string, options: CallOptions = {}): CallRef {
    const call: CallRef = { service: this.service, method }
    if (options.signal?.aborted) {
      throw ErrCallCancelled.create(call)
    }
    return call
  }
}
