/**
 * GrpcTransport - unary gRPC calls to the platform over one channel.
 *
 * The method path and (de)serializers come from the contract; the request
 * payload is the wire message as a plain object. Concurrent sends share the
 * channel. Aborting the caller's signal cancels the in-flight call.
 */

import * as grpc from "@grpc/grpc-js"
import {
  ErrCallCancelled,
  ErrInvalidPayload,
  ErrTransportClosed,
  type RpcRequest,
  type SendOptions,
  type Transport,
} from "@cafesdk/core"
import type { PlatformContract } from "./contract.js"
import { errorFromStatus } from "./grpc-status.js"
import { isRecord, type CallRef } from "../protocol/codec.js"
import { ErrConnectFailed } from "../errors.js"

export class GrpcTransport implements Transport {
  private closed = false

  private constructor(
    private readonly client: grpc.Client,
    private readonly contract: PlatformContract,
    readonly address: string,
  ) {}

  /** Creates the channel. Connecting is lazy; see waitForReady. */
  static create(address: string, contract: PlatformContract): GrpcTransport {
    const client = ErrConnectFailed.wrap({ address }, () => new grpc.Client(address, grpc.credentials.createInsecure()))
    return new GrpcTransport(client, contract, address)
  }

  /** Resolves once the channel is connected; rejects with ErrConnectFailed after timeoutMs. */
  waitForReady(timeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      this.client.waitForReady(Date.now() + timeoutMs, (error) => {
        if (error) {
          reject(ErrConnectFailed.create({ address: this.address }, error.message))
        } else {
          resolve()
        }
      })
    })
  }

  async send(request: RpcRequest, options: SendOptions = {}): Promise<unknown> {
    if (this.closed) {
      throw ErrTransportClosed.create({})
    }
    const call: CallRef = { service: request.service, method: request.method }
    const { signal } = options
    if (signal?.aborted) {
      throw ErrCallCancelled.create(call)
    }
    const method = this.contract.method(request.service, request.method)
    const payload = request.payload
    if (!isRecord(payload)) {
      throw ErrInvalidPayload.create({ ...call, reason: "expected an object" })
    }

    return new Promise((resolve, reject) => {
      const pending = this.client.makeUnaryRequest(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        payload,
        (error, value) => {
          signal?.removeEventListener("abort", cancel)
          if (error) {
            reject(errorFromStatus(error, call))
          } else {
            resolve(value)
          }
        },
      )
      const cancel = () => pending.cancel()
      signal?.addEventListener("abort", cancel, { once: true })
    })
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    this.client.close()
  }
}
