/**
 * LoopbackTransport: test utility for proxy+handler roundtrip testing.
 *
 * Takes a dispatch function that mirrors what a real dispatcher does:
 * receives an RpcRequest, returns an RpcResponse. The loopback transport
 * calls it in-memory, unwraps the response, and returns the result
 * (or throws a reconstituted error).
 *
 * Payloads and results are passed through a JSON round trip, so a proxy
 * that only works because it shares object identity with its handler
 * fails here the way it would over a real wire.
 *
 * `requests` records every request that reached the dispatcher.
 */

import type { Transport } from "./transport.js"
import type { RpcRequest, RpcResponse, SendOptions } from "./rpc.js"
import { SdkError } from "../sdk-error.js"
import { ErrCallCancelled, ErrTransportClosed } from "./rpc-errors.js"
import { raceAbort } from "./abort.js"

export type DispatchFn = (request: RpcRequest) => Promise<RpcResponse>

export class LoopbackTransport implements Transport {
  readonly requests: RpcRequest[] = []
  private closed = false

  constructor(private readonly dispatch: DispatchFn) {}

  async send(request: RpcRequest, options: SendOptions = {}): Promise<unknown> {
    if (this.closed) {
      throw ErrTransportClosed.create({})
    }
    const cancelled = () => ErrCallCancelled.create({ service: request.service, method: request.method })
    if (options.signal?.aborted) {
      throw cancelled()
    }

    const wire: RpcRequest = { ...request, payload: roundTrip(request.payload) }
    this.requests.push(wire)

    const response = await raceAbort(this.dispatch(wire), options.signal, cancelled)
    if (response.ok) {
      return roundTrip(response.result)
    }
    throw SdkError.reconstitute(response.error)
  }

  async close(): Promise<void> {
    this.closed = true
  }
}

function roundTrip(value: unknown): unknown {
  return value === undefined ? undefined : JSON.parse(JSON.stringify(value))
}
