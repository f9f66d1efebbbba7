/**
 * Transport: typed message passing over one persistent connection.
 *
 * The pipe between the client and its single peer. Calls are multiplexed:
 * many requests may be in flight over the same connection at once, with no
 * ordering guarantee between them.
 *
 * `send` takes an RpcRequest and does NOT interpret the payload. It resolves
 * with the decoded response message or rejects with an SdkError from the
 * Rpc boundary. It never retries.
 *
 * Implementations:
 *   - LoopbackTransport: test utility, dispatches in-memory
 *   - GrpcTransport: unary gRPC calls over one channel
 */

import type { RpcRequest, SendOptions } from "./rpc.js"

export interface Transport {
  send(request: RpcRequest, options?: SendOptions): Promise<unknown>
  close(): Promise<void>
}
