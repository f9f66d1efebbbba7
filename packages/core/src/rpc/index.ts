/**
 * RPC - envelope types, the Transport interface, call errors and the
 * in-memory loopback used by tests.
 */

export { RpcResponse } from "./rpc.js"
export type { RpcRequest, SendOptions } from "./rpc.js"

export type { Transport } from "./transport.js"

export {
  Rpc,
  HasCall,
  ErrUnknownService,
  ErrUnknownMethod,
  ErrInvalidPayload,
  ErrMalformedResponse,
  ErrCallCancelled,
  ErrDeadlineExceeded,
  ErrPeerUnavailable,
  ErrRemoteRejected,
  ErrTransportClosed,
} from "./rpc-errors.js"

export { raceAbort } from "./abort.js"
export { LoopbackTransport, type DispatchFn } from "./loopback-transport.js"
