/**
 * RPC envelope: the shared contract between proxies, transports and dispatchers.
 *
 * Proxies construct RpcRequest messages and send them via a Transport.
 * Dispatchers receive them, route to real implementations, and return
 * RpcResponse messages.
 *
 * These types are transport-agnostic. They define the message shape,
 * not how it moves over the wire.
 */

import { SerializedError } from '../sdk-error.js'
import { StaticTypeCompanion } from "../companion.js";

// ============================================================================
// Request
// ============================================================================

/**
 * A single unary call.
 *
 * `id` is unique per request, so concurrent calls over one connection can be
 * told apart in logs and by transports that multiplex by hand.
 *
 * `service` names one capability group on the peer ("Parameter", "Result",
 * "Log"), `method` one procedure of it. `payload` is the request message.
 */
export interface RpcRequest {
  readonly id: string
  readonly service: string
  readonly method: string
  readonly payload: unknown
}

/** Per-call options. The signal is the caller's; transports never add a deadline. */
export interface SendOptions {
  readonly signal?: AbortSignal
}

// ============================================================================
// Response
// ============================================================================

export type RpcResponse =
  | { readonly id: string; readonly ok: true; readonly result: unknown }
  | { readonly id: string; readonly ok: false; readonly error: SerializedError }

export const RpcResponse = StaticTypeCompanion({
  ok(id: string, result: unknown): RpcResponse {
    return { id, ok: true, result }
  },

  error(id: string, error: SerializedError): RpcResponse {
    return { id, ok: false, error }
  },
})
