/**
 * RPC boundary errors: failures of a single call, from routing on the
 * receiving side to status codes coming back over the wire.
 *
 * They use the standard facet system so callers can catch by facet
 * (Cancelled, NotAvailable, BadInput) or by boundary (Rpc).
 */

import { SdkError, ErrFacet } from "../sdk-error.js"
import { BadInput, Cancelled, InvariantViolated, NotAvailable, NotFound } from "../errors/errors.js"

export const Rpc = SdkError.boundary("rpc")

/** Carries the service and method of the failed call */
export const HasCall = ErrFacet.data<{ service: string; method: string }>("HasCall")

/** Request named a service the peer does not expose */
export const ErrUnknownService = Rpc.define("unknown_service", {
  customProps: ErrFacet.props<{ service: string }>(),
  facets: [NotFound],
  message: (d) => `Unknown RPC service "${d.service}"`,
})

/** Request called an unknown method on a known service */
export const ErrUnknownMethod = Rpc.define("unknown_method", {
  facets: [NotFound, HasCall],
  message: (d) => `Unknown method "${d.method}" on service "${d.service}"`,
})

/** Request payload did not have the shape the method takes */
export const ErrInvalidPayload = Rpc.define("invalid_payload", {
  customProps: ErrFacet.props<{ reason: string }>(),
  facets: [BadInput, HasCall],
  message: (d) => `Invalid payload for ${d.service}.${d.method}: ${d.reason}`,
})

/** Response message did not have the shape the method returns */
export const ErrMalformedResponse = Rpc.define("malformed_response", {
  customProps: ErrFacet.props<{ reason: string }>(),
  facets: [InvariantViolated, HasCall],
  message: (d) => `Malformed response from ${d.service}.${d.method}: ${d.reason}`,
})

/** The caller's signal was aborted, or the peer reported the call cancelled */
export const ErrCallCancelled = Rpc.define("call_cancelled", {
  facets: [Cancelled, HasCall],
  message: (d) => `Call ${d.service}.${d.method} was cancelled`,
})

/** The call's deadline passed before the peer answered */
export const ErrDeadlineExceeded = Rpc.define("deadline_exceeded", {
  facets: [Cancelled, HasCall],
  message: (d) => `Call ${d.service}.${d.method} exceeded its deadline`,
})

/** The peer could not be reached for this call */
export const ErrPeerUnavailable = Rpc.define("peer_unavailable", {
  customProps: ErrFacet.props<{ details: string }>(),
  facets: [NotAvailable, HasCall],
  message: (d) => `Peer unavailable for ${d.service}.${d.method}: ${d.details}`,
})

/** The peer answered with a failure status */
export const ErrRemoteRejected = Rpc.define("remote_rejected", {
  customProps: ErrFacet.props<{ status: string; details: string }>(),
  facets: [HasCall],
  message: (d) => `${d.service}.${d.method} failed with ${d.status}: ${d.details}`,
})

/** send() after close() */
export const ErrTransportClosed = Rpc.define("transport_closed", {
  facets: [NotAvailable],
  message: () => "Transport is closed",
})
