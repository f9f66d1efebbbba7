/**
 * Status codes in both directions: a failed call's status to the Rpc error
 * the caller sees, and an error thrown by a platform service to the status
 * the server replies with.
 */

import * as grpc from "@grpc/grpc-js"
import {
  SdkError,
  BadInput,
  NotFound,
  ErrCallCancelled,
  ErrDeadlineExceeded,
  ErrPeerUnavailable,
  ErrRemoteRejected,
} from "@cafesdk/core"
import type { CallRef } from "../protocol/codec.js"

export function statusName(code: grpc.status): string {
  return grpc.status[code] ?? `STATUS_${code}`
}

export function errorFromStatus(err: grpc.ServiceError, call: CallRef): SdkError {
  switch (err.code) {
    case grpc.status.CANCELLED:
      return ErrCallCancelled.create(call)
    case grpc.status.DEADLINE_EXCEEDED:
      return ErrDeadlineExceeded.create(call)
    case grpc.status.UNAVAILABLE:
      return ErrPeerUnavailable.create({ ...call, details: err.details })
    default:
      return ErrRemoteRejected.create({ ...call, status: statusName(err.code), details: err.details })
  }
}

export interface ReplyStatus {
  readonly code: grpc.status
  readonly details: string
}

export function statusFromError(err: unknown): ReplyStatus {
  const details = SdkError.wrap(err).message
  if (SdkError.has(err, BadInput)) return { code: grpc.status.INVALID_ARGUMENT, details }
  if (SdkError.has(err, NotFound)) return { code: grpc.status.NOT_FOUND, details }
  return { code: grpc.status.INTERNAL, details }
}
