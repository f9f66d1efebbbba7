import { describe, test, expect } from "vitest"
import * as grpc from "@grpc/grpc-js"
import { ErrDeadlineExceeded, ErrRemoteRejected, ErrUnknownService, ErrInvalidPayload } from "@cafesdk/core"
import { errorFromStatus, statusFromError, statusName } from "../grpc/grpc-status.js"
import { ErrInvalidRow } from "../errors.js"

const call = { service: "Result", method: "PushData" }

function serviceError(code: grpc.status, details: string): grpc.ServiceError {
  return Object.assign(new Error(details), { code, details, metadata: new grpc.Metadata() })
}

describe("errorFromStatus", () => {
  test("DEADLINE_EXCEEDED", () => {
    const err = errorFromStatus(serviceError(grpc.status.DEADLINE_EXCEEDED, "late"), call)
    expect(ErrDeadlineExceeded.is(err)).toBe(true)
  })

  test("other codes are remote rejections with the status name", () => {
    const err = errorFromStatus(serviceError(grpc.status.PERMISSION_DENIED, "no"), call)
    expect(ErrRemoteRejected.is(err)).toBe(true)
    expect(err.message).toBe("Result.PushData failed with PERMISSION_DENIED: no")
  })
})

describe("statusFromError", () => {
  test("BadInput is INVALID_ARGUMENT", () => {
    expect(statusFromError(ErrInvalidRow.create({ reason: "empty" }))).toEqual({
      code: grpc.status.INVALID_ARGUMENT,
      details: "Invalid row: empty",
    })
    expect(statusFromError(ErrInvalidPayload.create({ ...call, reason: "r" })).code).toBe(grpc.status.INVALID_ARGUMENT)
  })

  test("NotFound is NOT_FOUND", () => {
    expect(statusFromError(ErrUnknownService.create({ service: "X" })).code).toBe(grpc.status.NOT_FOUND)
  })

  test("anything else is INTERNAL", () => {
    expect(statusFromError(new Error("boom"))).toEqual({ code: grpc.status.INTERNAL, details: "boom" })
  })
})

test("statusName", () => {
  expect(statusName(grpc.status.UNAVAILABLE)).toBe("UNAVAILABLE")
})
