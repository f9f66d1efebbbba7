import { describe, test, expect } from "vitest"
import { LoopbackTransport } from "../rpc/loopback-transport.js"
import { RpcResponse, type RpcRequest } from "../rpc/rpc.js"
import { ErrCallCancelled, ErrTransportClosed } from "../rpc/rpc-errors.js"
import { SdkError } from "../sdk-error.js"
import { BadInput, Cancelled } from "../errors/errors.js"

const ErrRejected = SdkError.boundary("peer").define("rejected", {
  facets: [BadInput],
  message: () => "Rejected by peer",
})

function request(method: string, payload: unknown = {}): RpcRequest {
  return { id: `req-${method}`, service: "Echo", method, payload }
}

async function failure(call: Promise<unknown>): Promise<SdkError> {
  try {
    await call
  } catch (err) {
    return SdkError.wrap(err)
  }
  throw new Error("expected the call to fail")
}

function echoTransport() {
  return new LoopbackTransport(async (req) => {
    if (req.method === "fail") {
      return RpcResponse.error(req.id, SdkError.serialize(ErrRejected.create({})))
    }
    return RpcResponse.ok(req.id, { echoed: req.payload })
  })
}

describe("LoopbackTransport", () => {
  test("returns the result of an ok response", async () => {
    const transport = echoTransport()
    const result = await transport.send(request("echo", { text: "hi" }))

    expect(result).toEqual({ echoed: { text: "hi" } })
    expect(transport.requests.map((r) => r.method)).toEqual(["echo"])
  })

  test("payload crosses as a copy", async () => {
    const transport = echoTransport()
    const payload = { text: "hi" }
    await transport.send(request("echo", payload))

    expect(transport.requests[0]?.payload).toEqual(payload)
    expect(transport.requests[0]?.payload).not.toBe(payload)
  })

  test("reconstitutes the error of a failed response", async () => {
    const err = await failure(echoTransport().send(request("fail")))

    expect(ErrRejected.is(err)).toBe(true)
    expect(SdkError.has(err, BadInput)).toBe(true)
  })

  test("pre-aborted signal rejects without dispatching", async () => {
    const transport = echoTransport()
    const controller = new AbortController()
    controller.abort()

    const err = await failure(transport.send(request("echo"), { signal: controller.signal }))

    expect(ErrCallCancelled.is(err)).toBe(true)
    expect(SdkError.has(err, Cancelled)).toBe(true)
    expect(transport.requests).toEqual([])
  })

  test("abort while in flight rejects the pending call", async () => {
    const transport = new LoopbackTransport(() => new Promise<RpcResponse>(() => {}))
    const controller = new AbortController()

    const pending = failure(transport.send(request("hang"), { signal: controller.signal }))
    controller.abort()
    const err = await pending

    expect(ErrCallCancelled.is(err)).toBe(true)
    expect(err.data).toEqual({ service: "Echo", method: "hang" })
  })

  test("send after close rejects", async () => {
    const transport = echoTransport()
    await transport.close()

    const err = await failure(transport.send(request("echo")))
    expect(ErrTransportClosed.is(err)).toBe(true)
  })
})
