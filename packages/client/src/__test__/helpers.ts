import { LoopbackTransport, SdkError } from "@cafesdk/core"
import { CafeClient } from "../cafe-client.js"
import { InMemoryPlatform } from "../platform/in-memory-platform.js"

export async function failure(call: Promise<unknown>): Promise<SdkError> {
  try {
    await call
  } catch (err) {
    return SdkError.wrap(err)
  }
  throw new Error("expected the call to fail")
}

/** A client wired to an in-memory platform through the loopback transport */
export function loopbackClient(inputJson?: string) {
  const platform = new InMemoryPlatform(inputJson)
  const dispatcher = platform.dispatcher()
  const transport = new LoopbackTransport((request) => dispatcher.dispatch(request))
  const client = new CafeClient(transport)
  return { platform, transport, client }
}

export function abortedSignal(): AbortSignal {
  const controller = new AbortController()
  controller.abort()
  return controller.signal
}
