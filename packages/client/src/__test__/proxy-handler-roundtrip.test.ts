/**
 * Every capability method, through its proxy, the loopback and its handler.
 * A method missing from a handler fails here with ErrUnknownMethod.
 */

import { describe, test, expect } from "vitest"
import {
  ErrCallCancelled,
  ErrUnknownMethod,
  ErrUnknownService,
  ErrInvalidPayload,
  SdkError,
  BadInput,
  NotFound,
} from "@cafesdk/core"
import { TableHeaderItem } from "../model/table-header.js"
import { ErrInvalidInputJson, ErrInvalidRow, ErrUndeclaredColumn, ErrDuplicateColumn, ErrUnencodableRow } from "../errors.js"
import { InMemoryPlatform } from "../platform/in-memory-platform.js"
import { abortedSignal, failure, loopbackClient } from "./helpers.js"

describe("Parameter", () => {
  test("getInputJSON returns the stored string unparsed", async () => {
    const { client, transport } = loopbackClient('{"url": "https://example.com"}')

    expect(await client.parameter.getInputJSON()).toBe('{"url": "https://example.com"}')
    expect(transport.requests).toEqual([
      { id: transport.requests[0]?.id, service: "Parameter", method: "GetInputJSONString", payload: {} },
    ])
  })

  test("getInput parses the string", async () => {
    const { client } = loopbackClient('{"pages": 3, "tags": ["a"]}')
    const input = await client.parameter.getInput<{ pages: number; tags: string[] }>()
    expect(input).toEqual({ pages: 3, tags: ["a"] })
  })

  test("getInput rejects input that is not JSON", async () => {
    const { client } = loopbackClient("{pages")
    const err = await failure(client.parameter.getInput())
    expect(ErrInvalidInputJson.is(err)).toBe(true)
    expect(SdkError.has(err, BadInput)).toBe(true)
  })
})

describe("Result", () => {
  test("setTableHeader sends the items in order", async () => {
    const { client, platform, transport } = loopbackClient()
    const header = [
      TableHeaderItem.create({ label: "Title", key: "title", format: "text" }),
      TableHeaderItem.create({ label: "Views", key: "views", format: "integer" }),
    ]

    expect(await client.result.setTableHeader(header)).toEqual({ code: 0, message: "ok" })
    expect(transport.requests[0]?.payload).toEqual({
      headers: [
        { label: "Title", key: "title", format: "text" },
        { label: "Views", key: "views", format: "integer" },
      ],
    })
    expect(platform.header?.map((item) => item.key)).toEqual(["title", "views"])
  })

  test("pushData sends a string row as given", async () => {
    const { client, platform, transport } = loopbackClient()
    await client.result.pushData('{"title":"a"}')

    expect(transport.requests[0]?.payload).toEqual({ json_string: '{"title":"a"}' })
    expect(platform.rows).toEqual([{ title: "a" }])
  })

  test("pushData encodes an object row", async () => {
    const { client, transport } = loopbackClient()
    await client.result.pushData({ title: "a", views: 2 })
    expect(transport.requests[0]?.payload).toEqual({ json_string: '{"title":"a","views":2}' })
  })

  test("an object row that cannot be encoded is rejected before sending", async () => {
    const { client, transport } = loopbackClient()
    const err = await failure(client.result.pushData({ size: 10n }))

    expect(ErrUnencodableRow.is(err)).toBe(true)
    expect(transport.requests).toEqual([])
  })

  test("a row whose toJSON returns undefined is rejected before sending", async () => {
    const { client, transport } = loopbackClient()
    const err = await failure(client.result.pushData({ toJSON: () => undefined }))

    expect(ErrUnencodableRow.is(err)).toBe(true)
    expect(err.message).toBe("Row cannot be encoded as JSON")
    expect(transport.requests).toEqual([])
  })

  test("an aborted signal wins over an unencodable row", async () => {
    const { client, transport } = loopbackClient()
    const err = await failure(client.result.pushData({ size: 10n }, { signal: abortedSignal() }))

    expect(ErrCallCancelled.is(err)).toBe(true)
    expect(err.data).toEqual({ service: "Result", method: "PushData" })
    expect(transport.requests).toEqual([])
  })

  test("a row with an undeclared key is rejected by the platform", async () => {
    const { client, platform } = loopbackClient()
    await client.result.setTableHeader([TableHeaderItem.text("title")])

    const err = await failure(client.result.pushData({ title: "a", extra: 1 }))

    expect(ErrUndeclaredColumn.is(err)).toBe(true)
    expect(err.data).toEqual({ key: "extra" })
    expect(platform.rows).toEqual([])
  })

  test("a row that is not a JSON object is rejected", async () => {
    const { client } = loopbackClient()
    const err = await failure(client.result.pushData("[1,2]"))
    expect(ErrInvalidRow.is(err)).toBe(true)
    expect(err.message).toBe("Invalid row: expected a JSON object")
  })

  test("a header with a repeated key is rejected", async () => {
    const { client } = loopbackClient()
    const err = await failure(client.result.setTableHeader([TableHeaderItem.text("a"), TableHeaderItem.text("a")]))
    expect(ErrDuplicateColumn.is(err)).toBe(true)
  })
})

describe("Log", () => {
  test("each level reaches the platform with its severity", async () => {
    const { client, platform, transport } = loopbackClient()

    await client.log.debug("d")
    await client.log.info("i")
    await client.log.warn("w")
    await client.log.error("e")
    await client.log.write({ level: "info", text: "entry" })

    expect(transport.requests.map((r) => r.method)).toEqual(["Debug", "Info", "Warn", "Error", "Info"])
    expect(platform.logs).toEqual([
      { level: "debug", text: "d" },
      { level: "info", text: "i" },
      { level: "warn", text: "w" },
      { level: "error", text: "e" },
      { level: "info", text: "entry" },
    ])
  })
})

describe("PlatformDispatcher", () => {
  const dispatcher = new InMemoryPlatform().dispatcher()

  async function callFailure(service: string, method: string, payload: unknown = {}) {
    return failure(dispatcher.call(service, method, payload))
  }

  test("unknown service", async () => {
    const err = await callFailure("Billing", "Charge")
    expect(ErrUnknownService.is(err)).toBe(true)
    expect(SdkError.has(err, NotFound)).toBe(true)
  })

  test("unknown method on each service", async () => {
    for (const service of ["Parameter", "Result", "Log"]) {
      const err = await callFailure(service, "Nope")
      expect(ErrUnknownMethod.is(err)).toBe(true)
      expect(err.data).toEqual({ service, method: "Nope" })
    }
  })

  test("payload of the wrong shape", async () => {
    const err = await callFailure("Result", "PushData", { json_string: 7 })
    expect(ErrInvalidPayload.is(err)).toBe(true)
    expect(err.message).toBe('Invalid payload for Result.PushData: field "json_string" must be a string')
  })

  test("header item with an unknown format", async () => {
    const err = await callFailure("Result", "SetTableHeader", {
      headers: [{ label: "n", key: "n", format: "float" }],
    })
    expect(err.message).toBe("Invalid payload for Result.SetTableHeader: headers[0] has an unknown format")
    expect(err.cause?.code).toBe("core.invalid_choice")
    expect(err.cause?.message).toBe(
      'Invalid column format "float" (expected one of: text, integer, boolean, array, object)',
    )
  })

  test("dispatch turns a failure into an error response", async () => {
    const response = await dispatcher.dispatch({ id: "r1", service: "Log", method: "Trace", payload: {} })
    expect(response.ok).toBe(false)
    if (!response.ok) {
      expect(response.id).toBe("r1")
      expect(response.error.code).toBe("rpc.unknown_method")
    }
  })
})
