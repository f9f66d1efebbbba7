/**
 * The example run: read the input, fetch the target through the proxy,
 * declare the result table and push the rows.
 *
 * Progress goes to the platform's run log. A failed log call is reported
 * locally and the run goes on; any other failure is logged and ends the run.
 */

import { SdkError } from "@cafesdk/core"
import { TableHeaderItem, type CafeClient, type LogCapability, type LogLevel } from "@cafesdk/client"
import type { ExampleOptions } from "./cli.js"
import { createProxyAgent, redactProxyUrl, resolveProxyUrl } from "./proxy.js"
import { fetchText, type FetchText } from "./http-fetch.js"
import { ErrStepFailed } from "./errors.js"

export const RESULT_HEADER = [
  TableHeaderItem.create({ label: "Title", key: "title", format: "text" }),
  TableHeaderItem.create({ label: "Content", key: "content", format: "text" }),
]

export const SAMPLE_ROWS = [
  { title: "Sample title 1", content: "Sample content 1" },
  { title: "Sample title 2", content: "Sample content 2" },
]

export interface RunDependencies {
  readonly env: NodeJS.ProcessEnv
  readonly fetchText: FetchText
  /** Local output (acknowledgments) */
  readonly print: (line: string) => void
  /** Local error output, for failures the run goes on after */
  readonly printError: (line: string) => void
}

export interface RunSummary {
  readonly ip: string
  readonly status: number
  readonly proxied: boolean
  readonly rowsPushed: number
}

const defaultDependencies: RunDependencies = {
  env: process.env,
  fetchText,
  print: (line) => console.log(line),
  printError: (line) => console.error(line),
}

export async function runExample(
  client: CafeClient,
  options: ExampleOptions,
  deps: RunDependencies = defaultDependencies,
): Promise<RunSummary> {
  const log = new RunLog(client.log, deps.printError)

  const step = async <T>(name: string, fn: () => Promise<T>): Promise<T> => {
    try {
      return await ErrStepFailed.wrapAsync({ step: name }, fn)
    } catch (err) {
      const failed = SdkError.wrap(err)
      await log.write("error", `${name} failed: ${(failed.cause ?? failed).message}`)
      throw err
    }
  }

  await log.write("info", "SDK client started")

  const inputJson = await step("read input", () => client.parameter.getInputJSON())
  await log.write("debug", `Input parameters: ${inputJson}`)

  const proxyUrl = await step("resolve proxy", async () => resolveProxyUrl(deps.env.PROXY_AUTH, options.proxyDomain))
  await log.write("info", proxyUrl === undefined ? "Proxy: none (PROXY_AUTH is not set)" : `Proxy: ${redactProxyUrl(proxyUrl)}`)

  const target = options.targetUrl
  await log.write("info", `Requesting ${target.toString()}`)
  const response = await step("fetch", () =>
    deps.fetchText(target, {
      agent: proxyUrl === undefined ? undefined : createProxyAgent(proxyUrl, options.timeoutMs),
      timeoutMs: options.timeoutMs,
      insecure: options.insecure,
    }),
  )
  await log.write(response.status >= 400 ? "warn" : "info", `Response status: ${response.status}`)
  const ip = response.body.trim()
  await log.write("info", `Current IP address: ${ip}`)

  const headerAck = await step("set table header", () => client.result.setTableHeader(RESULT_HEADER))
  deps.print(`SetTableHeader response: ${JSON.stringify(headerAck)}`)

  let rowsPushed = 0
  for (const row of SAMPLE_ROWS) {
    const ack = await step("push data", () => client.result.pushData(row))
    deps.print(`PushData response: ${JSON.stringify(ack)}`)
    rowsPushed++
  }

  await log.write("info", "Run complete")
  return { ip, status: response.status, proxied: proxyUrl !== undefined, rowsPushed }
}

/** Run log whose failures are printed locally instead of failing the run */
class RunLog {
  constructor(
    private readonly log: LogCapability,
    private readonly printError: (line: string) => void,
  ) {}

  async write(level: LogLevel, text: string): Promise<void> {
    try {
      await this.log.write({ level, text })
    } catch (err) {
      this.printError(`Could not send ${level} log: ${SdkError.wrap(err).message}`)
    }
  }
}
