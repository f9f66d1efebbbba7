/**
 * The example's process-level flow: parse the arguments, connect, run and
 * close. Any failure is printed and becomes exit code 1.
 */

import { SdkError } from "@cafesdk/core"
import { CafeClient, ClientConfig } from "@cafesdk/client"
import { parseArgs, type ExampleOptions } from "./cli.js"
import { runExample, type RunSummary } from "./run.js"
import { useColor } from "./settings/use-color.js"

export interface MainDependencies {
  readonly connect: (config: ClientConfig) => Promise<CafeClient>
  readonly run: (client: CafeClient, options: ExampleOptions) => Promise<RunSummary>
  readonly print: (line: string) => void
  readonly printError: (line: string) => void
  readonly color: (argv: readonly string[]) => boolean
}

const defaultDependencies: MainDependencies = {
  connect: (config) => CafeClient.connect(config),
  run: (client, options) => runExample(client, options),
  print: (line) => console.log(line),
  printError: (line) => console.error(line),
  color: (argv) => useColor(process.env, argv),
}

/** Resolves with the exit code; never rejects */
export async function runMain(argv: readonly string[], deps: MainDependencies = defaultDependencies): Promise<number> {
  try {
    const options = parseArgs(argv)
    const client = await deps.connect(new ClientConfig({ address: options.address }))
    try {
      const summary = await deps.run(client, options)
      deps.print(`Done: ${summary.rowsPushed} rows pushed, IP ${summary.ip}`)
    } finally {
      await client.close()
    }
    return 0
  } catch (err) {
    deps.printError(SdkError.wrap(err).prettyPrint({ color: deps.color(argv) }))
    return 1
  }
}
