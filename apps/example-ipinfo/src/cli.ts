import { object } from "@optique/core/constructs"
import { option, flag } from "@optique/core/primitives"
import { optional, withDefault } from "@optique/core/modifiers"
import { string, integer, url } from "@optique/core/valueparser"
import { message, formatMessage } from "@optique/core/message"
import { parseSync, type InferValue } from "@optique/core/parser"
import { ErrInvalidArguments } from "./errors.js"

export const DEFAULT_TARGET_URL = "https://ipinfo.io/ip"
export const DEFAULT_PROXY_DOMAIN = "proxy-inner.cafescraper.com:6000"
export const DEFAULT_TIMEOUT_MS = 30_000

export const exampleParser = object({
  targetUrl: withDefault(
    option("--target-url", url(), { description: message`URL to request` }),
    new URL(DEFAULT_TARGET_URL),
  ),
  proxyDomain: withDefault(
    option("--proxy-domain", string({ metavar: "HOST:PORT" }), { description: message`SOCKS5 proxy host and port` }),
    DEFAULT_PROXY_DOMAIN,
  ),
  timeoutMs: withDefault(
    option("--timeout-ms", integer({ min: 1 }), { description: message`Request timeout in milliseconds` }),
    DEFAULT_TIMEOUT_MS,
  ),
  insecure: withDefault(
    flag("--insecure", { description: message`Skip TLS certificate verification` }),
    false,
  ),
  noColor: withDefault(
    flag("--no-color", { description: message`Print errors without ANSI colour` }),
    false,
  ),
  address: optional(
    option("--address", string({ metavar: "HOST:PORT" }), { description: message`Platform address` }),
  ),
})

export type ExampleOptions = InferValue<typeof exampleParser>

export function parseArgs(argv: readonly string[]): ExampleOptions {
  const result = parseSync(exampleParser, argv)
  if (!result.success) {
    throw ErrInvalidArguments.create({ reason: formatMessage(result.error) })
  }
  return result.value
}
