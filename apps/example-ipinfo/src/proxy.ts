import { SocksProxyAgent } from "socks-proxy-agent"
import { ErrInvalidProxy } from "./errors.js"

/**
 * The SOCKS5 URL for `PROXY_AUTH` ("user:password") at `proxyDomain`, or
 * undefined when no credentials are set. User and password are
 * percent-encoded separately, so either may contain ":" or "@".
 */
export function resolveProxyUrl(proxyAuth: string | undefined, proxyDomain: string): string | undefined {
  if (proxyAuth === undefined || proxyAuth === "") return undefined

  const colon = proxyAuth.indexOf(":")
  const userinfo = colon === -1
    ? encodeURIComponent(proxyAuth)
    : `${encodeURIComponent(proxyAuth.slice(0, colon))}:${encodeURIComponent(proxyAuth.slice(colon + 1))}`
  const proxyUrl = `socks5://${userinfo}@${proxyDomain}`

  if (!isUrl(proxyUrl)) {
    throw ErrInvalidProxy.create({ proxy: redactProxyUrl(proxyUrl) })
  }
  return proxyUrl
}

/** The URL with its password replaced, for logs */
export function redactProxyUrl(proxyUrl: string): string {
  if (!isUrl(proxyUrl)) {
    return proxyUrl.replace(/\/\/([^:@/]*):[^@/]*@/, "//$1:***@")
  }
  const parsed = new URL(proxyUrl)
  if (parsed.password !== "") parsed.password = "***"
  return parsed.toString()
}

export function createProxyAgent(proxyUrl: string, timeoutMs: number): SocksProxyAgent {
  return new SocksProxyAgent(proxyUrl, { timeout: timeoutMs })
}

function isUrl(value: string): boolean {
  try {
    new URL(value)
    return true
  } catch {
    return false
  }
}
