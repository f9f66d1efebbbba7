/**
 * One GET, with an optional agent (the SOCKS5 proxy) and a timeout.
 * The body is read as UTF-8 text.
 */

import * as http from "node:http"
import * as https from "node:https"
import { ErrFetchFailed } from "./errors.js"

export interface FetchOptions {
  readonly agent?: http.Agent
  readonly timeoutMs: number
  /** Accept any TLS certificate */
  readonly insecure?: boolean
  readonly signal?: AbortSignal
}

export interface FetchResult {
  readonly status: number
  readonly body: string
}

export type FetchText = (url: URL, options: FetchOptions) => Promise<FetchResult>

export const fetchText: FetchText = (url, options) => {
  const href = url.toString()
  const requestOptions: https.RequestOptions = {
    agent: options.agent,
    timeout: options.timeoutMs,
    rejectUnauthorized: !options.insecure,
    signal: options.signal,
  }

  return new Promise((resolve, reject) => {
    const onResponse = (response: http.IncomingMessage) => {
      const chunks: string[] = []
      response.setEncoding("utf8")
      response.on("data", (chunk: string) => chunks.push(chunk))
      response.on("error", (err) => reject(ErrFetchFailed.create({ url: href, reason: err.message }, undefined, err)))
      response.on("end", () => resolve({ status: response.statusCode ?? 0, body: chunks.join("") }))
    }

    const request = url.protocol === "https:"
      ? https.get(url, requestOptions, onResponse)
      : http.get(url, requestOptions, onResponse)

    request.on("timeout", () => {
      request.destroy(ErrFetchFailed.create({ url: href, reason: `no response within ${options.timeoutMs}ms` }))
    })
    request.on("error", (err) => {
      reject(ErrFetchFailed.is(err) ? err : ErrFetchFailed.create({ url: href, reason: err.message }, undefined, err))
    })
  })
}
