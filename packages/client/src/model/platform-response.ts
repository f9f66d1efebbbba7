import { StaticTypeCompanion } from "@cafesdk/core"

/**
 * Acknowledgment returned by header, data and log calls.
 * A resolved call means success; the fields are informational.
 */
export interface PlatformResponse {
  readonly code: number
  readonly message: string
}

export const PlatformResponse = StaticTypeCompanion({
  ok(message: string = "ok"): PlatformResponse {
    return { code: 0, message }
  },
})
