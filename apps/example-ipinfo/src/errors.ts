/**
 * Example boundary errors.
 */

import { SdkError, ErrFacet, BadInput, NotAvailable } from "@cafesdk/core"

export const Example = SdkError.boundary("example")

export const ErrInvalidArguments = Example.define("invalid_arguments", {
  customProps: ErrFacet.props<{ reason: string }>(),
  facets: [BadInput],
  message: (d) => `Invalid arguments: ${d.reason}`,
})

/** PROXY_AUTH and the proxy domain do not make a usable proxy URL */
export const ErrInvalidProxy = Example.define("invalid_proxy", {
  customProps: ErrFacet.props<{ proxy: string }>(),
  facets: [BadInput],
  message: (d) => `Invalid proxy ${d.proxy}`,
})

export const ErrFetchFailed = Example.define("fetch_failed", {
  customProps: ErrFacet.props<{ url: string; reason: string }>(),
  facets: [NotAvailable],
  message: (d) => `Request to ${d.url} failed: ${d.reason}`,
})

/** A step of the run failed; the cause says why */
export const ErrStepFailed = Example.define("step_failed", {
  customProps: ErrFacet.props<{ step: string }>(),
  facets: [],
  message: (d) => `Step "${d.step}" failed`,
})
