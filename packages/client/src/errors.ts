/**
 * Client boundary errors: bootstrap of the connection and values rejected
 * before anything is sent.
 */

import { SdkError, ErrFacet, BadInput, NotAvailable, HasAddress } from "@cafesdk/core"

export const Client = SdkError.boundary("client")

/** The peer could not be reached when the client was created */
export const ErrConnectFailed = Client.define("connect_failed", {
  facets: [NotAvailable, HasAddress],
  message: (d) => `Could not connect to the platform at ${d.address}`,
})

/** The proto contract could not be loaded or lacks a service */
export const ErrContractLoadFailed = Client.define("contract_load_failed", {
  customProps: ErrFacet.props<{ protoPath: string }>(),
  facets: [],
  message: (d) => `Could not load the service contract from ${d.protoPath}`,
})

/** A configuration value (override or environment variable) is unusable */
export const ErrInvalidConfig = Client.define("invalid_config", {
  customProps: ErrFacet.props<{ key: string; value: string }>(),
  facets: [BadInput],
  message: (d) => `Invalid value for ${d.key}: "${d.value}"`,
})

export const ErrInvalidHeaderItem = Client.define("invalid_header_item", {
  customProps: ErrFacet.props<{ key: string; reason: string }>(),
  facets: [BadInput],
  message: (d) => `Invalid table header item "${d.key}": ${d.reason}`,
})

/** A row object could not be encoded as JSON */
export const ErrUnencodableRow = Client.define("unencodable_row", {
  facets: [BadInput],
  message: () => "Row cannot be encoded as JSON",
})

/** The platform's input parameters are not valid JSON */
export const ErrInvalidInputJson = Client.define("invalid_input_json", {
  facets: [BadInput],
  message: () => "Input parameters are not valid JSON",
})

// ============================================================================
// Platform boundary: rejections by the in-memory and local platforms
// ============================================================================

export const Platform = SdkError.boundary("platform")

/** A pushed row is not a JSON object */
export const ErrInvalidRow = Platform.define("invalid_row", {
  customProps: ErrFacet.props<{ reason: string }>(),
  facets: [BadInput],
  message: (d) => `Invalid row: ${d.reason}`,
})

/** A pushed row has a field the table header does not declare */
export const ErrUndeclaredColumn = Platform.define("undeclared_column", {
  customProps: ErrFacet.props<{ key: string }>(),
  facets: [BadInput],
  message: (d) => `Row field "${d.key}" is not a declared column`,
})

export const ErrDuplicateColumn = Platform.define("duplicate_column", {
  customProps: ErrFacet.props<{ key: string }>(),
  facets: [BadInput],
  message: (d) => `Column "${d.key}" is declared more than once`,
})
