/**
 * @cafesdk/core - errors, RPC envelope and transport contracts shared by the SDK
 */

// Companion marker
export { StaticTypeCompanion } from "./companion.js";

// Inspection
export { Inspect, inspect } from "./inspect.js";

// Type utilities
export type { UnionToIntersection } from "./type-system-utils.js";

// SdkError (SdkError is both type and value)
export { SdkError, ErrFacet } from "./sdk-error.js";
export type {
  ErrMarkerFacet,
  ErrDataFacet,
  ErrFacetAny,
  ErrProps,
  InferPropsData,
  FacetProps,
  MergeFacetProps,
  ErrorDef,
  ErrorBoundary,
  SerializedError,
} from "./sdk-error.js";

// Standard facets and core errors
export {
  Core,
  NotFound,
  BadInput,
  NotAvailable,
  Cancelled,
  InvariantViolated,
  HasAddress,
  ErrInvalidChoice,
} from "./errors/errors.js";

// RPC
export * from "./rpc/index.js";
