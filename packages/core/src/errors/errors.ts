/**
 * Standard facets and domain-owned error definitions for the core boundary.
 *
 * Facets are reusable markers/data traits composed into any ErrorDef.
 * Every error here is owned by the Core boundary; no generic catch-alls.
 */

import {ErrFacet, SdkError} from "../sdk-error.js";

// ============================================================================
// Core Boundary
// ============================================================================

export const Core = SdkError.boundary("core");

// ============================================================================
// Standard Facets
// ============================================================================

/** Something expected was not found */
export const NotFound = ErrFacet.marker("NotFound");

/** Caller provided invalid input */
export const BadInput = ErrFacet.marker("BadInput");

/** A required peer or resource could not be reached */
export const NotAvailable = ErrFacet.marker("NotAvailable");

/** The caller gave up: aborted signal, cancelled call or passed deadline */
export const Cancelled = ErrFacet.marker("Cancelled");

/** Internal invariant violated. Always a bug, here or in the peer */
export const InvariantViolated = ErrFacet.marker("InvariantViolated");

/** Carries the peer address a connection was made to */
export const HasAddress = ErrFacet.data<{ address: string }>("HasAddress");

// ============================================================================
// Standard Error Definitions
// ============================================================================

/** A value did not belong to a closed set of choices */
export const ErrInvalidChoice = Core.define("invalid_choice", {
  customProps: ErrFacet.props<{ kind: string; value: string; allowed: readonly string[] }>(),
  facets: [BadInput],
  message: (d) => `Invalid ${d.kind} "${d.value}" (expected one of: ${d.allowed.join(", ")})`,
});
