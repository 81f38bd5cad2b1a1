/**
 * Standard facets shared by every boundary.
 *
 * Facets are reusable markers/data traits composed into any ErrorDef.
 */

import {ErrFacet} from "../sift-error.js";

// ============================================================================
// Standard Facets
// ============================================================================

/** Caller provided invalid input */
export const BadInput = ErrFacet.marker("BadInput");

/** Internal invariant violated; always a bug */
export const Invariant = ErrFacet.marker("Invariant");

/** Carries the source text the error was raised against */
export const HasExpression = ErrFacet.data<{ expression: string }>("HasExpression");
