/**
 * @sift/core: shared error system, type companions and text formatting.
 */

export {
  SiftError,
  ErrFacet,
  type ErrorDef,
  type ErrorBoundary,
  type ErrFacetAny,
  type ErrMarkerFacet,
  type ErrDataFacet,
  type ErrProps,
  type FacetProps,
  type MergeFacetProps,
  type InferPropsData,
  type SiftErrorJSON,
} from "./sift-error.js";

export { BadInput, Invariant, HasExpression } from "./errors/basic-errors.js";

export { StaticTypeCompanion } from "./companion.js";
export type { UnionToIntersection } from "./type-system-utils.js";
export { Inspect, inspect } from "./inspect.js";
export { Fmt } from "./fmt.js";
export { Printer } from "./printable.js";
