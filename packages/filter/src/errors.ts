/**
 * Error boundary for filter expressions.
 *
 * Every failure the lexer, parser, analyzer or a translator reports is one of
 * the definitions below. The code is `filter.<Tag>` and the message reads
 * `<Tag>: <detail> at L:C` (the suffix is left out for nodes built in code).
 */

import { BadInput, ErrFacet, HasExpression, Invariant, SiftError } from '@sift/core'
import { Position } from './position.js'

export const FilterBoundary = SiftError.boundary('filter')

/** Carries the source position of the offending node or token */
export const HasPosition = ErrFacet.data<{ position: Position }>('HasPosition')

function at(d: { position: Position }): string {
  return Position.isNone(d.position) ? '' : ` at ${Position.format(d.position)}`
}

// ============================================================================
// Structural
// ============================================================================

export const ErrNilExpression = FilterBoundary.define('NilExpression', {
  facets: [BadInput],
  message: () => 'NilExpression: expression is missing',
})

export const ErrUnsupportedExpression = FilterBoundary.define('UnsupportedExpression', {
  customProps: ErrFacet.props<{ nodeType: string }>(),
  facets: [BadInput],
  message: (d) => `UnsupportedExpression: unsupported expression type ${d.nodeType}`,
})

// ============================================================================
// Identifier
// ============================================================================

export const ErrIdentTokenMismatch = FilterBoundary.define('IdentTokenMismatch', {
  customProps: ErrFacet.props<{ kind: string }>(),
  facets: [BadInput, HasPosition],
  message: (d) => `IdentTokenMismatch: identifier token must be IDENT, got ${d.kind}${at(d)}`,
})

export const ErrInvalidIdentifier = FilterBoundary.define('InvalidIdentifier', {
  customProps: ErrFacet.props<{ value: string }>(),
  facets: [BadInput, HasPosition],
  message: (d) => `InvalidIdentifier: '${d.value}' is not a valid identifier${at(d)}`,
})

// ============================================================================
// Literal
// ============================================================================

export const ErrUnsupportedLiteralKind = FilterBoundary.define('UnsupportedLiteralKind', {
  customProps: ErrFacet.props<{ kind: string }>(),
  facets: [BadInput, HasPosition],
  message: (d) => `UnsupportedLiteralKind: literal kind ${d.kind} is not supported${at(d)}`,
})

export const ErrInvalidNumberLiteral = FilterBoundary.define('InvalidNumberLiteral', {
  customProps: ErrFacet.props<{ value: string }>(),
  facets: [BadInput, HasPosition],
  message: (d) => `InvalidNumberLiteral: '${d.value}' is not a valid number${at(d)}`,
})

export const ErrInvalidBooleanLiteral = FilterBoundary.define('InvalidBooleanLiteral', {
  customProps: ErrFacet.props<{ value: string }>(),
  facets: [BadInput, HasPosition],
  message: (d) => `InvalidBooleanLiteral: '${d.value}' is not a valid boolean${at(d)}`,
})

// ============================================================================
// List
// ============================================================================

export const ErrEmptyList = FilterBoundary.define('EmptyList', {
  facets: [BadInput, HasPosition],
  message: (d) => `EmptyList: list literal must contain at least one element${at(d)}`,
})

export const ErrHeterogeneousList = FilterBoundary.define('HeterogeneousList', {
  customProps: ErrFacet.props<{ index: number; expected: string; actual: string }>(),
  facets: [BadInput, HasPosition],
  message: (d) => `HeterogeneousList: element ${d.index} is a ${d.actual}, expected a ${d.expected}${at(d)}`,
})

export const ErrEmptyInList = FilterBoundary.define('EmptyInList', {
  facets: [BadInput, HasPosition],
  message: (d) => `EmptyInList: 'in' requires at least one value${at(d)}`,
})

// ============================================================================
// Shape
// ============================================================================

export const ErrComparisonLeftShape = FilterBoundary.define('ComparisonLeftShape', {
  customProps: ErrFacet.props<{ operator: string; nodeType: string }>(),
  facets: [BadInput, HasPosition],
  message: (d) =>
    `ComparisonLeftShape: left operand of '${d.operator}' must be an identifier or index access, got ${d.nodeType}${at(d)}`,
})

export const ErrIndexLeftShape = FilterBoundary.define('IndexLeftShape', {
  customProps: ErrFacet.props<{ nodeType: string }>(),
  facets: [BadInput, HasPosition],
  message: (d) => `IndexLeftShape: index base must be an identifier or index access, got ${d.nodeType}${at(d)}`,
})

export const ErrIndexNotScalar = FilterBoundary.define('IndexNotScalar', {
  customProps: ErrFacet.props<{ nodeType: string }>(),
  facets: [BadInput, HasPosition],
  message: (d) => `IndexNotScalar: index must be a number or string literal, got ${d.nodeType}${at(d)}`,
})

export const ErrLogicalOperandNotComputed = FilterBoundary.define('LogicalOperandNotComputed', {
  customProps: ErrFacet.props<{ operator: string; side: 'left' | 'right'; nodeType: string }>(),
  facets: [BadInput, HasPosition],
  message: (d) =>
    `LogicalOperandNotComputed: ${d.side} operand of '${d.operator}' must be a computed expression, got ${d.nodeType}${at(d)}`,
})

// ============================================================================
// Operator
// ============================================================================

export const ErrUnsupportedUnaryOperator = FilterBoundary.define('UnsupportedUnaryOperator', {
  customProps: ErrFacet.props<{ operator: string }>(),
  facets: [BadInput, HasPosition],
  message: (d) => `UnsupportedUnaryOperator: '${d.operator}' is not a unary operator${at(d)}`,
})

export const ErrUnsupportedBinaryOperator = FilterBoundary.define('UnsupportedBinaryOperator', {
  customProps: ErrFacet.props<{ operator: string }>(),
  facets: [BadInput, HasPosition],
  message: (d) => `UnsupportedBinaryOperator: '${d.operator}' is not a binary operator${at(d)}`,
})

export const ErrEqualityRightNotLiteral = FilterBoundary.define('EqualityRightNotLiteral', {
  customProps: ErrFacet.props<{ operator: string; nodeType: string }>(),
  facets: [BadInput, HasPosition],
  message: (d) => `EqualityRightNotLiteral: right operand of '${d.operator}' must be a literal, got ${d.nodeType}${at(d)}`,
})

export const ErrOrderingRightNotNumeric = FilterBoundary.define('OrderingRightNotNumeric', {
  customProps: ErrFacet.props<{ operator: string; nodeType: string }>(),
  facets: [BadInput, HasPosition],
  message: (d) =>
    `OrderingRightNotNumeric: right operand of '${d.operator}' must be a number literal, got ${d.nodeType}${at(d)}`,
})

export const ErrInRightNotList = FilterBoundary.define('InRightNotList', {
  customProps: ErrFacet.props<{ nodeType: string }>(),
  facets: [BadInput, HasPosition],
  message: (d) => `InRightNotList: right operand of 'in' must be a list literal, got ${d.nodeType}${at(d)}`,
})

export const ErrLikeRightNotString = FilterBoundary.define('LikeRightNotString', {
  customProps: ErrFacet.props<{ nodeType: string }>(),
  facets: [BadInput, HasPosition],
  message: (d) => `LikeRightNotString: right operand of 'like' must be a string literal, got ${d.nodeType}${at(d)}`,
})

// ============================================================================
// Translation
// ============================================================================

export const ErrNotANumber = FilterBoundary.define('NotANumber', {
  customProps: ErrFacet.props<{ value: string }>(),
  facets: [BadInput, HasPosition],
  message: (d) => `NotANumber: '${d.value}' is not a finite number${at(d)}`,
})

// ============================================================================
// Text and token model
// ============================================================================

/** The filter text could not be parsed. */
export const ErrParseFailed = FilterBoundary.define('ParseFailed', {
  customProps: ErrFacet.props<{ reason: string }>(),
  facets: [BadInput, HasExpression, HasPosition],
  message: (d) => `ParseFailed: ${d.reason}${at(d)}`,
})

/** A token-kind lookup received a value outside the closed kind set. */
export const ErrInvalidKind = FilterBoundary.define('InvalidKind', {
  customProps: ErrFacet.props<{ kind: string }>(),
  facets: [Invariant],
  message: (d) => `InvalidKind: '${d.kind}' is not a token kind`,
})

// ============================================================================
// Tags
// ============================================================================

const FILTER_ERROR_TAGS = [
  'NilExpression', 'UnsupportedExpression',
  'IdentTokenMismatch', 'InvalidIdentifier',
  'UnsupportedLiteralKind', 'InvalidNumberLiteral', 'InvalidBooleanLiteral',
  'EmptyList', 'HeterogeneousList', 'EmptyInList',
  'ComparisonLeftShape', 'IndexLeftShape', 'IndexNotScalar', 'LogicalOperandNotComputed',
  'UnsupportedUnaryOperator', 'UnsupportedBinaryOperator', 'EqualityRightNotLiteral',
  'OrderingRightNotNumeric', 'InRightNotList', 'LikeRightNotString',
  'NotANumber',
  'ParseFailed', 'InvalidKind',
] as const

export type FilterErrorTag = (typeof FILTER_ERROR_TAGS)[number]

const tagSet: ReadonlySet<string> = new Set(FILTER_ERROR_TAGS)

function isFilterErrorTag(tag: string): tag is FilterErrorTag {
  return tagSet.has(tag)
}

/** The tag of a filter error, or `undefined` for anything else */
export function filterErrorTag(err: unknown): FilterErrorTag | undefined {
  if (!FilterBoundary.is(err)) return undefined
  const tag = err.code.slice(FilterBoundary.domain.length + 1)
  return isFilterErrorTag(tag) ? tag : undefined
}
