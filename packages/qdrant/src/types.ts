/**
 * Backend filter model.
 *
 * A Filter holds three ordered clause groups. Each entry is a Condition:
 * either a field condition (a dotted key with a match or a range) or a
 * nested Filter. Integers are JS numbers holding integral values.
 */

import { StaticTypeCompanion } from '@sift/core'

// ============================================================================
// Match / Range
// ============================================================================

export type Match =
  | { readonly kind: 'keyword'; readonly keyword: string }
  | { readonly kind: 'integer'; readonly integer: number }
  | { readonly kind: 'boolean'; readonly boolean: boolean }
  | { readonly kind: 'keywords'; readonly keywords: readonly string[] }
  | { readonly kind: 'integers'; readonly integers: readonly number[] }
  | { readonly kind: 'text'; readonly text: string }

export type MatchKind = Match['kind']

export const Match = StaticTypeCompanion({
  keyword(keyword: string): Match {
    return { kind: 'keyword', keyword }
  },

  /** Narrows toward zero */
  integer(value: number): Match {
    return { kind: 'integer', integer: Math.trunc(value) }
  },

  boolean(value: boolean): Match {
    return { kind: 'boolean', boolean: value }
  },

  keywords(keywords: readonly string[]): Match {
    return { kind: 'keywords', keywords: [...keywords] }
  },

  /** Each value narrows toward zero */
  integers(values: readonly number[]): Match {
    return { kind: 'integers', integers: values.map((v) => Math.trunc(v)) }
  },

  text(text: string): Match {
    return { kind: 'text', text }
  },
})

/** Numeric bounds; unset bounds are absent */
export interface Range {
  readonly lt?: number
  readonly lte?: number
  readonly gt?: number
  readonly gte?: number
}

// ============================================================================
// Conditions
// ============================================================================

export type FieldCondition =
  | { readonly key: string; readonly match: Match }
  | { readonly key: string; readonly range: Range }

export type Condition =
  | { readonly type: 'field'; readonly field: FieldCondition }
  | { readonly type: 'filter'; readonly filter: Filter }

export const Condition = StaticTypeCompanion({
  match(key: string, match: Match): Condition {
    return { type: 'field', field: { key, match } }
  },

  range(key: string, range: Range): Condition {
    return { type: 'field', field: { key, range } }
  },

  nested(filter: Filter): Condition {
    return { type: 'filter', filter }
  },

  /** The field condition, or `undefined` for a nested filter */
  field(condition: Condition): FieldCondition | undefined {
    return condition.type === 'field' ? condition.field : undefined
  },

  /** The nested filter, or `undefined` for a field condition */
  filter(condition: Condition): Filter | undefined {
    return condition.type === 'filter' ? condition.filter : undefined
  },
})

// ============================================================================
// Filter
// ============================================================================

export interface Filter {
  readonly must: Condition[]
  readonly should: Condition[]
  readonly mustNot: Condition[]
}

export type ClauseGroup = keyof Filter

export const Filter = StaticTypeCompanion({
  groups: ['must', 'should', 'mustNot'] as const satisfies readonly ClauseGroup[],

  empty(): Filter {
    return { must: [], should: [], mustNot: [] }
  },

  of(groups: Partial<Record<ClauseGroup, readonly Condition[]>>): Filter {
    return {
      must: [...(groups.must ?? [])],
      should: [...(groups.should ?? [])],
      mustNot: [...(groups.mustNot ?? [])],
    }
  },

  isEmpty(filter: Filter): boolean {
    return filter.must.length === 0 && filter.should.length === 0 && filter.mustNot.length === 0
  },
})
