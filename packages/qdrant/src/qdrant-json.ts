/**
 * Qdrant REST filter shape.
 *
 * Field names follow the points API: `must_not`, `match.value`,
 * `match.any`, `match.text`. Empty clause groups are left out.
 */

import type { Condition, FieldCondition, Filter, Match, Range } from './types.js'

export type QdrantMatch =
  | { value: string | number | boolean }
  | { any: string[] | number[] }
  | { text: string }

export type QdrantFieldCondition =
  | { key: string; match: QdrantMatch }
  | { key: string; range: Range }

export type QdrantCondition = QdrantFieldCondition | QdrantFilter

export interface QdrantFilter {
  must?: QdrantCondition[]
  should?: QdrantCondition[]
  must_not?: QdrantCondition[]
}

export function toQdrantJson(filter: Filter): QdrantFilter {
  const out: QdrantFilter = {}
  if (filter.must.length > 0) out.must = filter.must.map(conditionJson)
  if (filter.should.length > 0) out.should = filter.should.map(conditionJson)
  if (filter.mustNot.length > 0) out.must_not = filter.mustNot.map(conditionJson)
  return out
}

function conditionJson(condition: Condition): QdrantCondition {
  return condition.type === 'filter' ? toQdrantJson(condition.filter) : fieldJson(condition.field)
}

function fieldJson(field: FieldCondition): QdrantFieldCondition {
  if ('match' in field) return { key: field.key, match: matchJson(field.match) }
  return { key: field.key, range: { ...field.range } }
}

function matchJson(match: Match): QdrantMatch {
  switch (match.kind) {
    case 'keyword':
      return { value: match.keyword }
    case 'integer':
      return { value: match.integer }
    case 'boolean':
      return { value: match.boolean }
    case 'keywords':
      return { any: [...match.keywords] }
    case 'integers':
      return { any: [...match.integers] }
    case 'text':
      return { text: match.text }
  }
}
