/**
 * @sift/qdrant: lowers filter expressions into Qdrant payload filters.
 *
 * @example
 * ```ts
 * import { parse } from '@sift/filter'
 * import { toFilter, toQdrantJson } from '@sift/qdrant'
 *
 * toQdrantJson(toFilter(parse("status == 'active' and age > 18")))
 * // { must: [ { key: 'status', match: { value: 'active' } }, { key: 'age', range: { gt: 18 } } ] }
 * ```
 */

export { Match, Condition, Filter } from './types.js'
export type { MatchKind, Range, FieldCondition, ClauseGroup } from './types.js'
export { FilterConverter } from './converter.js'
export type { Scalar, FieldValue } from './converter.js'
export { toFilter } from './to-filter.js'
export { toQdrantJson } from './qdrant-json.js'
export type { QdrantFilter, QdrantCondition, QdrantFieldCondition, QdrantMatch } from './qdrant-json.js'
