import { analyze, type Expr } from '@sift/filter'
import { FilterConverter } from './converter.js'
import type { Filter } from './types.js'

/**
 * Analyze a tree, then lower it into a backend Filter.
 *
 * @throws the analyzer's first violation, or the converter's
 */
export function toFilter(expr: Expr | null | undefined): Filter {
  analyze(expr)
  const converter = FilterConverter.convert(expr)
  if (converter.error) throw converter.error
  return converter.filter
}
