/**
 * Printers for translated filters.
 *
 * The text form is an indented clause tree, one condition per line:
 *
 *   must:
 *     age > 18
 *     filter:
 *       should:
 *         status == 'active'
 *         status == 'pending'
 */

import { Fmt, Printer } from '@sift/core'
import { formatNumber } from '@sift/filter'
import { Filter, toQdrantJson, type ClauseGroup, type Condition, type FieldCondition, type Match, type Range } from '@sift/qdrant'

const GROUP_NAMES: Record<ClauseGroup, string> = {
  must: 'must',
  should: 'should',
  mustNot: 'must_not',
}

const RANGE_OPERATORS: [keyof Range, string][] = [
  ['gt', '>'],
  ['gte', '>='],
  ['lt', '<'],
  ['lte', '<='],
]

function quote(text: string): string {
  return `'${text}'`
}

function matchText(match: Match): string {
  switch (match.kind) {
    case 'keyword':  return `== ${quote(match.keyword)}`
    case 'integer':  return `== ${formatNumber(match.integer)}`
    case 'boolean':  return `== ${match.boolean}`
    case 'keywords': return `in (${match.keywords.map(quote).join(',')})`
    case 'integers': return `in (${match.integers.map(formatNumber).join(',')})`
    case 'text':     return `like ${quote(match.text)}`
  }
}

function fieldText(field: FieldCondition, fmt: Fmt): string {
  const key = fmt.bold(field.key)
  if ('match' in field) return `${key} ${matchText(field.match)}`
  const bounds = RANGE_OPERATORS.flatMap(([bound, op]) => {
    const value = field.range[bound]
    return value === undefined ? [] : [`${key} ${op} ${formatNumber(value)}`]
  })
  return bounds.join(fmt.dim(' and '))
}

function filterLines(filter: Filter, fmt: Fmt, indent: string): string[] {
  const lines: string[] = []
  for (const group of Filter.groups) {
    const conditions = filter[group]
    if (conditions.length === 0) continue
    lines.push(`${indent}${fmt.cyan(`${GROUP_NAMES[group]}:`)}`)
    for (const condition of conditions) {
      lines.push(...conditionLines(condition, fmt, `${indent}  `))
    }
  }
  return lines
}

function conditionLines(condition: Condition, fmt: Fmt, indent: string): string[] {
  if (condition.type === 'field') return [`${indent}${fieldText(condition.field, fmt)}`]
  return [`${indent}${fmt.magenta('filter:')}`, ...filterLines(condition.filter, fmt, `${indent}  `)]
}

export const FilterTextPrinter = Printer.define<Filter>((filter, fmt) => {
  if (Filter.isEmpty(filter)) return fmt.dim('(empty filter)')
  return Printer.lines(filterLines(filter, fmt, ''))
})

/** Qdrant REST JSON, two-space indented */
export const FilterJsonPrinter = Printer.define<Filter>((filter) => JSON.stringify(toQdrantJson(filter), null, 2))
