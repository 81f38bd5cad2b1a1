/**
 * Entry points: text → AST → accepted AST → canonical text.
 */

import type { Expr } from './ast.js'
import { Analyzer } from './analyzer.js'
import { ErrNilExpression } from './errors.js'
import { parse } from './parser.js'
import { SqlLikePrinter } from './sql-like-printer.js'
import { walk } from './walk.js'

export { parse }

/**
 * Check a tree against the semantic rules.
 *
 * @throws the first violation found (a `filter.*` SiftError)
 */
export function analyze(expr: Expr | null | undefined): void {
  const err = Analyzer.check(expr)
  if (err) throw err
}

/** Parse and analyze in one step */
export function parseAndAnalyze(source: string): Expr {
  const expr = parse(source)
  analyze(expr)
  return expr
}

/** Canonical filter text for a tree */
export function format(expr: Expr | null | undefined): string {
  if (expr == null) throw ErrNilExpression.create({})
  const printer = new SqlLikePrinter()
  walk(printer, expr)
  if (printer.error) throw printer.error
  return printer.output
}
