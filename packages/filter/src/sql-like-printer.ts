/**
 * Renders a tree back to filter text.
 *
 * Output is canonical: single spaces around binary operators, no spaces in
 * lists, lower-case keywords, `not (...)` always parenthesised, and other
 * parentheses only where precedence needs them or the tree has a ParenExpr.
 */

import { SiftError } from '@sift/core'
import { Expr, Literal, nodeTypeOf, operatorText } from './ast.js'
import { ErrUnsupportedExpression } from './errors.js'
import type { Visitor } from './walk.js'

export class SqlLikePrinter implements Visitor {
  private parts: string[] = []
  private err: SiftError | undefined

  get error(): SiftError | undefined {
    return this.err
  }

  /** Everything printed so far */
  get output(): string {
    return this.parts.join('')
  }

  /** Renders the whole node itself, so children are never walked separately */
  visit(expr: Expr): Visitor | undefined {
    if (this.err) return undefined
    try {
      this.parts.push(render(expr))
    } catch (e) {
      if (!SiftError.isSiftError(e)) throw e
      this.err = e
    }
    return undefined
  }
}

function render(expr: Expr): string {
  switch (expr.type) {
    case 'ident':
      return expr.value
    case 'literal':
      return Literal.isString(expr) ? `'${expr.value}'` : expr.value
    case 'list':
      return `(${expr.values.map(render).join(',')})`
    case 'index':
      return `${render(expr.left)}[${render(expr.index)}]`
    case 'paren':
      return `(${render(expr.inner)})`
    case 'unary': {
      const operand = expr.right.type === 'paren' ? render(expr.right) : `(${render(expr.right)})`
      return `${operatorText(expr.op)} ${operand}`
    }
    case 'binary': {
      const left = Expr.isLeftLower(expr) ? `(${render(expr.left)})` : render(expr.left)
      const right = Expr.isRightLower(expr) ? `(${render(expr.right)})` : render(expr.right)
      return `${left} ${operatorText(expr.op)} ${right}`
    }
    default:
      throw ErrUnsupportedExpression.create({ nodeType: nodeTypeOf(expr) })
  }
}
