/**
 * Depth-first traversal.
 *
 * `walk` calls `visitor.visit(node)`. When that returns a visitor, the node's
 * children are walked with it; `undefined` skips the subtree.
 */

import type { Expr } from './ast.js'

export interface Visitor {
  visit(expr: Expr): Visitor | undefined
}

/** Structural children in traversal order */
export function children(expr: Expr): readonly Expr[] {
  switch (expr.type) {
    case 'ident':
    case 'literal':
      return []
    case 'list':
      return expr.values
    case 'unary':
      return [expr.right]
    case 'binary':
      return [expr.left, expr.right]
    case 'index':
      return [expr.left, expr.index]
    case 'paren':
      return [expr.inner]
  }
}

export function walk(visitor: Visitor, expr: Expr): void {
  const next = visitor.visit(expr)
  if (!next) return
  for (const child of children(expr)) {
    walk(next, child)
  }
}
