/**
 * Fluent construction of filter trees.
 *
 * @example
 * ```ts
 * const where = new FilterBuilder()
 *   .eq('status', 'active')
 *   .or((b) => b.gte('age', 18).eq('verified', true))
 *   .build()
 * format(where) // "status == 'active' or age >= 18 and verified == true"
 * ```
 *
 * Each comparison is conjoined onto what was built so far. `and`, `or` and
 * `not` take a callback that fills a fresh builder; a callback that adds
 * nothing contributes nothing. Every comparison is analyzed as it is added,
 * and the first error latches: later calls do nothing and `build()` throws it.
 */

import { SiftError } from '@sift/core'
import type { ComputedExpr, ListLiteral, Literal } from './ast.js'
import { Analyzer } from './analyzer.js'
import {
  and,
  eq,
  ge,
  gt,
  inList,
  le,
  like,
  lt,
  ne,
  not,
  or,
  type FieldOperand,
  type Numeric,
  type Scalar,
} from './builders.js'

type Join = (left: ComputedExpr, right: ComputedExpr) => ComputedExpr

export class FilterBuilder {
  private root: ComputedExpr | undefined
  private err: SiftError | undefined

  /** The first error raised while building, if any */
  get error(): SiftError | undefined {
    return this.err
  }

  // -- Comparisons -------------------------------------------------------------

  eq(left: FieldOperand, right: Scalar | Literal): this {
    return this.add(() => eq(left, right))
  }

  ne(left: FieldOperand, right: Scalar | Literal): this {
    return this.add(() => ne(left, right))
  }

  lt(left: FieldOperand, right: Numeric | Literal): this {
    return this.add(() => lt(left, right))
  }

  lte(left: FieldOperand, right: Numeric | Literal): this {
    return this.add(() => le(left, right))
  }

  gt(left: FieldOperand, right: Numeric | Literal): this {
    return this.add(() => gt(left, right))
  }

  gte(left: FieldOperand, right: Numeric | Literal): this {
    return this.add(() => ge(left, right))
  }

  in(left: FieldOperand, values: ListLiteral | readonly (Scalar | Literal)[]): this {
    return this.add(() => inList(left, values))
  }

  like(left: FieldOperand, pattern: string | Literal): this {
    return this.add(() => like(left, pattern))
  }

  // -- Nesting -----------------------------------------------------------------

  /** Conjoin the tree built by `fn` */
  and(fn: (b: FilterBuilder) => void): this {
    return this.nest(fn, (sub) => sub, and)
  }

  /** Disjoin the tree built by `fn` */
  or(fn: (b: FilterBuilder) => void): this {
    return this.nest(fn, (sub) => sub, or)
  }

  /** Conjoin the negation of the tree built by `fn` */
  not(fn: (b: FilterBuilder) => void): this {
    return this.nest(fn, not, and)
  }

  /**
   * The built tree, or `undefined` when nothing was added.
   *
   * @throws the first error raised while building
   */
  build(): ComputedExpr | undefined {
    if (this.err) throw this.err
    return this.root
  }

  // -- Internals ---------------------------------------------------------------

  private add(make: () => ComputedExpr): this {
    if (this.err) return this
    try {
      const expr = make()
      const err = Analyzer.check(expr)
      if (err) this.err = err
      else this.attach(expr, and)
    } catch (e) {
      if (!SiftError.isSiftError(e)) throw e
      this.err = e
    }
    return this
  }

  private nest(fn: (b: FilterBuilder) => void, wrap: (sub: ComputedExpr) => ComputedExpr, join: Join): this {
    if (this.err) return this
    const sub = new FilterBuilder()
    fn(sub)
    if (sub.err) {
      this.err = sub.err
    } else if (sub.root !== undefined) {
      this.attach(wrap(sub.root), join)
    }
    return this
  }

  private attach(expr: ComputedExpr, join: Join): void {
    this.root = this.root === undefined ? expr : join(this.root, expr)
  }
}
