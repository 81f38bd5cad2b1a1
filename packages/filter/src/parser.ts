/**
 * Pratt parser for filter text.
 *
 * Grammar:
 *   expr    := prefix (binop expr)*        binop binds while its precedence beats the caller's
 *   prefix  := access | literal | 'not' expr | '(' group ')'
 *   access  := IDENT ('[' (NUMBER | STRING) ']')*
 *   group   := literal (',' literal)*      a list literal
 *            | expr                        must be computed: a comparison, a logical or a 'not'
 *
 * Binary operators are left-associative. Precedence (low to high):
 *   or < and < not < (== !=) < (< <= > >=) < (in like)
 */

import { Expr, type ComputedExpr, type Literal } from './ast.js'
import { ErrParseFailed } from './errors.js'
import { Kind } from './kind.js'
import { tokenize } from './lexer.js'
import { NoPosition, type Position } from './position.js'
import { Token } from './token.js'

const LITERAL_KINDS: ReadonlySet<Kind> = new Set<Kind>(['STRING', 'NUMBER', 'TRUE', 'FALSE'])

class Parser {
  private tokens: readonly Token[]
  private pos: number = 0

  constructor(private source: string) {
    this.tokens = tokenize(source)
  }

  parse(): Expr {
    const first = this.peek()
    if (first.kind === 'EOF') {
      this.fail('empty filter expression', first.end)
    }

    const expr = this.parseExpr(0)

    const rest = this.peek()
    if (rest.kind !== 'EOF') {
      this.unexpected(rest)
    }

    return expr
  }

  // -- Token stream ------------------------------------------------------------

  private peek(offset: number = 0): Token {
    const last = this.tokens[this.tokens.length - 1] ?? Token.ofEOF(NoPosition)
    return this.tokens[this.pos + offset] ?? last
  }

  private advance(): Token {
    const token = this.peek()
    if (this.pos < this.tokens.length - 1) this.pos++
    return token
  }

  private expect(kind: Kind): Token {
    const token = this.peek()
    if (token.kind !== kind) {
      this.unexpected(token, `'${Kind.literal(kind)}'`)
    }
    return this.advance()
  }

  private fail(reason: string, position: Position): never {
    throw ErrParseFailed.create({ expression: this.source, reason, position })
  }

  private unexpected(token: Token, expected?: string): never {
    switch (token.kind) {
      case 'ERROR':
        return this.fail(token.literal.replace(/ at \d+:\d+$/, ''), token.start)
      case 'EOF':
        return this.fail(expected ? `expected ${expected}, found end of input` : 'unexpected end of input', token.end)
      default:
        return this.fail(
          expected ? `expected ${expected}, found '${token.literal}'` : `unexpected '${token.literal}'`,
          token.start,
        )
    }
  }

  // -- Expressions -------------------------------------------------------------

  private parseExpr(minPrecedence: number): Expr {
    let left = this.parsePrefix()

    for (;;) {
      const op = this.peek()
      if (!Kind.isBinaryOperator(op.kind)) break
      const precedence = Kind.precedence(op.kind)
      if (precedence <= minPrecedence) break
      this.advance()
      const right = this.parseExpr(precedence)
      left = Expr.binary(left, op, right)
    }

    return left
  }

  private parsePrefix(): Expr {
    const token = this.peek()
    switch (token.kind) {
      case 'IDENT':
        this.advance()
        return this.parseAccess(Expr.ident(token))
      case 'STRING':
      case 'NUMBER':
      case 'TRUE':
      case 'FALSE':
        this.advance()
        return Expr.literal(token)
      case 'NOT': {
        this.advance()
        const operand = this.parseExpr(Kind.precedence('NOT'))
        return Expr.unary(token, this.computed(operand, `'not' needs a comparison or a logical expression`))
      }
      case 'LPAREN':
        this.advance()
        return this.parseGroup(token)
      default:
        return this.unexpected(token)
    }
  }

  private parseAccess(base: Expr): Expr {
    let left = base
    while (this.peek().kind === 'LBRACK') {
      const lbrack = this.advance()
      const key = this.peek()
      if (key.kind !== 'NUMBER' && key.kind !== 'STRING') {
        if (key.kind === 'ERROR' || key.kind === 'EOF') this.unexpected(key)
        this.fail(`index must be a number or string literal, found '${key.literal}'`, key.start)
      }
      this.advance()
      const rbrack = this.expect('RBRACK')
      left = Expr.index(left, lbrack, Expr.literal(key), rbrack)
    }
    return left
  }

  private parseGroup(lparen: Token): Expr {
    const first = this.peek()
    if (first.kind === 'RPAREN') {
      this.fail('empty parentheses', first.start)
    }

    const next = this.peek(1).kind
    if (LITERAL_KINDS.has(first.kind) && (next === 'COMMA' || next === 'RPAREN')) {
      return this.parseList(lparen)
    }

    const inner = this.computed(this.parseExpr(0), 'parentheses must enclose a comparison or a logical expression')
    const rparen = this.expect('RPAREN')
    return Expr.paren(lparen, inner, rparen)
  }

  private parseList(lparen: Token): Expr {
    const values: Literal[] = []
    for (;;) {
      const token = this.peek()
      if (!LITERAL_KINDS.has(token.kind)) {
        if (token.kind === 'RPAREN' && values.length > 0) this.fail('trailing comma in list', token.start)
        this.unexpected(token, 'a literal')
      }
      values.push(Expr.literal(this.advance()))
      if (this.peek().kind !== 'COMMA') break
      this.advance()
    }
    const rparen = this.expect('RPAREN')
    return Expr.list(lparen, values, rparen)
  }

  private computed(expr: Expr, reason: string): ComputedExpr {
    if (!Expr.isComputed(expr)) {
      this.fail(reason, Expr.start(expr))
    }
    return expr
  }
}

/**
 * Parse filter text into an AST.
 *
 * @throws ErrParseFailed on malformed input
 */
export function parse(source: string): Expr {
  return new Parser(source).parse()
}
