import { describe, test, expect } from 'vitest'
import { parse } from '../parser.js'
import { Expr } from '../ast.js'
import { parseAndAnalyze } from '../facade.js'
import { ErrOrderingRightNotNumeric, ErrParseFailed } from '../errors.js'
import { Position } from '../position.js'

/** Compact tree rendering: operators prefix, parens as {}, lists as [] */
function sexpr(e: Expr): string {
  switch (e.type) {
    case 'ident':
      return e.value
    case 'literal':
      return e.token.kind === 'STRING' ? `'${e.value}'` : e.value
    case 'list':
      return `[${e.values.map(sexpr).join(' ')}]`
    case 'unary':
      return `(${e.op.literal} ${sexpr(e.right)})`
    case 'binary':
      return `(${e.op.literal} ${sexpr(e.left)} ${sexpr(e.right)})`
    case 'index':
      return `${sexpr(e.left)}[${sexpr(e.index)}]`
    case 'paren':
      return `{${sexpr(e.inner)}}`
  }
}

function parseError(source: string): string {
  try {
    parse(source)
  } catch (e) {
    if (ErrParseFailed.is(e)) return e.message
    throw e
  }
  throw new Error(`expected '${source}' to fail`)
}

describe('parse: precedence', () => {
  test('and binds tighter than or', () => {
    expect(sexpr(parse('a == 1 and b == 2 or c == 3'))).toBe('(or (and (== a 1) (== b 2)) (== c 3))')
    expect(sexpr(parse('a == 1 or b == 2 and c == 3'))).toBe('(or (== a 1) (and (== b 2) (== c 3)))')
  })

  test('operators are left-associative', () => {
    expect(sexpr(parse('a == 1 and b == 2 and c == 3'))).toBe('(and (and (== a 1) (== b 2)) (== c 3))')
  })

  test('not takes the comparison, not the conjunction', () => {
    expect(sexpr(parse('not a == 1 and b == 2'))).toBe('(and (not (== a 1)) (== b 2))')
    expect(sexpr(parse('NOT (a == 1 OR b == 2)'))).toBe('(not {(or (== a 1) (== b 2))})')
  })

  test('parentheses override precedence', () => {
    expect(sexpr(parse('(a == 1 or b == 2) and c == 3'))).toBe('(and {(or (== a 1) (== b 2))} (== c 3))')
  })
})

describe('parse: operands', () => {
  test('ordering against a negative decimal', () => {
    expect(sexpr(parse('age >= -5.50'))).toBe('(>= age -5.5)')
  })

  test('index chains', () => {
    expect(sexpr(parse("user['profile'][0] == 'x'"))).toBe("(== user['profile'][0] 'x')")
  })

  test('list literals', () => {
    expect(sexpr(parse("status IN ('a','b')"))).toBe("(in status ['a' 'b'])")
    expect(sexpr(parse('x in (1)'))).toBe('(in x [1])')
  })

  test('mixed lists parse; analysis rejects them', () => {
    expect(sexpr(parse("x in (1, 'a')"))).toBe("(in x [1 'a'])")
  })

  test('like and booleans', () => {
    expect(sexpr(parse("name like 'J%'"))).toBe("(like name 'J%')")
    expect(sexpr(parse('verified == TRUE'))).toBe('(== verified true)')
  })
})

describe('parse: positions', () => {
  test('binary spans first to last leaf', () => {
    const expr = parse("age >= 18 and x == 'y'")

    expect(Expr.start(expr)).toEqual(Position.of(1, 1))
    expect(Expr.end(expr)).toEqual(Position.of(1, 22))
  })

  test('paren and unary spans include their tokens', () => {
    expect(Expr.end(parse('(a == 1)'))).toEqual(Position.of(1, 8))

    const negated = parse('not (a == 1)')
    expect(Expr.start(negated)).toEqual(Position.of(1, 1))
    expect(Expr.end(negated)).toEqual(Position.of(1, 12))
  })

  test('index span ends at the closing bracket', () => {
    const expr = parse('tags[0] == 1')
    if (expr.type !== 'binary') throw new Error('expected a binary expression')

    expect(Expr.start(expr.left)).toEqual(Position.of(1, 1))
    expect(Expr.end(expr.left)).toEqual(Position.of(1, 7))
  })

  test('start never follows end', () => {
    for (const source of ["a == 'x'", 'not (b > 2 or c < 1)', "d['e'][1] in (1,2)"]) {
      const expr = parse(source)
      expect(Position.compare(Expr.start(expr), Expr.end(expr))).toBeLessThan(0)
    }
  })
})

describe('parse: errors', () => {
  test('empty input', () => {
    expect(parseError('')).toBe('ParseFailed: empty filter expression at 1:1')
  })

  test('missing operand', () => {
    expect(parseError('a ==')).toBe('ParseFailed: unexpected end of input at 1:5')
  })

  test('illegal characters surface from the lexer', () => {
    expect(parseError('a = 1')).toBe("ParseFailed: illegal character '=' at 1:3")
  })

  test('unterminated string', () => {
    expect(parseError("name == 'abc")).toBe('ParseFailed: unterminated string literal at 1:9')
  })

  test('empty parentheses and trailing commas', () => {
    expect(parseError('()')).toBe('ParseFailed: empty parentheses at 1:2')
    expect(parseError('x in (1, 2,)')).toBe('ParseFailed: trailing comma in list at 1:12')
  })

  test('parentheses around an atom', () => {
    expect(parseError('(a)')).toBe('ParseFailed: parentheses must enclose a comparison or a logical expression at 1:2')
  })

  test('not needs a computed operand', () => {
    expect(parseError('not a')).toBe("ParseFailed: 'not' needs a comparison or a logical expression at 1:5")
  })

  test('boolean index', () => {
    expect(parseError('a[true] == 1')).toBe("ParseFailed: index must be a number or string literal, found 'true' at 1:3")
  })

  test('leftover input', () => {
    expect(parseError('a == 1 b')).toBe("ParseFailed: unexpected 'b' at 1:8")
  })

  test('unclosed parenthesis', () => {
    expect(parseError('(a == 1')).toBe("ParseFailed: expected ')', found end of input at 1:8")
  })

  test('error data carries the expression and position', () => {
    try {
      parse('a ==')
      throw new Error('expected a throw')
    } catch (e) {
      if (!ErrParseFailed.is(e)) throw e
      expect(e.data.expression).toBe('a ==')
      expect(e.data.position).toEqual(Position.of(1, 5))
      expect(e.code).toBe('filter.ParseFailed')
    }
  })
})

describe('parseAndAnalyze', () => {
  test('accepts a well-formed filter', () => {
    const expr = parseAndAnalyze("user_type == 'individual' and (age >= 18 or verified == true)")
    expect(sexpr(expr)).toBe("(and (== user_type 'individual') {(or (>= age 18) (== verified true))})")
  })

  test('reports semantic errors with positions', () => {
    try {
      parseAndAnalyze("age > 'x'")
      throw new Error('expected a throw')
    } catch (e) {
      if (!ErrOrderingRightNotNumeric.is(e)) throw e
      expect(e.message).toBe("OrderingRightNotNumeric: right operand of '>' must be a number literal, got string literal at 1:7")
    }
  })
})
