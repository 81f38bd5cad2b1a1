import { describe, test, expect } from 'vitest'
import { Lexer, tokenize } from '../lexer.js'
import { Position, NoPosition } from '../position.js'
import type { Token } from '../token.js'

const kinds = (tokens: readonly Token[]) => tokens.map((t) => t.kind)
const literals = (tokens: readonly Token[]) => tokens.map((t) => t.literal)
const span = (t: Token) => `${Position.format(t.start)}-${Position.format(t.end)}`

describe('tokenize', () => {
  test('comparison with positions', () => {
    const tokens = tokenize('age >= 18')

    expect(kinds(tokens)).toEqual(['IDENT', 'GE', 'NUMBER', 'EOF'])
    expect(literals(tokens)).toEqual(['age', '>=', '18', ''])
    expect(tokens.map(span)).toEqual(['1:1-1:3', '1:5-1:6', '1:8-1:9', '0:0-1:10'])
  })

  test('no whitespace needed between tokens', () => {
    expect(literals(tokenize("a=='x'"))).toEqual(['a', '==', 'x', ''])
  })

  test('every operator and punctuation mark', () => {
    expect(kinds(tokenize('== != < <= > >= ( ) [ ] ,'))).toEqual([
      'EQ', 'NE', 'LT', 'LE', 'GT', 'GE', 'LPAREN', 'RPAREN', 'LBRACK', 'RBRACK', 'COMMA', 'EOF',
    ])
  })

  test('keywords are case-insensitive and canonicalised', () => {
    const tokens = tokenize('A AND b Or NOT c In d LIKE TRUE false')

    expect(kinds(tokens)).toEqual([
      'IDENT', 'AND', 'IDENT', 'OR', 'NOT', 'IDENT', 'IN', 'IDENT', 'LIKE', 'TRUE', 'FALSE', 'EOF',
    ])
    expect(literals(tokens)).toEqual(['A', 'and', 'b', 'or', 'not', 'c', 'in', 'd', 'like', 'true', 'false', ''])
  })

  test('unicode identifiers count code points', () => {
    const tokens = tokenize('größe > 1')

    expect(tokens[0].literal).toBe('größe')
    expect(span(tokens[0])).toBe('1:1-1:5')
    expect(span(tokens[1])).toBe('1:7-1:7')
  })

  test('strings with escapes', () => {
    const tokens = tokenize("name == 'O\\'Brien'")

    expect(tokens[2].kind).toBe('STRING')
    expect(tokens[2].literal).toBe("O'Brien")
    expect(span(tokens[2])).toBe('1:9-1:18')
    expect(tokens[3].end).toEqual(Position.of(1, 19))
  })

  test('escape sequences', () => {
    expect(tokenize("'a\\nb'")[0].literal).toBe('a\nb')
    expect(tokenize("'\\t\\r'")[0].literal).toBe('\t\r')
    expect(tokenize("'c:\\\\dir'")[0].literal).toBe('c:\\dir')
    expect(tokenize("'\\q'")[0].literal).toBe('q')
  })

  test('numbers are normalized and may be negative', () => {
    const tokens = tokenize('x in (-1, 2.50, 007)')

    expect(kinds(tokens)).toEqual(['IDENT', 'IN', 'LPAREN', 'NUMBER', 'COMMA', 'NUMBER', 'COMMA', 'NUMBER', 'RPAREN', 'EOF'])
    expect(literals(tokens).filter((_, i) => tokens[i].kind === 'NUMBER')).toEqual(['-1', '2.5', '7'])
  })

  test('newlines advance the line', () => {
    const tokens = tokenize('a == 1\nand b == 2')

    expect(span(tokens[3])).toBe('2:1-2:3')
    expect(span(tokens[4])).toBe('2:5-2:5')
    expect(tokens[tokens.length - 1].end).toEqual(Position.of(2, 11))
  })

  test('a lone = or ! is illegal', () => {
    const tokens = tokenize('a = 1 ! b')

    expect(kinds(tokens)).toEqual(['IDENT', 'ERROR', 'NUMBER', 'ERROR', 'IDENT', 'EOF'])
    expect(tokens[1]).toEqual({
      kind: 'ERROR',
      literal: "illegal character '=' at 1:3",
      start: Position.of(1, 3),
      end: NoPosition,
    })
    expect(tokens[3].literal).toBe("illegal character '!' at 1:7")
  })

  test('unterminated string runs to the end of input', () => {
    const tokens = tokenize("name == 'abc")

    expect(kinds(tokens)).toEqual(['IDENT', 'EQ', 'ERROR', 'EOF'])
    expect(tokens[2].literal).toBe('unterminated string literal')
    expect(tokens[2].start).toEqual(Position.of(1, 9))
    expect(tokens[3].end).toEqual(Position.of(1, 13))
  })

  test('empty and blank input', () => {
    expect(tokenize('')).toEqual([{ kind: 'EOF', literal: '', start: NoPosition, end: Position.of(1, 1) }])
    expect(tokenize('   ')[0].end).toEqual(Position.of(1, 4))
  })
})

describe('Lexer', () => {
  test('scan returns tokens in order, then EOF repeatedly', () => {
    const lexer = new Lexer('a < 2')

    expect(lexer.scan().kind).toBe('IDENT')
    expect(lexer.scan().kind).toBe('LT')
    expect(lexer.scan().kind).toBe('NUMBER')
    expect(lexer.scan().kind).toBe('EOF')
    expect(lexer.scan().kind).toBe('EOF')
  })

  test('reset rewinds', () => {
    const lexer = new Lexer('x')
    lexer.scan()
    lexer.reset()

    expect(lexer.scan().literal).toBe('x')
    expect(lexer.tokens()).toHaveLength(2)
  })
})

describe('tokenize on long input', () => {
  test('scales linearly with the length of the input', () => {
    const terms = Array.from({ length: 2000 }, (_, i) => `a${i} == ${i}`)
    const source = terms.join(' and ')

    const started = performance.now()
    const tokens = tokenize(source)
    const elapsed = performance.now() - started

    expect(tokens).toHaveLength(2000 * 3 + 1999 + 1)
    expect(tokens[tokens.length - 2]).toEqual({
      kind: 'NUMBER',
      literal: '1999',
      start: Position.of(1, source.length - 3),
      end: Position.of(1, source.length),
    })
    expect(elapsed).toBeLessThan(3000)
  })

  test('a number stops before a dot with no digits after it', () => {
    expect(kinds(tokenize('1. x'))).toEqual(['NUMBER', 'ERROR', 'IDENT', 'EOF'])
    expect(literals(tokenize('-x'))).toEqual(["illegal character '-' at 1:1", 'x', ''])
  })
})
