/**
 * Arcsecond lexer for filter text.
 *
 * Lexemes:
 *   string     := "'" (escape | [^'\\])* "'"      escapes: \n \t \r, anything else stands for itself
 *   number     := '-'? digit+ ('.' digit+)?
 *   word       := letter (letter | digit | '_')*   keywords are case-insensitive
 *   operator   := '==' | '!=' | '<=' | '>=' | '<' | '>'
 *   punctuation:= '(' | ')' | '[' | ']' | ','
 *
 * Lexing never fails: an unterminated string or a character that starts no
 * lexeme becomes an ERROR token and scanning carries on.
 */

import {
  anyChar,
  anyCharExcept,
  anyOfString,
  char,
  choice,
  coroutine,
  digit,
  fail,
  many,
  many1,
  possibly,
  str,
  succeedWith,
  type Parser,
} from 'arcsecond'

import { Inspect } from '@sift/core'
import { ErrParseFailed } from './errors.js'
import { Kind } from './kind.js'
import { NoPosition, Position } from './position.js'
import { Token } from './token.js'

// ============================================================================
// Characters
// ============================================================================

// Every lexeme is assembled from single-character parsers, so scanning stays
// linear in the length of the input.

/** One code point matching `pattern` */
function charMatching(pattern: RegExp, expected: string): Parser<string> {
  return anyChar.chain((c) => (c !== undefined && pattern.test(c) ? succeedWith(c) : fail(`expected ${expected}`)))
}

const letter = charMatching(/^\p{L}$/u, 'a letter')
const wordChar = charMatching(/^[\p{L}\p{Nd}_]$/u, 'a letter, digit or underscore')
const space = charMatching(/^\s$/u, 'whitespace')

const whitespace: Parser<string> = many(space).map((cs) => cs.join(''))

// ============================================================================
// Lexemes
// ============================================================================

/** Matched source text plus how to turn it into a token once positioned */
interface Draft {
  readonly text: string
  build(start: Position, end: Position): Token
}

interface Piece {
  readonly raw: string
  readonly value: string
}

const ESCAPES: Readonly<Record<string, string>> = { n: '\n', t: '\t', r: '\r' }

const escape: Parser<Piece> = coroutine((run) => {
  run(char('\\'))
  const c: string = run(anyChar)
  return { raw: `\\${c}`, value: ESCAPES[c] ?? c }
})

const plainChar: Parser<Piece> = anyCharExcept(anyOfString("'\\")).map((raw) => ({ raw, value: raw }))

const stringBody: Parser<Piece[]> = many(choice([escape, plainChar]))

const terminatedString: Parser<Draft> = coroutine((run) => {
  run(char("'"))
  const pieces: Piece[] = run(stringBody)
  run(char("'"))
  const value = pieces.map((p) => p.value).join('')
  return {
    text: `'${pieces.map((p) => p.raw).join('')}'`,
    build: (start, end) => Token.of('STRING', value, start, end),
  }
})

const unterminatedString: Parser<Draft> = coroutine((run) => {
  run(char("'"))
  const rest: string[] = run(many(anyChar))
  return {
    text: `'${rest.join('')}`,
    build: (start) => Token.ofError('unterminated string literal', start),
  }
})

const fraction: Parser<string> = coroutine((run) => {
  run(char('.'))
  const digits: string[] = run(many1(digit))
  return `.${digits.join('')}`
})

const number: Parser<Draft> = coroutine((run) => {
  const sign: string | null = run(possibly(char('-')))
  const whole: string[] = run(many1(digit))
  const frac: string | null = run(possibly(fraction))
  const text = `${sign ?? ''}${whole.join('')}${frac ?? ''}`
  return {
    text,
    build: (start, end) => Token.ofLiteral('NUMBER', text, start, end),
  }
})

const word: Parser<Draft> = coroutine((run) => {
  const first: string = run(letter)
  const rest: string[] = run(many(wordChar))
  const text = first + rest.join('')
  return {
    text,
    build: (start, end) => {
      const kind = Kind.of(text)
      return kind === 'IDENT' ? Token.ofIdent(text, start, end) : Token.ofKind(kind, start, end)
    },
  }
})

/** Longest first so `<=` is not read as `<` then `=` */
const SYMBOLS: readonly (readonly [string, Kind])[] = [
  ['==', 'EQ'],
  ['!=', 'NE'],
  ['<=', 'LE'],
  ['>=', 'GE'],
  ['<', 'LT'],
  ['>', 'GT'],
  ['(', 'LPAREN'],
  [')', 'RPAREN'],
  ['[', 'LBRACK'],
  [']', 'RBRACK'],
  [',', 'COMMA'],
]

const symbol: Parser<Draft> = choice(
  SYMBOLS.map(([text, kind]): Parser<Draft> =>
    str(text).map(() => ({ text, build: (start, end) => Token.ofKind(kind, start, end) })),
  ),
)

const illegal: Parser<Draft> = anyChar.map((text) => ({
  text,
  build: (start) => Token.ofIllegal(text, start),
}))

const lexeme: Parser<Draft> = choice([terminatedString, unterminatedString, number, word, symbol, illegal])

const lexemes: Parser<{ drafts: { leading: string; draft: Draft }[]; trailing: string }> = coroutine((run) => {
  const drafts = run(many(coroutine((inner) => {
    const leading: string = inner(whitespace)
    const draft: Draft = inner(lexeme)
    return { leading, draft }
  })))
  const trailing: string = run(whitespace)
  return { drafts, trailing }
})

// ============================================================================
// Positions
// ============================================================================

function advanceOver(pos: Position, text: string): Position {
  let next = pos
  for (const c of text) next = Position.advance(next, c)
  return next
}

function place(drafts: { leading: string; draft: Draft }[], trailing: string): Token[] {
  const tokens: Token[] = []
  let pos = Position.start()
  for (const { leading, draft } of drafts) {
    const start = advanceOver(pos, leading)
    const chars = [...draft.text]
    const last = advanceOver(start, chars.slice(0, -1).join(''))
    tokens.push(draft.build(start, last))
    pos = advanceOver(last, chars[chars.length - 1] ?? '')
  }
  tokens.push(Token.ofEOF(advanceOver(pos, trailing)))
  return tokens
}

// ============================================================================
// Public API
// ============================================================================

/** Split filter text into tokens; the last one is always EOF */
export function tokenize(source: string): Token[] {
  const result = lexemes.run(source)
  if (result.isError) {
    throw ErrParseFailed.create({ expression: source, reason: result.error, position: NoPosition })
  }
  return place(result.result.drafts, result.result.trailing)
}

/** Pull-style access to the tokens of one source text */
export class Lexer {
  private all: Token[] | undefined
  private cursor = 0

  static {
    Inspect(this, (self) => ({
      format: 'Lexer( %s @%d )',
      params: [JSON.stringify(self.source), self.cursor],
    }))
  }

  constructor(readonly source: string) {}

  /** Every token, ending with EOF */
  tokens(): readonly Token[] {
    this.all ??= tokenize(this.source)
    return this.all
  }

  /** The next token; EOF once the input is exhausted */
  scan(): Token {
    const tokens = this.tokens()
    const token = tokens[Math.min(this.cursor, tokens.length - 1)]
    if (this.cursor < tokens.length - 1) this.cursor++
    return token
  }

  reset(): void {
    this.cursor = 0
  }
}
