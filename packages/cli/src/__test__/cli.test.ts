import { describe, test, expect } from 'vitest'
import { CLI, USAGE } from '../cli.js'
import { SiftConfig } from '../config.js'

const cli = (overrides: Partial<SiftConfig> = {}) => new CLI(SiftConfig.build({ color: false, ...overrides }, {}))

const firstLine = (text: string | undefined) => (text ?? '').split('\n')[0]

describe('CLI', () => {
  test('check accepts a valid expression', () => {
    expect(cli().execute(['check', "status == 'active'"])).toEqual({ exitCode: 0, stdout: 'ok\n' })
  })

  test('format prints the canonical form', () => {
    expect(cli().execute(['format', "age>18 AND (s=='a' OR s=='b')"])).toEqual({
      exitCode: 0,
      stdout: "age > 18 and (s == 'a' or s == 'b')\n",
    })
  })

  test('translate prints the clause tree', () => {
    const res = cli().execute(['translate', "age > 18 and (s == 'a' or s == 'b')"])
    expect(res.exitCode).toBe(0)
    expect(res.stdout).toBe(
      [
        'must:',
        '  age > 18',
        '  filter:',
        '    should:',
        "      s == 'a'",
        "      s == 'b'",
        '',
      ].join('\n'),
    )
  })

  test('translate --output json prints the REST filter', () => {
    const res = cli().execute(['translate', "tags[0] == 'x'", '--output', 'json'])
    expect(res.exitCode).toBe(0)
    expect(JSON.parse(res.stdout ?? '')).toEqual({ must: [{ key: 'tags.0', match: { value: 'x' } }] })
  })

  test('output format falls back to the configured one', () => {
    const res = cli({ output: 'json' }).execute(['translate', 'n != 3'])
    expect(res.stdout).toBe(JSON.stringify({ must_not: [{ key: 'n', match: { value: 3 } }] }, null, 2) + '\n')
  })

  test('tokens prints a table', () => {
    const res = cli().execute(['tokens', 'a < 2'])
    expect(res).toEqual({
      exitCode: 0,
      stdout: [
        "1:1-1:1  IDENT   'a'",
        "1:3-1:3  LT      '<'",
        "1:5-1:5  NUMBER  '2'",
        '1:6      EOF',
        '',
      ].join('\n'),
    })
  })

  test('tokens -o json', () => {
    const res = cli().execute(['tokens', 'a', '-o', 'json'])
    expect(JSON.parse(res.stdout ?? '')).toEqual([
      { kind: 'IDENT', literal: 'a', start: '1:1', end: '1:1' },
      { kind: 'EOF', literal: '', start: '0:0', end: '1:2' },
    ])
  })

  test('a filter error exits 1 with the rendered error', () => {
    const res = cli().execute(['check', 'a =='])
    expect(res.exitCode).toBe(1)
    expect(res.stdout).toBeUndefined()
    expect(firstLine(res.stderr)).toBe('SiftError: filter.ParseFailed: ParseFailed: unexpected end of input at 1:5')
  })

  test('parse errors point at the offending column', () => {
    expect(cli().execute(['format', 'a ==']).stderr).toBe(
      [
        'SiftError: filter.ParseFailed: ParseFailed: unexpected end of input at 1:5',
        '  └ data: {"expression":"a ==","reason":"unexpected end of input","position":{"line":1,"column":5}}',
        '',
        '    a ==',
        '        ^',
        '',
      ].join('\n'),
    )
  })

  test('analysis errors are reported by check', () => {
    const res = cli().execute(['check', "age > 'x'"])
    expect(res.exitCode).toBe(1)
    expect(firstLine(res.stderr)).toBe(
      "SiftError: filter.OrderingRightNotNumeric: OrderingRightNotNumeric: right operand of '>' must be a number literal, got string literal at 1:7",
    )
  })

  test('translate reports parse errors', () => {
    const res = cli().execute(['translate', 'x in ()'])
    expect(res.exitCode).toBe(1)
    expect(firstLine(res.stderr)).toBe('SiftError: filter.ParseFailed: ParseFailed: empty parentheses at 1:7')
  })

  test('an unknown command exits 2 with usage', () => {
    const res = cli().execute(['explain', 'a == 1'])
    expect(res.exitCode).toBe(2)
    expect(res.stderr?.startsWith('Error: ')).toBe(true)
    expect(res.stderr?.endsWith(`\n\n${USAGE}\n`)).toBe(true)
  })

  test('a missing expression exits 2', () => {
    expect(cli().execute(['check']).exitCode).toBe(2)
  })

  test('--help prints usage', () => {
    expect(cli().execute(['--help'])).toEqual({ exitCode: 0, stdout: USAGE + '\n' })
    expect(cli().execute(['check', '-h']).exitCode).toBe(0)
  })

  test('--color turns on ANSI output', () => {
    const res = cli().execute(['translate', 'a == 1', '--color'])
    expect(res.stdout).toBe('\x1b[36mmust:\x1b[0m\n  \x1b[1ma\x1b[0m == 1\n')
  })

  test('configured colour applies to errors', () => {
    const res = cli({ color: true }).execute(['check', 'a =='])
    expect(firstLine(res.stderr)).toBe(
      'SiftError: \x1b[31mfilter.ParseFailed\x1b[0m: ParseFailed: unexpected end of input at 1:5',
    )
  })
})
