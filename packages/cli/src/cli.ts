/**
 * CLI dispatch.
 *
 * One optique parser routes argv to a command; the command's result or
 * error becomes a CliResponse. The process harness (env, stdout, exit
 * code) lives in main.ts. This file is pure logic, no process-level side
 * effects.
 */

import { or } from '@optique/core/constructs'
import { formatMessage } from '@optique/core/message'
import { parseSync } from '@optique/core/parser'
import { Fmt, SiftError } from '@sift/core'

import { CmdCheck, type CheckArgs } from './commands/check-command.js'
import { CmdFormat, type FormatArgs } from './commands/format-command.js'
import { CmdTokens, type TokensArgs } from './commands/tokens-command.js'
import { CmdTranslate, type TranslateArgs } from './commands/translate-command.js'
import { ErrorPrinter } from './printers/error-printers.js'
import type { CommandOptions } from './command.js'
import type { SiftConfig } from './config.js'
import type { CliResponse } from './types.js'

export const USAGE = `Usage: sift <command> <expression> [options]

Commands:
  check       Parse and analyze a filter expression
  format      Print the canonical form of a filter expression
  translate   Print the Qdrant filter for a filter expression
  tokens      Print the token stream of a filter expression

Options:
  -o, --output <text|json>   Output format for translate and tokens
  --color                    Colour the output
  -h, --help                 Show this help`

type ProgramArgs = CheckArgs | FormatArgs | TranslateArgs | TokensArgs

const EXIT_OK = 0
const EXIT_ERROR = 1
const EXIT_USAGE = 2

export class CLI {
  readonly commands = {
    check: new CmdCheck(),
    format: new CmdFormat(),
    translate: new CmdTranslate(),
    tokens: new CmdTokens(),
  }

  private program = or(
    this.commands.check.parser,
    this.commands.format.parser,
    this.commands.translate.parser,
    this.commands.tokens.parser,
  )

  constructor(public cfg: SiftConfig) {}

  // -- Dispatch --------------------------------------------------------------

  execute(argv: readonly string[]): CliResponse {
    if (argv.includes('-h') || argv.includes('--help')) {
      return { exitCode: EXIT_OK, stdout: USAGE + '\n' }
    }

    const parsed = parseSync(this.program, argv)
    if (!parsed.success) {
      return { exitCode: EXIT_USAGE, stderr: `Error: ${formatMessage(parsed.error)}\n\n${USAGE}\n` }
    }

    const args: ProgramArgs = parsed.value
    const opts: CommandOptions = {
      color: args.color ?? this.cfg.color,
      output: this.cfg.output,
    }

    try {
      return { exitCode: EXIT_OK, stdout: this.run(args, opts) + '\n' }
    } catch (e) {
      const view = { error: SiftError.wrap(e), includeStackTrace: this.cfg.debug }
      return { exitCode: EXIT_ERROR, stderr: ErrorPrinter.print(view, Fmt.from(opts.color)) + '\n' }
    }
  }

  private run(args: ProgramArgs, opts: CommandOptions): string {
    switch (args.cmd) {
      case 'check':
        return this.commands.check.run(args)
      case 'format':
        return this.commands.format.run(args)
      case 'translate':
        return this.commands.translate.run(args, opts)
      case 'tokens':
        return this.commands.tokens.run(args, opts)
    }
  }
}
