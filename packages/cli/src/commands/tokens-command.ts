import { command, constant } from '@optique/core/primitives'
import { object } from '@optique/core/constructs'
import { message } from '@optique/core/message'
import type { InferValue } from '@optique/core/parser'
import { Fmt } from '@sift/core'
import { tokenize } from '@sift/filter'
import { colorOption, expressionArgument, outputOption } from '../parsers/standard-opts.js'
import { TokenJsonPrinter, TokenTablePrinter } from '../printers/token-printers.js'
import type { Command, CommandOptions } from '../command.js'

const parser = command(
  'tokens',
  object({
    cmd: constant('tokens'),
    expression: expressionArgument,
    output: outputOption,
    color: colorOption,
  }),
  { description: message`Print the token stream of a filter expression` },
)

export type TokensArgs = InferValue<typeof parser>

/** Lexes only; illegal input shows up as ERROR tokens rather than failing */
export class CmdTokens implements Command<TokensArgs> {
  readonly name = 'tokens'
  readonly parser = parser

  run(args: TokensArgs, opts: CommandOptions): string {
    const tokens = tokenize(args.expression)
    const printer = (args.output ?? opts.output) === 'json' ? TokenJsonPrinter : TokenTablePrinter
    return printer.print(tokens, Fmt.from(opts.color))
  }
}
