import { command, constant } from '@optique/core/primitives'
import { object } from '@optique/core/constructs'
import { message } from '@optique/core/message'
import type { InferValue } from '@optique/core/parser'
import { format, parseAndAnalyze } from '@sift/filter'
import { colorOption, expressionArgument } from '../parsers/standard-opts.js'
import type { Command } from '../command.js'

const parser = command(
  'format',
  object({
    cmd: constant('format'),
    expression: expressionArgument,
    color: colorOption,
  }),
  { description: message`Print the canonical form of a filter expression` },
)

export type FormatArgs = InferValue<typeof parser>

export class CmdFormat implements Command<FormatArgs> {
  readonly name = 'format'
  readonly parser = parser

  run(args: FormatArgs): string {
    return format(parseAndAnalyze(args.expression))
  }
}
