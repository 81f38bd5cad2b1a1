import { command, constant } from '@optique/core/primitives'
import { object } from '@optique/core/constructs'
import { message } from '@optique/core/message'
import type { InferValue } from '@optique/core/parser'
import { parseAndAnalyze } from '@sift/filter'
import { colorOption, expressionArgument } from '../parsers/standard-opts.js'
import type { Command } from '../command.js'

const parser = command(
  'check',
  object({
    cmd: constant('check'),
    expression: expressionArgument,
    color: colorOption,
  }),
  { description: message`Parse and analyze a filter expression` },
)

export type CheckArgs = InferValue<typeof parser>

export class CmdCheck implements Command<CheckArgs> {
  readonly name = 'check'
  readonly parser = parser

  run(args: CheckArgs): string {
    parseAndAnalyze(args.expression)
    return 'ok'
  }
}
