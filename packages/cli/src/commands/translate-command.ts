import { command, constant } from '@optique/core/primitives'
import { object } from '@optique/core/constructs'
import { message } from '@optique/core/message'
import type { InferValue } from '@optique/core/parser'
import { Fmt } from '@sift/core'
import { parse } from '@sift/filter'
import { toFilter } from '@sift/qdrant'
import { colorOption, expressionArgument, outputOption } from '../parsers/standard-opts.js'
import { FilterJsonPrinter, FilterTextPrinter } from '../printers/filter-printers.js'
import type { Command, CommandOptions } from '../command.js'

const parser = command(
  'translate',
  object({
    cmd: constant('translate'),
    expression: expressionArgument,
    output: outputOption,
    color: colorOption,
  }),
  { description: message`Print the Qdrant filter for a filter expression` },
)

export type TranslateArgs = InferValue<typeof parser>

export class CmdTranslate implements Command<TranslateArgs> {
  readonly name = 'translate'
  readonly parser = parser

  run(args: TranslateArgs, opts: CommandOptions): string {
    const filter = toFilter(parse(args.expression))
    const printer = (args.output ?? opts.output) === 'json' ? FilterJsonPrinter : FilterTextPrinter
    return printer.print(filter, Fmt.from(opts.color))
  }
}
