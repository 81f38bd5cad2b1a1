import { optional } from '@optique/core/modifiers'
import { argument, flag, option } from '@optique/core/primitives'
import { choice, string } from '@optique/core/valueparser'
import { message } from '@optique/core/message'

// Output format choices
export const outputFormat = choice(['text', 'json'])

export const outputOption = optional(
  option('-o', '--output', outputFormat, { description: message`Output format (text, json)` }),
)

export const colorOption = optional(flag('--color', { description: message`Colour the output` }))

/** The filter expression, as one shell word */
export const expressionArgument = argument(string({ metavar: 'EXPR' }), {
  description: message`Filter expression, e.g. "age > 18 and status == 'active'"`,
})
