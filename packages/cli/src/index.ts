/**
 * @sift/cli: the `sift` command-line tool, as a library.
 */

export { CLI, USAGE } from './cli.js'
export { SiftConfig, type OutputFormat, type Env } from './config.js'
export { CliBoundary, ErrInvalidSetting } from './errors.js'
export type { Command, CommandOptions } from './command.js'
export type { CliResponse } from './types.js'
export { FilterTextPrinter, FilterJsonPrinter } from './printers/filter-printers.js'
export { TokenTablePrinter, TokenJsonPrinter } from './printers/token-printers.js'
export { ErrorPrinter, type ErrorView } from './printers/error-printers.js'
