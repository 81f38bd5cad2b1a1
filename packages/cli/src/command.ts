/**
 * Command: A self-contained CLI command with type-safe args.
 *
 * Each command owns its parser and handler. The parsed value type flows
 * from the parser definition to the handler through `InferValue`.
 */

import type { Parser } from '@optique/core/parser'
import type { OutputFormat } from './config.js'

/** Per-request options passed to command handlers. */
export interface CommandOptions {
  color: boolean
  output: OutputFormat
}

export interface Command<TArgs> {
  /** Command name as typed by the user (e.g. 'check', 'translate'). */
  readonly name: string
  readonly parser: Parser<'sync', TArgs, unknown>
  /** Execute the command; throws a SiftError on failure. */
  run(args: TArgs, opts: CommandOptions): string
}
