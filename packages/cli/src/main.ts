/**
 * CLI harness: process-level entry point.
 *
 * Reads configuration from the environment, runs the CLI and writes the
 * response. All process-level concerns live here; the CLI class in cli.ts
 * is pure logic.
 */

import { SiftError } from '@sift/core'
import { CLI } from './cli.js'
import { SiftConfig } from './config.js'
import type { CliResponse } from './types.js'

export function main(argv: readonly string[]): CliResponse {
  let cfg: SiftConfig
  try {
    cfg = SiftConfig.build({}, process.env, process.stderr.isTTY === true)
  } catch (e) {
    return { exitCode: 1, stderr: SiftError.wrap(e).prettyPrint() + '\n' }
  }
  return new CLI(cfg).execute(argv)
}

const response = main(process.argv.slice(2))
if (response.stdout) process.stdout.write(response.stdout)
if (response.stderr) process.stderr.write(response.stderr)
process.exitCode = response.exitCode
