/**
 * Fmt: text formatting for terminal output.
 *
 * `Fmt.ansi` wraps text in ANSI escapes, `Fmt.noop` passes it through.
 * Pick one with Fmt.from(color).
 */
import {StaticTypeCompanion} from "./companion.js";

export interface Fmt {
  readonly isColor: boolean
  dim(text: string): string
  bold(text: string): string
  red(text: string): string
  cyan(text: string): string
  magenta(text: string): string
}

const RESET = "\x1b[0m";

const ansi = (code: number) => (text: string) => `\x1b[${code}m${text}${RESET}`;

const ansiFmt: Fmt = {
  isColor: true,
  dim: ansi(2),
  bold: ansi(1),
  red: ansi(31),
  cyan: ansi(36),
  magenta: ansi(35),
}

const noopFmt: Fmt = {
  isColor: false,
  dim: (t) => t,
  bold: (t) => t,
  red: (t) => t,
  cyan: (t) => t,
  magenta: (t) => t,
}

export const Fmt = StaticTypeCompanion({
  ansi: ansiFmt,
  noop: noopFmt,
  from(color: boolean): Fmt {
    return color ? ansiFmt : noopFmt
  },
})
