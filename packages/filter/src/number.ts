/**
 * NUMBER literal normalization.
 *
 * Values are 64-bit floats. The canonical text is the shortest decimal that
 * reads back to the same value, written without an exponent.
 */

const NUMBER_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

/** Read decimal text as a finite float; `undefined` when it is not one */
export function parseNumber(text: string): number | undefined {
  if (!NUMBER_TEXT.test(text)) return undefined
  const value = Number(text)
  return Number.isFinite(value) ? value : undefined
}

/** Shortest round-trip decimal of a finite float, exponent expanded */
export function formatNumber(value: number): string {
  return expandExponent(String(value))
}

/** `'123.000'` → `'123'`, `'1.23e+02'` → `'123'`; `undefined` for invalid text */
export function normalizeNumber(text: string): string | undefined {
  const value = parseNumber(text)
  return value === undefined ? undefined : formatNumber(value)
}

function expandExponent(text: string): string {
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text)
  if (!match) return text
  const [, sign, lead, fraction = '', exponent] = match
  const digits = lead + fraction
  const point = 1 + Number(exponent)
  if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`
  if (point >= digits.length) return `${sign}${digits}${'0'.repeat(point - digits.length)}`
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`
}
