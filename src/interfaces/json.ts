import { isInteger, isSafeNumber, parse, stringify } from 'lossless-json'

// Integers that do not fit a double become bigint; everything else is a number
function parseNumber(value: string): number | bigint {
  return !isSafeNumber(value) && isInteger(value) ? BigInt(value) : parseFloat(value)
}

/**
 * JSON.parse that keeps 64-bit statement hashes exact.
 */
export function parseJson(text: string): unknown {
  return parse(text, null, parseNumber)
}

export function stringifyJson(value: unknown): string {
  return stringify(value) ?? 'null'
}
