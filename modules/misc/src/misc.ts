import * as crypto from 'crypto'

/**
 * @param input buffer or string to hash
 * @returns a 224 bit hash, in "hex" encoding.
 */
export function computeHash(input: Buffer | string): string {
  const hasher = crypto.createHash('sha224')
  return hasher.update(input).digest('hex')
}

/**
 * Splits each of the given strings on `separator`, dropping blank items. ['a,b', 'c'] becomes ['a', 'b', 'c'].
 */
export function splitAll(input: readonly string[], separator = ','): string[] {
  return input.flatMap(s => s.split(separator)).map(s => s.trim()).filter(Boolean)
}
