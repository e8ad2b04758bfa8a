/**
 * An always-failing function. Useful as the right-hand-side operand of `??` or `||`:
 *
 *    const dir: string = process.env['WORKING_DIR'] || failMe('missing env variable "WORKING_DIR"')
 */
export function failMe(hint?: string): never {
  if (!hint) {
    throw new Error(`This expression must never be evaluated`)
  }

  throw new Error(`Bad value: ${hint}`)
}

/**
 * Safely converts an input of type `unknown` into an Error like object. `message` and `stack` are strings if the
 * input carries such string properties, undefined otherwise.
 */
export function errorLike(err: unknown): { message: string | undefined; stack: string | undefined } {
  if (typeof err !== 'object' || err === null) {
    return { message: typeof err === 'string' ? err : undefined, stack: undefined }
  }
  const message = 'message' in err ? err.message : undefined
  const stack = 'stack' in err ? err.stack : undefined
  return {
    message: typeof message === 'string' ? message : undefined,
    stack: typeof stack === 'string' ? stack : undefined,
  }
}
