/**
 * An external process (the build tool, or the VCS) exited with a non-zero exit code.
 */
export class ProcessFailedError extends Error {
  constructor(readonly command: string, readonly exitCode: number, readonly output: string) {
    super(`<${command}> failed with exit code ${exitCode}`)

    // Set the prototype explicitly.
    Object.setPrototypeOf(this, ProcessFailedError.prototype)
  }
}

/**
 * The build tool's completion log and its rule key log disagree (a finished rule refers to a rule key whose
 * description was never logged), or an expected log artifact is missing.
 */
export class LogInconsistencyError extends Error {
  constructor(m: string, readonly ruleName?: string, readonly fingerprint?: string) {
    super(m)

    Object.setPrototypeOf(this, LogInconsistencyError.prototype)
  }
}

type InvariantKind =
  /**
   * Building in a renamed directory did not reuse the dir cache.
   */
  | 'cross-directory-cache-miss'
  /**
   * Building an unchanged tree did work.
   */
  | 'noop-build-did-work'

export class InvariantViolationError extends Error {
  constructor(m: string, readonly kind: InvariantKind) {
    super(m)

    Object.setPrototypeOf(this, InvariantViolationError.prototype)
  }
}

/**
 * Bad command line input.
 */
export class ConfigError extends Error {
  constructor(m: string) {
    super(m)

    Object.setPrototypeOf(this, ConfigError.prototype)
  }
}
