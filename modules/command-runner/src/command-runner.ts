import execa from 'execa'
import { Logger } from 'logger'
import { errorLike } from 'misc'
import { ProcessFailedError } from 'perf-errors'

export interface RunOptions {
  cwd: string
  /**
   * The complete environment of the spawned process. When omitted, the process inherits the environment of this
   * process.
   */
  env?: NodeJS.ProcessEnv
}

export interface CommandOutcome {
  exitCode: number
  stdout: string
  /**
   * stdout and stderr, interleaved.
   */
  output: string
}

export interface CommandRunner {
  run(cmd: string, args: readonly string[], options: RunOptions): Promise<CommandOutcome>
}

// Buck's output at -v 5 is large.
const MAX_BUFFER = 1024 * 1024 * 1024

export class ExecaCommandRunner implements CommandRunner {
  constructor(private readonly logger: Logger) {}

  async run(cmd: string, args: readonly string[], options: RunOptions): Promise<CommandOutcome> {
    const summary = `<${options.cwd}$ ${cmd} ${args.join(' ')}>`
    this.logger.info(`Dispatching ${summary}`)
    const p = await execa(cmd, args, {
      cwd: options.cwd,
      all: true,
      reject: false,
      maxBuffer: MAX_BUFFER,
      ...(options.env ? { env: options.env, extendEnv: false } : {}),
    })
    if (typeof p.exitCode !== 'number') {
      // Not spawned at all (e.g., no such executable), or killed by a signal.
      const message = errorLike(p).message ?? `${summary} did not exit normally`
      this.logger.info(`running ${summary} failed: ${message}`)
      return { exitCode: -1, stdout: '', output: message }
    }
    this.logger.info(`exitCode of ${summary} is ${p.exitCode}`)
    return { exitCode: p.exitCode, stdout: p.stdout, output: p.all ?? '' }
  }
}

/**
 * Runs a command and returns its outcome. A non-zero exit code is fatal: the full output is printed and a
 * ProcessFailedError is thrown.
 */
export async function runOrFail(
  runner: CommandRunner,
  logger: Logger,
  cmd: string,
  args: readonly string[],
  options: RunOptions,
): Promise<CommandOutcome> {
  const outcome = await runner.run(cmd, args, options)
  if (outcome.exitCode !== 0) {
    const commandLine = [cmd, ...args].join(' ')
    logger.print(`${commandLine} failed: ${outcome.output}`, 'high')
    throw new ProcessFailedError(commandLine, outcome.exitCode, outcome.output)
  }
  return outcome
}
