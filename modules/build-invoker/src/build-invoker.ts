import { CommandRunner, runOrFail } from 'command-runner'
import * as fse from 'fs-extra'
import { parseBuildLogs } from 'log-parser'
import { Logger } from 'logger'
import * as path from 'path'
import { LogInconsistencyError } from 'perf-errors'
import { BuildResult, PerfTestConfig, Side } from 'perf-types'

import { BuckLayout } from './buck-layout.js'

// The default configuration has the root logger and FileHandler discard anything below FINE. Rule keys are logged at
// FINER so both need to be lowered.
const LOGGING_PROPERTIES = ['.level=FINER', 'java.util.logging.FileHandler.level=FINER', ''].join('\n')

export interface BuildRequest {
  cwd: string
  targets: readonly string[]
  side: Side
  /**
   * Whether the build is tagged (via the environment) as part of this performance test, for the benefit of whoever
   * collects Buck's telemetry.
   */
  logAsPerftest: boolean
}

/**
 * Computes the environment of a single buck invocation.
 */
export function buildEnvironment(
  base: NodeJS.ProcessEnv,
  config: PerfTestConfig,
  side: Side,
  logAsPerftest: boolean,
): NodeJS.ProcessEnv {
  return {
    ...base,
    // The repo was just renamed (or checked out); buck must treat it as clean.
    BUCK_REPOSITORY_DIRTY: '0',
    ...(logAsPerftest
      ? { BUCK_EXTRA_JAVA_ARGS: `-Dbuck.perftest_id=${config.perftestId} -Dbuck.perftest_side=${side}` }
      : {}),
  }
}

export class BuildInvoker {
  constructor(
    private readonly config: PerfTestConfig,
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
    // eslint-disable-next-line no-process-env
    private readonly baseEnv: NodeJS.ProcessEnv = process.env,
  ) {}

  async clean(cwd: string) {
    this.logger.print('Running buck clean.')
    await runOrFail(this.runner, this.logger, this.config.pathToBuck, ['clean'], { cwd })
  }

  async build(request: BuildRequest): Promise<BuildResult> {
    const { cwd, targets, side, logAsPerftest } = request
    this.logger.print(`Running buck build ${targets.join(' ')}.`)
    await fse.writeFile(path.join(cwd, BuckLayout.loggingConfig), LOGGING_PROPERTIES)

    const env = buildEnvironment(this.baseEnv, this.config, side, logAsPerftest)
    const t0 = Date.now()
    const outcome = await runOrFail(
      this.runner,
      this.logger,
      this.config.pathToBuck,
      ['build', '--deep', ...targets, '-v', '5'],
      { cwd, env },
    )
    const elapsedMillis = Date.now() - t0

    const completionLogPath = path.join(cwd, BuckLayout.completionLog)
    if (!(await fse.pathExists(completionLogPath))) {
      throw new LogInconsistencyError(`buck build succeeded but did not produce ${completionLogPath}`)
    }
    const verboseLogPath = path.join(cwd, BuckLayout.verboseLog)
    const verboseLog = (await fse.pathExists(verboseLogPath)) ? await fse.readFile(verboseLogPath, 'utf-8') : undefined
    const { records, ruleKeySource } = parseBuildLogs({
      completionLog: await fse.readFile(completionLogPath, 'utf-8'),
      verboseLog,
      consoleOutput: outcome.output,
    })
    if (ruleKeySource === 'console') {
      this.logger.info(`${verboseLogPath} does not exist. Rule keys were taken from the console output.`)
    }

    const result = new BuildResult(elapsedMillis, records)
    const seconds = (elapsedMillis / 1000).toFixed(1)
    this.logger.print(
      `Test Build Finished! Elapsed Seconds: ${seconds}, Cache Counts: ${JSON.stringify(result.cacheCounts())}`,
    )
    return result
  }
}
