import { CommandRunner, ExecaCommandRunner } from 'command-runner'
import { createDefaultLogger, Criticality, Logger } from 'logger'
import { errorLike } from 'misc'
import * as os from 'os'
import * as path from 'path'
import { ConfigError } from 'perf-errors'
import { PerfTestConfig } from 'perf-types'
import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'

import { createPerfTest } from './perf-test.js'

export interface CommandLine {
  config: PerfTestConfig
  logFile: string
  criticality: Criticality
}

export function parseCommandLine(argv: readonly string[]): CommandLine {
  const parsed = yargs([...argv])
    .scriptName('buck-perf-test')
    .usage('$0 [options]\n\nCompares the performance of two buck versions over the recent history of a project.')
    .option('perftest-id', {
      describe: 'the identifier of this performance test',
      type: 'string',
      demandOption: true,
    })
    .option('revisions-to-go-back', {
      describe: 'the maximum number of revisions to go back when testing',
      type: 'number',
      demandOption: true,
    })
    .option('iterations-per-diff', {
      describe: 'the number of clean builds (per buck version) at each tested revision',
      type: 'number',
      demandOption: true,
    })
    .option('targets-to-build', {
      describe: 'the targets to build. Can be repeated; each value may hold several comma separated targets',
      type: 'string',
      array: true,
      demandOption: true,
    })
    .option('repo-under-test', {
      describe: 'path to the repo under test',
      type: 'string',
      demandOption: true,
    })
    .option('project-under-test', {
      describe: 'path to the project folder being tested, relative to the repo',
      type: 'string',
      demandOption: true,
    })
    .option('path-to-buck', {
      describe: 'the path to the buck binary',
      type: 'string',
      demandOption: true,
    })
    .option('old-buck-revision', {
      describe: 'the original buck revision',
      type: 'string',
      demandOption: true,
    })
    .option('new-buck-revision', {
      describe: 'the new buck revision',
      type: 'string',
      demandOption: true,
    })
    .option('log-file', {
      describe: 'where to write the detailed log. Defaults to a file in the temp directory',
      type: 'string',
    })
    .options('loudness', {
      describe: `how detailed should the progress report be. Values are T-shirt sizes:
          s - just banners and errors are printed
          m - print every step
          l - print everything`,
      choices: ['s', 'm', 'l'],
      default: 'm',
    })
    .strict()
    .exitProcess(false)
    .fail((msg, err) => {
      throw new ConfigError(err ? err.message : msg)
    })
    .parseSync()

  const candidate = {
    perftestId: parsed['perftest-id'],
    revisionsToGoBack: parsed['revisions-to-go-back'],
    iterationsPerDiff: parsed['iterations-per-diff'],
    targetsToBuild: parsed['targets-to-build'],
    repoUnderTest: path.resolve(parsed['repo-under-test']),
    projectUnderTest: parsed['project-under-test'],
    pathToBuck: parsed['path-to-buck'],
    oldBuckRevision: parsed['old-buck-revision'],
    newBuckRevision: parsed['new-buck-revision'],
  }
  const validated = PerfTestConfig.safeParse(candidate)
  if (!validated.success) {
    const issues = validated.error.issues.map(at => `${at.path.join('.')}: ${at.message}`)
    throw new ConfigError(`Invalid command line: ${issues.join('; ')}`)
  }

  const config = Object.freeze(validated.data)
  const logFile = path.resolve(parsed['log-file'] ?? path.join(os.tmpdir(), `buck-perf-test-${config.perftestId}.log`))
  return { config, logFile, criticality: stringToLoudness(String(parsed.loudness)) }
}

function stringToLoudness(s: string): Criticality {
  if (s === 's') {
    return 'high'
  }

  if (s === 'm') {
    return 'moderate'
  }

  if (s === 'l') {
    return 'low'
  }

  throw new ConfigError(`illegal loudness value: "${s}"`)
}

/**
 * Runs a performance test as described by the command line. Sets a non-zero exit code on failure: a bad command line
 * is reported on stderr before anything is run; a failed run is reported through the logger.
 */
export async function main(
  argv: readonly string[] = hideBin(process.argv),
  createRunner: (logger: Logger) => CommandRunner = logger => new ExecaCommandRunner(logger),
) {
  let commandLine: CommandLine
  try {
    commandLine = parseCommandLine(argv)
  } catch (e) {
    process.stderr.write(`${errorLike(e).message ?? String(e)}\n`)
    process.exitCode = 1
    return
  }

  const { config, logFile, criticality } = commandLine
  const logger = createDefaultLogger(logFile, criticality)
  logger.print(`logging to ${logFile}`, 'low')
  try {
    await createPerfTest(config, createRunner(logger), logger).run()
  } catch (e) {
    logger.error(`Performance test failed`, e)
    process.exitCode = 1
  }
}
