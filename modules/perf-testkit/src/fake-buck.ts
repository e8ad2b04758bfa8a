import { BuckLayout } from 'build-invoker'
import { CommandOutcome, CommandRunner, RunOptions } from 'command-runner'
import * as fse from 'fs-extra'
import { computeHash } from 'misc'
import * as path from 'path'

export interface FakeBuckOptions {
  pathToBuck: string
  /**
   * Repo-relative path of the project; `hg update` writes the checked out revision to `<project>/REVISION`.
   */
  projectUnderTest: string
  /**
   * Revisions of the fake repo, oldest first.
   */
  revisions: string[]
  /**
   * Names of the rules every build builds.
   */
  rules: string[]
  /**
   * Rules whose rule key (wrongly) includes the absolute path of the build directory.
   */
  pathSensitiveRules?: string[]
  /**
   * 1-based index of a buck build invocation that should fail.
   */
  failingBuild?: number
  /**
   * Print rule keys to the console instead of writing buck-0.log.
   */
  consoleRuleKeys?: boolean
}

export interface Invocation {
  cmd: string
  args: readonly string[]
  cwd: string
  env?: NodeJS.ProcessEnv
}

const ok = (output = ''): CommandOutcome => ({ exitCode: 0, stdout: output, output })

async function readIfExists(p: string): Promise<string | undefined> {
  return (await fse.pathExists(p)) ? await fse.readFile(p, 'utf-8') : undefined
}

/**
 * Plays the part of both `hg` and `buck`. Builds simulate Buck's caching: a rule whose key appears in the previous
 * buck-out is a local hit, a key stored in the configured dir cache is a dir hit, anything else is a miss (which is
 * written to the dir cache when its mode is readwrite).
 */
export class FakeBuck implements CommandRunner {
  readonly invocations: Invocation[] = []
  private buildCount = 0

  constructor(private readonly options: FakeBuckOptions) {}

  get builds(): Invocation[] {
    return this.invocations.filter(at => at.cmd === this.options.pathToBuck && at.args[0] === 'build')
  }

  async run(cmd: string, args: readonly string[], runOptions: RunOptions): Promise<CommandOutcome> {
    this.invocations.push({ cmd, args, cwd: runOptions.cwd, env: runOptions.env })
    if (cmd === 'hg') {
      return await this.hg(args, runOptions.cwd)
    }
    if (cmd === this.options.pathToBuck) {
      return await this.buck(args, runOptions.cwd)
    }
    return { exitCode: 127, stdout: '', output: `${cmd}: command not found` }
  }

  ruleKey(rule: string, revision: string, buckVersion: string, cwd: string) {
    const pathPart = this.options.pathSensitiveRules?.includes(rule) ? `|${cwd}` : ''
    return computeHash(`${rule}|${revision}|${buckVersion}${pathPart}`).slice(0, 40)
  }

  private async hg(args: readonly string[], cwd: string): Promise<CommandOutcome> {
    const [sub] = args
    if (sub === 'log') {
      const limit = Number(args[args.indexOf('--limit') + 1])
      return ok([...this.options.revisions].reverse().slice(0, limit).join('\n') + '\n')
    }
    if (sub === 'update') {
      const revision = args[args.length - 1]
      if (!this.options.revisions.includes(revision)) {
        return { exitCode: 255, stdout: '', output: `abort: unknown revision '${revision}'!` }
      }
      const projectDir = path.join(cwd, this.options.projectUnderTest)
      await fse.ensureDir(projectDir)
      await fse.writeFile(path.join(projectDir, 'REVISION'), revision)
      return ok()
    }
    if (sub === 'purge' || sub === 'revert') {
      return ok()
    }
    return { exitCode: 255, stdout: '', output: `hg: unknown command '${sub}'` }
  }

  private async buck(args: readonly string[], cwd: string): Promise<CommandOutcome> {
    if (args[0] === 'clean') {
      await fse.remove(path.join(cwd, 'buck-out'))
      return ok('Cleaning buck-out.')
    }
    if (args[0] !== 'build') {
      return { exitCode: 1, stdout: '', output: `unknown buck command: ${args[0]}` }
    }

    ++this.buildCount
    if (this.buildCount === this.options.failingBuild) {
      return { exitCode: 1, stdout: '', output: 'BUILD FAILED: //app:lib failed on step javac with an exception' }
    }

    const revision = (await readIfExists(path.join(cwd, 'REVISION')))?.trim() ?? 'none'
    const buckVersion = (await readIfExists(path.join(cwd, BuckLayout.versionPin)))?.trim() ?? 'unpinned'
    const localConfig = (await readIfExists(path.join(cwd, BuckLayout.localConfig))) ?? ''
    const cacheDir = path.join(cwd, /dir = (\S+)/.exec(localConfig)?.[1] ?? 'buck-cache')
    const writable = /dir_mode = readwrite/.test(localConfig)
    const previous = (await readIfExists(path.join(cwd, BuckLayout.completionLog))) ?? ''

    const completionLines: string[] = []
    const ruleKeyLines: string[] = []
    for (const rule of this.options.rules) {
      const key = this.ruleKey(rule, revision, buckVersion, cwd)
      let outcome: string
      if (previous.includes(key)) {
        outcome = 'LOCAL_KEY_UNCHANGED_HIT'
      } else if (await fse.pathExists(path.join(cacheDir, key))) {
        outcome = 'DIR_HIT'
      } else {
        outcome = 'MISS'
        if (writable) {
          await fse.outputFile(path.join(cacheDir, key), rule)
        }
      }
      completionLines.push(
        `[2026-10-18 09:12:45.001][debug][tid:12][com.facebook.buck.event.listener.LoggingBuildListener] BuildRuleFinished(${rule}): SUCCESS ${outcome} BUILT_LOCALLY ${key}`,
      )
      ruleKeyLines.push(`RuleKey ${key}=string("${rule}"):string("${revision}"):`)
    }

    await fse.outputFile(path.join(cwd, BuckLayout.completionLog), completionLines.join('\n') + '\n')
    const verboseLogPath = path.join(cwd, BuckLayout.verboseLog)
    if (this.options.consoleRuleKeys) {
      await fse.remove(verboseLogPath)
      return ok(['Parsing buck files: finished in 0.1 sec', ...ruleKeyLines.map(at => `INFO: ${at}`)].join('\n'))
    }
    await fse.outputFile(
      verboseLogPath,
      ruleKeyLines
        .map(
          at =>
            `[2026-10-18 09:12:44.120][debug][command:5f0c1e2a-77b1-4c1d-9a0e-3d2b1c0f9e8d][tid:83][com.facebook.buck.rules.RuleKey$Builder] ${at}`,
        )
        .join('\n'),
    )
    return ok('BUILD SUCCEEDED')
  }
}
