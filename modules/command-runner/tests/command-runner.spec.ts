import { RecordingLogger } from 'logger'
import { ProcessFailedError } from 'perf-errors'
import * as Tmp from 'tmp-promise'

import { CommandOutcome, CommandRunner, ExecaCommandRunner, runOrFail, RunOptions } from '../src/index.js'

class StubRunner implements CommandRunner {
  readonly calls: { cmd: string; args: readonly string[]; options: RunOptions }[] = []
  constructor(private readonly outcome: CommandOutcome) {}

  async run(cmd: string, args: readonly string[], options: RunOptions) {
    this.calls.push({ cmd, args, options })
    return this.outcome
  }
}

describe('command-runner', () => {
  describe('runOrFail', () => {
    test('returns the outcome of a successful command', async () => {
      const runner = new StubRunner({ exitCode: 0, stdout: 'r2\nr1\n', output: 'r2\nr1\n' })
      const logger = new RecordingLogger()
      const outcome = await runOrFail(runner, logger, 'hg', ['log'], { cwd: '/repo' })
      expect(outcome.stdout).toEqual('r2\nr1\n')
      expect(runner.calls).toEqual([{ cmd: 'hg', args: ['log'], options: { cwd: '/repo' } }])
      expect(logger.printed).toEqual([])
    })
    test('prints the full output and throws when the command exits with a non-zero code', async () => {
      const runner = new StubRunner({ exitCode: 2, stdout: '', output: 'abort: no repository found' })
      const logger = new RecordingLogger()

      await expect(runOrFail(runner, logger, 'hg', ['purge', '--all'], { cwd: '/repo' })).rejects.toThrow(
        ProcessFailedError,
      )
      expect(logger.printed).toEqual(['hg purge --all failed: abort: no repository found'])
    })
  })
  describe('ExecaCommandRunner', () => {
    test('captures stdout separately and stdout+stderr combined', async () => {
      const dir = await Tmp.dir({ unsafeCleanup: true })
      const runner = new ExecaCommandRunner(new RecordingLogger())
      const outcome = await runner.run(
        process.execPath,
        ['-e', `process.stdout.write('out;'); process.stderr.write('err;'); process.exitCode = 3`],
        { cwd: dir.path },
      )
      expect(outcome.exitCode).toEqual(3)
      expect(outcome.stdout).toEqual('out;')
      expect(outcome.output).toContain('out;')
      expect(outcome.output).toContain('err;')
      await dir.cleanup()
    })
    test('passes the given environment (and only it) to the process', async () => {
      const dir = await Tmp.dir({ unsafeCleanup: true })
      const runner = new ExecaCommandRunner(new RecordingLogger())
      const outcome = await runner.run(
        process.execPath,
        ['-e', `process.stdout.write(JSON.stringify([process.env.BUCK_REPOSITORY_DIRTY, process.env.HOME_SWEET]))`],
        { cwd: dir.path, env: { BUCK_REPOSITORY_DIRTY: '0' } },
      )
      expect(JSON.parse(outcome.stdout)).toEqual(['0', null])
      await dir.cleanup()
    })
    test('reports a command that cannot be spawned as a failure', async () => {
      const dir = await Tmp.dir({ unsafeCleanup: true })
      const runner = new ExecaCommandRunner(new RecordingLogger())
      const outcome = await runner.run('/no/such/executable-for-perf-test', [], { cwd: dir.path })
      expect(outcome.exitCode).not.toEqual(0)
      await dir.cleanup()
    })
  })
})
