import * as fse from 'fs-extra'
import * as os from 'os'
import * as path from 'path'
import { ConfigError } from 'perf-errors'
import { FakeBuck } from 'perf-testkit'
import * as Tmp from 'tmp-promise'

import { main, parseCommandLine } from '../src/index.js'

const required = [
  '--perftest-id=nightly',
  '--revisions-to-go-back=5',
  '--iterations-per-diff=2',
  '--targets-to-build=//app:bin,//app:lib',
  '--targets-to-build=//lib:core',
  '--repo-under-test=/work/repo',
  '--project-under-test=app',
  '--path-to-buck=/opt/buck/bin/buck',
  '--old-buck-revision=old-sha',
  '--new-buck-revision=new-sha',
]

function withOption(name: string, value: string) {
  return [...required.filter(at => !at.startsWith(`--${name}=`)), `--${name}=${value}`]
}

describe('parseCommandLine', () => {
  test('builds the configuration from the command line', () => {
    const { config, logFile, criticality } = parseCommandLine(required)
    expect(config).toEqual({
      perftestId: 'nightly',
      revisionsToGoBack: 5,
      iterationsPerDiff: 2,
      targetsToBuild: ['//app:bin,//app:lib', '//lib:core'],
      repoUnderTest: '/work/repo',
      projectUnderTest: 'app',
      pathToBuck: '/opt/buck/bin/buck',
      oldBuckRevision: 'old-sha',
      newBuckRevision: 'new-sha',
    })
    expect(logFile).toEqual(path.join(os.tmpdir(), 'buck-perf-test-nightly.log'))
    expect(criticality).toEqual('moderate')
  })
  test('the configuration is frozen', () => {
    const { config } = parseCommandLine(required)
    expect(Object.isFrozen(config)).toBe(true)
  })
  test('resolves a relative repo path', () => {
    const { config } = parseCommandLine(withOption('repo-under-test', 'relative/repo'))
    expect(config.repoUnderTest).toEqual(path.resolve('relative/repo'))
  })
  test('takes an explicit log file and loudness', () => {
    const { logFile, criticality } = parseCommandLine([...required, '--log-file=/var/log/perf.log', '--loudness=s'])
    expect(logFile).toEqual('/var/log/perf.log')
    expect(criticality).toEqual('high')
  })
  test('fails on a missing required option', () => {
    const args = required.filter(at => !at.startsWith('--path-to-buck'))
    expect(() => parseCommandLine(args)).toThrow(ConfigError)
    expect(() => parseCommandLine(args)).toThrow('path-to-buck')
  })
  test('fails on an unknown option', () => {
    expect(() => parseCommandLine([...required, '--bogus-flag=1'])).toThrow(ConfigError)
  })
  test('fails on a non positive iteration count', () => {
    expect(() => parseCommandLine(withOption('iterations-per-diff', '0'))).toThrow(
      'Invalid command line: iterationsPerDiff: Number must be greater than 0',
    )
  })
  test('fails on a non numeric revision count', () => {
    expect(() => parseCommandLine(withOption('revisions-to-go-back', 'many'))).toThrow(ConfigError)
  })
})

describe('main', () => {
  const exitCodeBefore = process.exitCode
  afterEach(() => {
    process.exitCode = exitCodeBefore
    jest.restoreAllMocks()
  })

  async function setup(failingBuild?: number) {
    const base = (await Tmp.dir({ unsafeCleanup: true })).path
    const repo = path.join(base, 'repo')
    await fse.outputFile(path.join(repo, 'app', 'BUCK'), 'java_binary()')
    const buck = new FakeBuck({
      pathToBuck: '/opt/buck/bin/buck',
      projectUnderTest: 'app',
      revisions: ['r0', 'r1'],
      rules: ['//app:lib'],
      failingBuild,
    })
    const argv = [
      ...required.filter(at => !/^--(repo-under-test|targets-to-build|iterations-per-diff)=/.test(at)),
      `--repo-under-test=${repo}`,
      '--targets-to-build=//app:lib',
      '--iterations-per-diff=1',
      `--log-file=${path.join(base, 'perf.log')}`,
      '--loudness=s',
    ]
    return { buck, argv }
  }

  test('a bad command line is reported on stderr before any process is started', async () => {
    const stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true)
    const createRunner = jest.fn()

    await main(required.filter(at => !at.startsWith('--path-to-buck')), createRunner)

    expect(process.exitCode).toEqual(1)
    expect(createRunner).not.toHaveBeenCalled()
    expect(stderr).toHaveBeenCalledTimes(1)
    expect(String(stderr.mock.calls[0][0])).toContain('path-to-buck')
  })
  test('a failed run sets a non-zero exit code', async () => {
    const { buck, argv } = await setup(1)

    await main(argv, () => buck)

    expect(process.exitCode).toEqual(1)
    expect(buck.builds).toHaveLength(1)
  })
  test('a successful run leaves the exit code untouched', async () => {
    const { buck, argv } = await setup()

    await main(argv, () => buck)

    expect(process.exitCode).toEqual(exitCodeBefore)
    // 4 warm-up builds, then the relocation check, one iteration per side and the no-op build
    expect(buck.builds).toHaveLength(8)
  })
})
