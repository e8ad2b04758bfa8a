import { Logger } from 'logger'
import * as path from 'path'
import { BuildResult, PerfTestConfig, Revision } from 'perf-types'
import { Vcs } from 'vcs'

import { RevisionDriver } from './revision-driver.js'
import { TargetBuilder } from './target-builder.js'

export interface PerfTestSummary {
  /**
   * All revisions considered, oldest first. The first one is only used for warming up the cache.
   */
  revisions: Revision[]
  testedRevisions: Revision[]
  /**
   * Result of the last build of the run.
   */
  finalResult: BuildResult
}

export class PerfTestOrchestrator {
  constructor(
    private readonly config: PerfTestConfig,
    private readonly vcs: Vcs,
    private readonly builder: TargetBuilder,
    private readonly driver: RevisionDriver,
    private readonly logger: Logger,
  ) {}

  async run(): Promise<PerfTestSummary> {
    const { repoUnderTest, projectUnderTest, revisionsToGoBack } = this.config
    this.logger.print('Running Performance Test!', 'high')
    await this.vcs.purge(repoUnderTest)

    const revisions = (await this.vcs.listRevisions(repoUnderTest, projectUnderTest, revisionsToGoBack + 1)).reverse()
    this.logger.print(`Found revisions to test: ${revisions.length}`)
    this.logger.print(revisions.join('\n'))
    const [first, ...rest] = revisions
    if (first === undefined) {
      throw new Error(`No revisions found under ${projectUnderTest || '.'} in ${repoUnderTest}`)
    }

    this.logger.print('=== Warming up cache ===', 'high')
    await this.vcs.checkout(repoUnderTest, first)
    let result = await this.warmUp(path.join(repoUnderTest, projectUnderTest))
    this.logger.print('=== Cache Warm!  Running tests ===', 'high')

    for (let i = 1; i < revisions.length; ++i) {
      result = await this.driver.testRevision(revisions, i, result)
    }

    this.logger.print(`Performance test completed: ${rest.length} revision(s) tested.`, 'high')
    return { revisions, testedRevisions: rest, finalResult: result }
  }

  /**
   * Builds with either side, with and without restricting buck to the dir cache, to work around cache weirdness in
   * first builds. Returns the result of the last build.
   */
  private async warmUp(cwd: string): Promise<BuildResult> {
    const common = { cacheMode: 'readwrite', logAsPerftest: false } as const
    await this.builder.buildAllTargets(cwd, { ...common, side: 'old', dirCacheOnly: false })
    await this.builder.buildAllTargets(cwd, { ...common, side: 'old', dirCacheOnly: true })
    await this.builder.buildAllTargets(cwd, { ...common, side: 'new', dirCacheOnly: false })
    return await this.builder.buildAllTargets(cwd, { ...common, side: 'new', dirCacheOnly: true })
  }
}
