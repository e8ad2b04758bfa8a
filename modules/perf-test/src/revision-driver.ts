import { Logger } from 'logger'
import { failMe } from 'misc'
import * as path from 'path'
import { BuildResult, CacheMode, PerfTestConfig, Revision } from 'perf-types'
import { Vcs } from 'vcs'

import { checkCrossDirectoryReuse, checkNoOpBuild } from './invariants.js'
import { withRelocatedDir } from './relocate.js'
import { TargetBuilder } from './target-builder.js'

export class RevisionDriver {
  constructor(
    private readonly config: PerfTestConfig,
    private readonly vcs: Vcs,
    private readonly builder: TargetBuilder,
    private readonly logger: Logger,
  ) {}

  relocatedRootOf(index: number) {
    const repo = this.config.repoUnderTest
    return path.join(path.dirname(repo), `${path.basename(repo)}_test_iteration_${index}`)
  }

  /**
   * Tests `revisions[index]`. The repo is expected to be at `revisions[index - 1]`, with `baseline` being the result of
   * the last build there. Returns the result of the final (no-op) build, which becomes the baseline for the next
   * revision.
   */
  async testRevision(revisions: readonly Revision[], index: number, baseline: BuildResult): Promise<BuildResult> {
    const revision = revisions[index] ?? failMe(`no revision at index ${index}`)
    const previous = revisions[index - 1] ?? failMe(`no revision before index ${index}`)
    this.logger.print(`=== Running tests at revision ${revision} ===`, 'high')

    // Builds in a renamed directory: rule keys that depend on the location of the repo show up as cache misses.
    return await withRelocatedDir(this.config.repoUnderTest, this.relocatedRootOf(index), this.logger, async root => {
      const cwd = path.join(root, this.config.projectUnderTest)

      this.logger.print('== Checking new revision for problems with absolute paths ==')
      const relocated = await this.builder.buildAllTargets(cwd, { side: 'new', cacheMode: 'readonly' })
      checkCrossDirectoryReuse(relocated, baseline, previous, this.logger)

      await this.vcs.checkout(root, revision)

      // Only the last iteration writes to the cache.
      let cacheMode: CacheMode = 'readonly'
      for (let attempt = 0; attempt < this.config.iterationsPerDiff; ++attempt) {
        cacheMode = attempt === this.config.iterationsPerDiff - 1 ? 'readwrite' : 'readonly'
        await this.builder.buildAllTargets(cwd, { side: 'old', cacheMode })
        await this.builder.buildAllTargets(cwd, { side: 'new', cacheMode })
      }

      this.logger.print('== Checking new revision to ensure noop build does nothing. ==')
      const noop = await this.builder.buildAllTargets(cwd, { side: 'new', cacheMode, runClean: false })
      checkNoOpBuild(noop, revision)
      return noop
    })
  }
}
