import { BuildInvoker, configureSide } from 'build-invoker'
import { Logger } from 'logger'
import { splitAll } from 'misc'
import { BuildResult, CacheMode, PerfTestConfig, Side } from 'perf-types'

export interface BuildAllOptions {
  side: Side
  cacheMode: CacheMode
  /**
   * Whether to run `buck clean` first. Defaults to true.
   */
  runClean?: boolean
  /**
   * Defaults to true.
   */
  dirCacheOnly?: boolean
  /**
   * Defaults to true.
   */
  logAsPerftest?: boolean
}

/**
 * Builds all targets of the performance test with one of the two buck versions.
 */
export class TargetBuilder {
  readonly targets: readonly string[]

  constructor(
    private readonly config: PerfTestConfig,
    private readonly invoker: BuildInvoker,
    private readonly logger: Logger,
  ) {
    this.targets = splitAll(config.targetsToBuild)
  }

  async buildAllTargets(cwd: string, options: BuildAllOptions): Promise<BuildResult> {
    const { side, cacheMode, runClean = true, dirCacheOnly = true, logAsPerftest = true } = options
    await configureSide(this.config, cwd, { side, cacheMode, dirCacheOnly }, this.logger)
    if (runClean) {
      await this.invoker.clean(cwd)
    }
    return await this.invoker.build({ cwd, targets: this.targets, side, logAsPerftest })
  }
}
