import { BuildInvoker } from 'build-invoker'
import { CommandRunner } from 'command-runner'
import { Logger } from 'logger'
import { PerfTestConfig } from 'perf-types'
import { HgVcs } from 'vcs'

import { PerfTestOrchestrator } from './orchestrator.js'
import { RevisionDriver } from './revision-driver.js'
import { TargetBuilder } from './target-builder.js'

/**
 * Wires a performance test run. All external processes (hg, buck) go through `runner`.
 */
export function createPerfTest(
  config: PerfTestConfig,
  runner: CommandRunner,
  logger: Logger,
  // eslint-disable-next-line no-process-env
  baseEnv: NodeJS.ProcessEnv = process.env,
): PerfTestOrchestrator {
  const vcs = new HgVcs(runner, logger)
  const builder = new TargetBuilder(config, new BuildInvoker(config, runner, logger, baseEnv), logger)
  const driver = new RevisionDriver(config, vcs, builder, logger)
  return new PerfTestOrchestrator(config, vcs, builder, driver, logger)
}
