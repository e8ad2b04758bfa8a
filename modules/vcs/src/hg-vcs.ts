import { CommandRunner, runOrFail } from 'command-runner'
import { Logger } from 'logger'
import { Revision } from 'perf-types'

import { Vcs } from './vcs.js'

/**
 * Mercurial flavor of the Vcs interface.
 */
export class HgVcs implements Vcs {
  constructor(private readonly runner: CommandRunner, private readonly logger: Logger, private readonly hg = 'hg') {}

  async listRevisions(repoRoot: string, pathInRepo: string, limit: number): Promise<Revision[]> {
    const args = ['log', '--limit', String(limit), '-T', '{node}\\n']
    // Only look for changes under the given path.
    if (pathInRepo) {
      args.push(pathInRepo)
    }
    const { stdout } = await this.hgCommand(repoRoot, args)
    return stdout
      .split('\n')
      .filter(line => line.trim().length > 0)
      .map(line => Revision(line))
  }

  async checkout(repoRoot: string, revision: Revision) {
    this.logger.print(`Checking out ${revision}.`)
    await this.hgCommand(repoRoot, ['update', '--clean', revision])
  }

  async revert(repoRoot: string, revision: Revision) {
    this.logger.print(`Reverting to ${revision}.`, 'low')
    await this.hgCommand(repoRoot, ['revert', '-a', '-r', revision])
  }

  async purge(repoRoot: string) {
    this.logger.print('Running hg purge.')
    await this.hgCommand(repoRoot, ['purge', '--all'])
  }

  private async hgCommand(cwd: string, args: string[]) {
    return await runOrFail(this.runner, this.logger, this.hg, args, { cwd })
  }
}
