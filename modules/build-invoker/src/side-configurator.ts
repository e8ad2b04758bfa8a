import * as fse from 'fs-extra'
import { Logger } from 'logger'
import * as os from 'os'
import * as path from 'path'
import { CacheMode, PerfTestConfig, Side } from 'perf-types'

import { BuckLayout, cacheDirName } from './buck-layout.js'

export interface SideOptions {
  side: Side
  cacheMode: CacheMode
  /**
   * Restricts Buck to the dir cache.
   */
  dirCacheOnly: boolean
}

export function buckConfigContent({ side, cacheMode, dirCacheOnly }: SideOptions): string {
  return [
    '[cache]',
    ...(dirCacheOnly ? ['  mode = dir'] : []),
    `  dir = ${cacheDirName(side)}`,
    `  dir_mode = ${cacheMode}`,
    '',
  ].join('\n')
}

/**
 * Points the build in `cwd` at one of the two buck versions. Each side gets a cache directory of its own. Both files are
 * overwritten unconditionally.
 */
export async function configureSide(config: PerfTestConfig, cwd: string, options: SideOptions, logger: Logger) {
  logger.print(`Reconfiguring to test ${options.side} version of buck.`)
  await fse.writeFile(path.join(cwd, BuckLayout.localConfig), buckConfigContent(options))
  const buckRevision = options.side === 'old' ? config.oldBuckRevision : config.newBuckRevision
  await fse.writeFile(path.join(cwd, BuckLayout.versionPin), buckRevision + os.EOL)
}
