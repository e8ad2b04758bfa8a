import * as path from 'path'

/**
 * Files Buck reads or writes, relative to the directory a build runs in.
 */
export const BuckLayout = {
  loggingConfig: '.bucklogging.local.properties',
  localConfig: '.buckconfig.local',
  versionPin: '.buckversion',
  completionLog: path.join('buck-out', 'bin', 'build.log'),
  verboseLog: path.join('buck-out', 'log', 'buck-0.log'),
} as const

export function cacheDirName(side: string) {
  return `buck-cache-${side}`
}
