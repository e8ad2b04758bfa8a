import * as fse from 'fs-extra'
import { Logger } from 'logger'

/**
 * Renames `from` to `to`, runs `body` and renames `to` back to `from`. The rename back happens also when `body` fails,
 * so that a failed run leaves the repo where it was.
 */
export async function withRelocatedDir<T>(
  from: string,
  to: string,
  logger: Logger,
  body: (relocated: string) => Promise<T>,
): Promise<T> {
  if (await fse.pathExists(to)) {
    throw new Error(`Cannot rename ${from} to ${to}: destination already exists`)
  }
  logger.print(`Renaming ${from} to ${to}`)
  await fse.rename(from, to)
  try {
    return await body(to)
  } finally {
    logger.print(`Renaming ${to} to ${from}`)
    await fse.rename(to, from)
  }
}
