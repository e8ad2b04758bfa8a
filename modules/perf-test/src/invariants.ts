import { Logger } from 'logger'
import { InvariantViolationError } from 'perf-errors'
import { BuildResult, CacheOutcome, CacheOutcomes, Revision } from 'perf-types'

const REUSED_ACROSS_DIRECTORIES: readonly CacheOutcome[] = [CacheOutcomes.DIR_HIT, CacheOutcomes.IGNORED]

/**
 * Outcomes of a build in a renamed directory which indicate that something was not fetched from the dir cache.
 */
export function suspectOutcomes(result: BuildResult): CacheOutcome[] {
  return result.outcomes().filter(at => !REUSED_ACROSS_DIRECTORIES.includes(at))
}

/**
 * Checks that a build in a renamed directory was served entirely from the dir cache. Otherwise, prints the old and new
 * rule keys of every missed rule (a rule key that includes an absolute path is the usual suspect) and throws.
 *
 * @param result the build in the renamed directory
 * @param baseline the previous build of the same tree (before the rename)
 * @param revision the revision that was built
 */
export function checkCrossDirectoryReuse(
  result: BuildResult,
  baseline: BuildResult,
  revision: Revision,
  logger: Logger,
): void {
  const suspects = suspectOutcomes(result)
  if (suspects.length === 0) {
    return
  }

  logger.print(
    `Building at revision ${revision} with the new buck version was unable to reuse the cache from a previous run. ` +
      `This suggests one of the rule keys contains an absolute path. Suspect cache results: ${JSON.stringify(
        result.describeOutcomes(...REUSED_ACROSS_DIRECTORIES),
      )}`,
    'high',
  )
  for (const rule of result.rulesWith(CacheOutcomes.MISS)) {
    const old = baseline.ruleKeyOf(rule.ruleName)
    logger.print(`Rule ${rule.ruleName} missed.`, 'high')
    logger.print(
      old ? `\tOld Rule Key (${old.fingerprint}): ${old.description}.` : `\tOld Rule Key: <not built previously>.`,
      'high',
    )
    logger.print(`\tNew Rule Key (${rule.fingerprint}): ${rule.description}.`, 'high')
  }
  throw new InvariantViolationError('Failed to reuse cache across directories!!!', 'cross-directory-cache-miss')
}

/**
 * Checks that a build of an unchanged tree found every one of its rule keys locally. Dir cache hits are tolerated;
 * anything else (or nothing at all) is a violation.
 */
export function checkNoOpBuild(result: BuildResult, revision: Revision): void {
  const remaining = result.outcomes().filter(at => at !== CacheOutcomes.DIR_HIT)
  if (remaining.length === 1 && remaining[0] === CacheOutcomes.LOCAL_KEY_UNCHANGED_HIT) {
    return
  }

  throw new InvariantViolationError(
    `Doing a noop build at revision ${revision} with the new buck version did not hit all of its keys.\n` +
      `Missed Rules: ${JSON.stringify(result.describeOutcomes(CacheOutcomes.DIR_HIT))}`,
    'noop-build-did-work',
  )
}
