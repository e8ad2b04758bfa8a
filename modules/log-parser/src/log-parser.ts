import { LogInconsistencyError } from 'perf-errors'
import { Fingerprint, RuleRecord } from 'perf-types'

import { RULE_FINISHED_LINE, RuleKeyGrammar, ruleKeyGrammars } from './line-grammars.js'

function lines(text: string): string[] {
  return text.split(/\r?\n/)
}

/**
 * Extracts a fingerprint -> description mapping from the given text, using a single grammar. When a fingerprint is
 * logged more than once, the last description wins.
 */
export function parseRuleKeyDescriptions(text: string, grammar: RuleKeyGrammar): Map<Fingerprint, string> {
  const pattern = ruleKeyGrammars[grammar]
  const ret = new Map<Fingerprint, string>()
  for (const line of lines(text)) {
    const groups = pattern.exec(line)?.groups
    if (groups === undefined) {
      continue
    }
    ret.set(groups.fingerprint, groups.description)
  }
  return ret
}

/**
 * Extracts one record per "BuildRuleFinished" line of the completion log. Every fingerprint must have a description in
 * `descriptions`.
 */
export function parseRuleRecords(completionLog: string, descriptions: ReadonlyMap<Fingerprint, string>): RuleRecord[] {
  const ret: RuleRecord[] = []
  for (const line of lines(completionLog)) {
    const groups = RULE_FINISHED_LINE.exec(line.trim())?.groups
    if (groups === undefined) {
      continue
    }
    const { ruleName, cacheResult, fingerprint } = groups
    const description = descriptions.get(fingerprint)
    if (description === undefined) {
      throw new LogInconsistencyError(
        `build.log contains an entry which was not found in the rule key log. Rule: ${ruleName}, rule key: ${fingerprint}`,
        ruleName,
        fingerprint,
      )
    }
    ret.push({ ruleName, outcome: cacheResult, fingerprint, description })
  }
  return ret
}

export interface BuildLogs {
  /**
   * Content of the completion log (buck-out/bin/build.log).
   */
  completionLog: string
  /**
   * Content of the verbose tool log (buck-out/log/buck-0.log), or undefined if the build did not produce one.
   */
  verboseLog: string | undefined
  /**
   * Combined stdout/stderr of the build invocation.
   */
  consoleOutput: string
}

export interface ParsedBuildLogs {
  records: RuleRecord[]
  ruleKeySource: RuleKeyGrammar
}

/**
 * Parses the logs of a single build. Rule key descriptions come from the verbose log when there is one, and from the
 * console output otherwise (never from both).
 */
export function parseBuildLogs(logs: BuildLogs): ParsedBuildLogs {
  const ruleKeySource: RuleKeyGrammar = logs.verboseLog === undefined ? 'console' : 'verbose-log'
  const descriptions = parseRuleKeyDescriptions(logs.verboseLog ?? logs.consoleOutput, ruleKeySource)
  return { records: parseRuleRecords(logs.completionLog, descriptions), ruleKeySource }
}
