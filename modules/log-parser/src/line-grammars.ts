/**
 * Line grammars of Buck's log output. These are an external contract: when Buck changes its log format, this is the
 * only file that needs to follow.
 */

/**
 * A line of buck-out/bin/build.log reporting a finished rule. May appear anywhere in the line.
 */
export const RULE_FINISHED_LINE =
  /BuildRuleFinished\((?<ruleName>[\w\-:#\/,]+)\): (?<result>[A-Z_]+) (?<cacheResult>[A-Z_]+) (?<successType>[A-Z_]+) (?<fingerprint>[0-9a-f]*)/

/**
 * A rule key line as printed to the console by `buck build -v 5`.
 */
export const CONSOLE_RULE_KEY_LINE = /^INFO: RuleKey (?<fingerprint>[0-9a-f]*)=(?<description>.*)$/

/**
 * A rule key line in Buck's java.util.logging output (buck-out/log/buck-0.log), e.g.:
 *
 *   [2026-10-18 09:12:44.120][debug][command:5f0c...][tid:83][com.facebook.buck.rules.RuleKey$Builder] RuleKey 4e1a...=...
 */
export const VERBOSE_LOG_RULE_KEY_LINE =
  /^.*\[[\w ]+\](?:\[command:[0-9a-f-]+\])?\[tid:\d+\]\[com\.facebook\.buck\.rules\.RuleKey[$.]?Builder\] RuleKey (?<fingerprint>[0-9a-f]+)=(?<description>.*)$/

export type RuleKeyGrammar = 'verbose-log' | 'console'

export const ruleKeyGrammars: Record<RuleKeyGrammar, RegExp> = {
  'verbose-log': VERBOSE_LOG_RULE_KEY_LINE,
  console: CONSOLE_RULE_KEY_LINE,
}
