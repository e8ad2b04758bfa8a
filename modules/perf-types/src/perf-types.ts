import { Brand } from './brand.js'

/**
 * An opaque identifier of a revision in the repo under test, as reported by the VCS.
 */
export type Revision = Brand<string, 'Revision'>

export function Revision(input: string): Revision {
  const trimmed = input.trim()
  if (trimmed.length === 0) {
    throw new Error(`Bad revision: <${input}>`)
  }
  // eslint-disable-next-line @typescript-eslint/consistent-type-assertions
  return trimmed as Revision
}

/**
 * Which of the two compared versions of the build tool a build (or a configuration) applies to.
 */
export type Side = 'old' | 'new'

export type CacheMode = 'readonly' | 'readwrite'

/**
 * A cache outcome tag, as emitted by the build tool (e.g., "DIR_HIT", "MISS"). The vocabulary is owned by the build
 * tool so this is deliberately an open string type. `CacheOutcomes` lists the tags this project refers to.
 */
export type CacheOutcome = string

export const CacheOutcomes = {
  DIR_HIT: 'DIR_HIT',
  LOCAL_KEY_UNCHANGED_HIT: 'LOCAL_KEY_UNCHANGED_HIT',
  MISS: 'MISS',
  IGNORED: 'IGNORED',
} as const

export type Fingerprint = string

export interface RuleKeyInfo {
  readonly fingerprint: Fingerprint
  readonly description: string
}

export interface RuleRecord extends RuleKeyInfo {
  readonly ruleName: string
  readonly outcome: CacheOutcome
}

/**
 * The outcome of a single build invocation.
 */
export class BuildResult {
  private readonly buckets: ReadonlyMap<CacheOutcome, readonly RuleRecord[]>
  private readonly ruleKeys: ReadonlyMap<string, RuleKeyInfo>

  /**
   * @param elapsedMillis wall clock duration of the build
   * @param records one record per finished rule, in completion log order
   */
  constructor(readonly elapsedMillis: number, records: readonly RuleRecord[]) {
    const buckets = new Map<CacheOutcome, RuleRecord[]>()
    const ruleKeys = new Map<string, RuleKeyInfo>()
    for (const r of records) {
      const bucket = buckets.get(r.outcome) ?? []
      bucket.push(r)
      buckets.set(r.outcome, bucket)
      // Last one wins when a rule shows up twice.
      ruleKeys.set(r.ruleName, { fingerprint: r.fingerprint, description: r.description })
    }
    this.buckets = buckets
    this.ruleKeys = ruleKeys
  }

  /**
   * The cache outcomes that occurred in this build, in order of first appearance.
   */
  outcomes(): CacheOutcome[] {
    return [...this.buckets.keys()]
  }

  rulesWith(outcome: CacheOutcome): readonly RuleRecord[] {
    return this.buckets.get(outcome) ?? []
  }

  ruleKeyOf(ruleName: string): RuleKeyInfo | undefined {
    return this.ruleKeys.get(ruleName)
  }

  get ruleCount(): number {
    return this.ruleKeys.size
  }

  cacheCounts(): Record<CacheOutcome, number> {
    return Object.fromEntries([...this.buckets].map(([k, v]) => [k, v.length]))
  }

  /**
   * Rule names per outcome, excluding the given outcomes.
   */
  describeOutcomes(...excluding: CacheOutcome[]): Record<CacheOutcome, string[]> {
    return Object.fromEntries(
      [...this.buckets].filter(([k]) => !excluding.includes(k)).map(([k, v]) => [k, v.map(r => r.ruleName)]),
    )
  }
}
