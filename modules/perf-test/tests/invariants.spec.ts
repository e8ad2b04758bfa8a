import { RecordingLogger } from 'logger'
import { InvariantViolationError } from 'perf-errors'
import { BuildResult, Revision, RuleRecord } from 'perf-types'

import { checkCrossDirectoryReuse, checkNoOpBuild, suspectOutcomes } from '../src/invariants.js'

function rec(ruleName: string, outcome: string, fingerprint: string): RuleRecord {
  return { ruleName, outcome, fingerprint, description: `key of ${ruleName}@${fingerprint}` }
}

const result = (...records: RuleRecord[]) => new BuildResult(1000, records)

describe('invariants', () => {
  describe('suspectOutcomes', () => {
    test('anything other than DIR_HIT and IGNORED is suspect', () => {
      const r = result(rec('//a', 'DIR_HIT', '01'), rec('//b', 'IGNORED', '02'), rec('//c', 'MISS', '03'))
      expect(suspectOutcomes(r)).toEqual(['MISS'])
    })
  })
  describe('checkCrossDirectoryReuse', () => {
    const baseline = result(rec('//app:a', 'DIR_HIT', 'aa'), rec('//app:b', 'DIR_HIT', 'bb'))

    test('passes when every rule was a dir cache hit or ignored', () => {
      const logger = new RecordingLogger()
      const r = result(rec('//app:a', 'DIR_HIT', 'aa'), rec('//app:b', 'IGNORED', 'bb'))
      expect(() => checkCrossDirectoryReuse(r, baseline, Revision('r0'), logger)).not.toThrow()
      expect(logger.printed).toEqual([])
    })
    test('a miss is fatal, and the old and new rule keys of the missed rule are printed', () => {
      const logger = new RecordingLogger()
      const r = result(rec('//app:a', 'DIR_HIT', 'aa'), rec('//app:b', 'MISS', 'b2'))

      expect(() => checkCrossDirectoryReuse(r, baseline, Revision('r0'), logger)).toThrow(InvariantViolationError)
      expect(logger.printed).toEqual([
        'Building at revision r0 with the new buck version was unable to reuse the cache from a previous run. ' +
          'This suggests one of the rule keys contains an absolute path. Suspect cache results: {"MISS":["//app:b"]}',
        'Rule //app:b missed.',
        '\tOld Rule Key (bb): key of //app:b@bb.',
        '\tNew Rule Key (b2): key of //app:b@b2.',
      ])
    })
    test('a missed rule that is absent from the baseline is reported as such', () => {
      const logger = new RecordingLogger()
      const r = result(rec('//app:new', 'MISS', 'cc'))

      expect(() => checkCrossDirectoryReuse(r, baseline, Revision('r0'), logger)).toThrow(
        'Failed to reuse cache across directories!!!',
      )
      expect(logger.printed.slice(1)).toEqual([
        'Rule //app:new missed.',
        '\tOld Rule Key: <not built previously>.',
        '\tNew Rule Key (cc): key of //app:new@cc.',
      ])
    })
    test('a suspect outcome other than a miss is fatal as well', () => {
      const r = result(rec('//app:a', 'LOCAL_KEY_UNCHANGED_HIT', 'aa'))
      let caught: unknown
      try {
        checkCrossDirectoryReuse(r, baseline, Revision('r0'), new RecordingLogger())
      } catch (e) {
        caught = e
      }
      expect(caught).toBeInstanceOf(InvariantViolationError)
      expect(caught instanceof InvariantViolationError && caught.kind).toEqual('cross-directory-cache-miss')
    })
  })
  describe('checkNoOpBuild', () => {
    test('passes when all rules were local hits', () => {
      const r = result(rec('//app:a', 'LOCAL_KEY_UNCHANGED_HIT', 'aa'), rec('//app:b', 'LOCAL_KEY_UNCHANGED_HIT', 'bb'))
      expect(() => checkNoOpBuild(r, Revision('r1'))).not.toThrow()
    })
    test('tolerates dir cache hits', () => {
      const r = result(rec('//app:a', 'DIR_HIT', 'aa'), rec('//app:b', 'LOCAL_KEY_UNCHANGED_HIT', 'bb'))
      expect(() => checkNoOpBuild(r, Revision('r1'))).not.toThrow()
    })
    test('a miss is fatal, and the error lists the outcomes', () => {
      const r = result(
        rec('//app:a', 'DIR_HIT', 'aa'),
        rec('//app:b', 'LOCAL_KEY_UNCHANGED_HIT', 'bb'),
        rec('//app:c', 'MISS', 'cc'),
      )
      expect(() => checkNoOpBuild(r, Revision('r1'))).toThrow(
        'Doing a noop build at revision r1 with the new buck version did not hit all of its keys.\n' +
          'Missed Rules: {"LOCAL_KEY_UNCHANGED_HIT":["//app:b"],"MISS":["//app:c"]}',
      )
    })
    test('a build with nothing but dir cache hits is a violation', () => {
      expect(() => checkNoOpBuild(result(rec('//app:a', 'DIR_HIT', 'aa')), Revision('r1'))).toThrow(
        InvariantViolationError,
      )
    })
    test('an empty build is a violation', () => {
      expect(() => checkNoOpBuild(result(), Revision('r1'))).toThrow('Missed Rules: {}')
    })
  })
})
