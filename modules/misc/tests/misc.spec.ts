import { computeHash, splitAll } from '../src/misc.js'

describe('misc', () => {
  describe('computeHash', () => {
    test('is deterministic', () => {
      expect(computeHash('//app:lib')).toEqual(computeHash('//app:lib'))
    })
    test('produces a 224 bit hex string', () => {
      expect(computeHash('x')).toMatch(/^[0-9a-f]{56}$/)
    })
  })
  describe('splitAll', () => {
    test('splits each item on commas and flattens', () => {
      expect(splitAll(['//a:x,//b:y', '//c:z'])).toEqual(['//a:x', '//b:y', '//c:z'])
    })
    test('drops blank items and trims', () => {
      expect(splitAll(['//a:x, ,', ' //c:z '])).toEqual(['//a:x', '//c:z'])
    })
  })
})
