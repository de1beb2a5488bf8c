/**
 * Version comparison tests
 *
 * Ordering follows apk's version.c, quirks included.
 */

import { describe, it, expect } from 'vitest'
import {
  compare,
  validate,
  lt,
  gt,
  eq,
  lte,
  gte,
  sortVersions,
  rsortVersions,
  maxVersion,
  checkConstraint,
  removeOperators,
} from '../../../core/version'
import { ValidationError } from '../../../core/errors'

describe('validate', () => {
  it('should accept plain dotted versions', () => {
    expect(validate('1')).toBe(true)
    expect(validate('1.2.3')).toBe(true)
    expect(validate('20240101')).toBe(true)
  })

  it('should accept letters, suffixes and revisions', () => {
    expect(validate('1.0a1')).toBe(true)
    expect(validate('1.0_rc1')).toBe(true)
    expect(validate('1.0_beta2_p3-r4')).toBe(true)
    expect(validate('1.0.a')).toBe(true)
  })

  it('should reject a digit directly after an underscore', () => {
    expect(validate('6.0_1')).toBe(false)
  })

  it('should accept leading zeros in a dotted component', () => {
    expect(validate('6.0.0002')).toBe(true)
  })

  it('should reject leading zeros after a suffix separator', () => {
    expect(validate('6.0_0002')).toBe(false)
  })

  it('should reject unknown suffixes', () => {
    expect(validate('1.0_foo')).toBe(false)
  })

  it('should reject a bare dash', () => {
    expect(validate('1-2')).toBe(false)
  })

  it('should reject two letters in a row', () => {
    expect(validate('1.0ab')).toBe(false)
  })

  it('should reject a version starting with a letter', () => {
    expect(validate('abc')).toBe(false)
  })

  it('should reject components after the revision', () => {
    expect(validate('1.0-r1.2')).toBe(false)
  })

  it('should accept the empty string', () => {
    expect(validate('')).toBe(true)
  })
})

describe('compare', () => {
  it('should order numeric components numerically', () => {
    expect(compare('0.9', '0.10')).toBe(-1)
    expect(compare('0.10.1', '0.9.9')).toBe(1)
    expect(compare('2.0', '1.99')).toBe(1)
  })

  it('should return 0 for identical versions', () => {
    for (const v of ['1', '1.0', '1.0_rc1', '3.2_p1-r0', '1.0a']) {
      expect(compare(v, v)).toBe(0)
    }
  })

  it('should rank a longer version higher', () => {
    expect(compare('1', '1.0')).toBe(-1)
    expect(compare('1.0', '1')).toBe(1)
    expect(compare('1.2', '1.2.3')).toBe(-1)
    expect(compare('1.2.0', '1.2')).toBe(1)
  })

  it('should subtract one per leading zero', () => {
    expect(compare('01', '1')).toBe(0)
    expect(compare('1.01', '1.1')).toBe(-1)
    expect(compare('1.0.0002', '1.0.2')).toBe(-1)
    expect(compare('1.0.0002', '1.0.02')).toBe(-1)
  })

  it('should order suffixes by keyword', () => {
    expect(compare('1.0_alpha', '1.0_beta')).toBe(-1)
    expect(compare('1.0_pre1', '1.0_rc1')).toBe(-1)
    expect(compare('1.0_cvs', '1.0_p')).toBe(-1)
  })

  it('should rank a post-release suffix above the plain version', () => {
    expect(compare('1.0_p1', '1.0')).toBe(1)
    expect(compare('1.0_git20230101', '1.0')).toBe(1)
  })

  it('should rank a pre-release suffix above the plain version, as apk does here', () => {
    expect(compare('5.2.0_rc3', '5.2.0')).toBe(1)
    expect(compare('1.0_alpha', '1.0')).toBe(1)
  })

  it('should order revisions', () => {
    expect(compare('1.0-r1', '1.0-r2')).toBe(-1)
    expect(compare('1.0-r1', '1.0')).toBe(1)
    expect(compare('3.2_p1-r0', '3.2-r5')).toBe(1)
  })

  it('should order letters', () => {
    expect(compare('1.0a', '1.0b')).toBe(-1)
    expect(compare('1.0a', '1.0')).toBe(1)
  })

  it('should be antisymmetric', () => {
    const versions = ['1', '1.0', '0.9', '0.10', '1.0_rc1', '1.0_p1', '1.0-r3', '1.0a', '01', '1.01', '2']
    for (const a of versions) {
      for (const b of versions) {
        expect(compare(a, b)).toBe(-compare(b, a) || 0)
      }
    }
  })

  describe('fuzzy', () => {
    it('should treat versions differing only in length as equal', () => {
      expect(compare('1.2', '1.2.3', true)).toBe(0)
      expect(compare('1.0_rc1', '1.0_rc1_p1', true)).toBe(0)
      expect(compare('1.0-r1', '1.0', true)).toBe(0)
    })

    it('should still compare differing values', () => {
      expect(compare('2.0', '1.99', true)).toBe(1)
      expect(compare('1.0_alpha', '1.0_beta', true)).toBe(-1)
    })
  })
})

describe('comparison helpers', () => {
  it('should answer relational questions', () => {
    expect(lt('1.0', '1.1')).toBe(true)
    expect(gt('1.1', '1.0')).toBe(true)
    expect(eq('01', '1')).toBe(true)
    expect(lte('1.0', '1.0')).toBe(true)
    expect(gte('1.0', '1.1')).toBe(false)
  })

  it('should sort ascending and descending without mutating the input', () => {
    const input = ['1.10', '1.2', '1.0_p1', '1.0']
    expect(sortVersions(input)).toEqual(['1.0', '1.0_p1', '1.2', '1.10'])
    expect(rsortVersions(input)).toEqual(['1.10', '1.2', '1.0_p1', '1.0'])
    expect(input).toEqual(['1.10', '1.2', '1.0_p1', '1.0'])
  })

  it('should find the highest version', () => {
    expect(maxVersion(['0.9', '0.10', '0.2'])).toBe('0.10')
    expect(maxVersion([])).toBeNull()
  })

  it('should keep the first of equal versions', () => {
    expect(maxVersion(['1', '01'])).toBe('1')
  })
})

describe('checkConstraint', () => {
  it('should check inclusive bounds', () => {
    expect(checkConstraint('5.2.0', '>=5.2.0')).toBe(true)
    expect(checkConstraint('5.1.9', '>=5.2.0')).toBe(false)
    expect(checkConstraint('5.2.0', '<=5.2.0')).toBe(true)
  })

  it('should check exclusive bounds', () => {
    expect(checkConstraint('4.0', '<5.2.0')).toBe(true)
    expect(checkConstraint('6.0', '>5.2.0')).toBe(true)
    expect(checkConstraint('5.2.0', '>5.2.0')).toBe(false)
  })

  it('should follow apk for pre-release suffixes', () => {
    expect(checkConstraint('5.2.0_rc3', '<5.2.0')).toBe(false)
    expect(checkConstraint('5.2.0_rc3', '>=5.2.0')).toBe(true)
  })

  it('should check equality', () => {
    expect(checkConstraint('1.0', '=1.0')).toBe(true)
    expect(checkConstraint('1.0', '=1')).toBe(false)
  })

  it('should match a prefix with ~', () => {
    expect(checkConstraint('1.2.3', '~1.2')).toBe(true)
    expect(checkConstraint('1.3', '~1.2')).toBe(false)
  })

  it('should throw without an operator', () => {
    expect(() => checkConstraint('1.0', '1.0')).toThrow(ValidationError)
    expect(() => checkConstraint('1.0', '1.0')).toThrow("Could not find operator and version in '1.0'")
  })

  it('should throw without a version', () => {
    expect(() => checkConstraint('1.0', '>=')).toThrow(ValidationError)
  })
})

describe('removeOperators', () => {
  it('should strip constraints', () => {
    expect(removeOperators('foo>=1.2')).toBe('foo')
    expect(removeOperators('so:libc.musl-x86_64.so.1=1')).toBe('so:libc.musl-x86_64.so.1')
    expect(removeOperators('bar~2')).toBe('bar')
    expect(removeOperators('baz<3')).toBe('baz')
  })

  it('should leave bare names alone', () => {
    expect(removeOperators('cmd:sh')).toBe('cmd:sh')
  })
})
