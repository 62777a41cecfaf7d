import {
  isWithinDateRange,
  parseDateFilter,
  pastCutoff,
} from '../../../../src/services/filter/date-filter.js'
import { FilterError } from '../../../../src/types/errors.js'
import type { DateFilter } from '../../../../src/types/filter.types.js'
import { describe, expect, it } from 'vitest'

const NOW = new Date('2024-06-15T12:00:00.000Z')

function parse(expression: string): DateFilter {
  const filter = parseDateFilter(expression)
  if (!filter) throw new Error(`"${expression}" parsed to no filter`)
  return filter
}

describe('date-filter', () => {
  describe('parseDateFilter', () => {
    it('should return null for missing or blank expressions', () => {
      expect(parseDateFilter(undefined)).toBeNull()
      expect(parseDateFilter('  ')).toBeNull()
    })

    it('should parse a past window', () => {
      expect(parse('past:3d')).toEqual({
        expression: 'past:3d',
        past: { amount: 3, unit: 'd' },
      })
    })

    it('should parse since and until at UTC midnight', () => {
      const filter = parse('since:2024-06-01 until:2024-06-10')

      expect(filter.since?.toISOString()).toBe('2024-06-01T00:00:00.000Z')
      expect(filter.until?.toISOString()).toBe('2024-06-10T00:00:00.000Z')
      expect(filter.past).toBeUndefined()
    })

    it.each([
      ['yesterday', 'Unrecognized date filter token "yesterday"'],
      ['past:3w', 'Unrecognized date filter token "past:3w"'],
      ['past:0d', '"past:0d" must use a positive amount'],
      ['since:2024-02-30', 'Invalid calendar date in "since:2024-02-30"'],
      ['since:2024/06/01', 'Unrecognized date filter token "since:2024/06/01"'],
      [
        'since:2024-06-10 until:2024-06-01',
        '"since" must not be later than "until"',
      ],
    ])('should reject %s', (expression, message) => {
      expect(() => parseDateFilter(expression)).toThrow(FilterError)
      expect(() => parseDateFilter(expression)).toThrow(message)
    })
  })

  describe('pastCutoff', () => {
    it.each([
      ['past:6h', '2024-06-15T06:00:00.000Z'],
      ['past:2d', '2024-06-13T12:00:00.000Z'],
      ['past:1m', '2024-05-16T12:00:00.000Z'],
      ['past:1y', '2023-06-16T12:00:00.000Z'],
    ])('should compute the cutoff for %s', (expression, expected) => {
      expect(pastCutoff(parse(expression), NOW)?.toISOString()).toBe(expected)
    })

    it('should be undefined without a past rule', () => {
      expect(pastCutoff(parse('since:2024-06-01'), NOW)).toBeUndefined()
    })
  })

  describe('isWithinDateRange', () => {
    it('should keep items inside the past window and drop older ones', () => {
      const filter = parse('past:1d')

      expect(
        isWithinDateRange(filter, new Date('2024-06-15T11:00:00Z'), NOW),
      ).toBe(true)
      expect(
        isWithinDateRange(filter, new Date('2024-06-14T12:00:00Z'), NOW),
      ).toBe(true)
      expect(
        isWithinDateRange(filter, new Date('2024-06-14T11:59:59Z'), NOW),
      ).toBe(false)
    })

    it('should let past decide alone when since is also given', () => {
      const filter = parse('since:2024-06-15 past:2d')

      expect(
        isWithinDateRange(filter, new Date('2024-06-14T00:00:00Z'), NOW),
      ).toBe(true)
    })

    it('should apply inclusive since and until bounds', () => {
      const filter = parse('since:2024-06-01 until:2024-06-10')

      expect(
        isWithinDateRange(filter, new Date('2024-06-01T00:00:00Z'), NOW),
      ).toBe(true)
      expect(
        isWithinDateRange(filter, new Date('2024-06-10T00:00:00Z'), NOW),
      ).toBe(true)
      expect(
        isWithinDateRange(filter, new Date('2024-05-31T23:59:59Z'), NOW),
      ).toBe(false)
      expect(
        isWithinDateRange(filter, new Date('2024-06-10T00:00:01Z'), NOW),
      ).toBe(false)
    })

    it('should exclude items with unknown dates', () => {
      expect(isWithinDateRange(parse('past:1y'), null, NOW)).toBe(false)
      expect(isWithinDateRange(parse('since:2000-01-01'), null, NOW)).toBe(
        false,
      )
    })
  })
})
