import {
  filterableText,
  matchesAdvancedFilter,
  parseAdvancedFilter,
} from '../../../../src/services/filter/advanced-filter.js'
import { FilterError } from '../../../../src/types/errors.js'
import type { AdvancedFilter } from '../../../../src/types/filter.types.js'
import type { NewsItem } from '../../../../src/types/news.types.js'
import { describe, expect, it } from 'vitest'

function parse(expression: string): AdvancedFilter {
  const filter = parseAdvancedFilter(expression)
  if (!filter) throw new Error(`"${expression}" parsed to no filter`)
  return filter
}

describe('advanced-filter', () => {
  describe('parseAdvancedFilter', () => {
    it('should return null for missing or blank expressions', () => {
      expect(parseAdvancedFilter(undefined)).toBeNull()
      expect(parseAdvancedFilter('')).toBeNull()
      expect(parseAdvancedFilter('   ')).toBeNull()
    })

    it('should parse words, phrases and prefixes into one group', () => {
      const filter = parse('+Apple "Space Launch" -rumor')

      expect(filter.groups).toHaveLength(1)
      expect(filter.groups[0]).toEqual([
        { negate: false, atom: { kind: 'text', value: 'apple' } },
        { negate: false, atom: { kind: 'text', value: 'space launch' } },
        { negate: true, atom: { kind: 'text', value: 'rumor' } },
      ])
    })

    it('should split groups on standalone uppercase OR', () => {
      const filter = parse('apple OR banana cherry')

      expect(filter.groups).toHaveLength(2)
      expect(filter.groups[0]).toHaveLength(1)
      expect(filter.groups[1]).toHaveLength(2)
    })

    it('should treat lowercase or as a word', () => {
      const filter = parse('apple or banana')

      expect(filter.groups).toHaveLength(1)
      expect(filter.groups[0]).toHaveLength(3)
    })

    it('should compile regex atoms with the unicode flag', () => {
      const filter = parse('/^breaking\\b/')
      const atom = filter.groups[0][0].atom

      expect(atom.kind).toBe('regex')
      if (atom.kind === 'regex') {
        expect(atom.pattern).toBe('^breaking\\b')
        expect(atom.regex.flags).toBe('iu')
      }
    })

    it('should accept a trailing i flag on a regex', () => {
      const filter = parse('/launch/i -delay')

      expect(filter.groups).toHaveLength(1)
      expect(filter.groups[0]).toHaveLength(2)
      const atom = filter.groups[0][0].atom
      expect(atom.kind === 'regex' && atom.pattern).toBe('launch')
      expect(matchesAdvancedFilter(filter, 'Rocket Launch')).toBe(true)
    })

    it('should keep an escaped slash inside a regex', () => {
      const filter = parse('/a\\/b/')
      const atom = filter.groups[0][0].atom

      expect(atom.kind === 'regex' && atom.pattern).toBe('a\\/b')
    })

    it.each([
      ['"unterminated', 'Unterminated quoted phrase'],
      ['/unterminated', 'Unterminated regular expression'],
      ['""', 'Empty quoted phrase'],
      ['OR apple', '"OR" must sit between two terms'],
      ['apple OR', '"OR" must sit between two terms'],
      ['apple OR OR banana', '"OR" must sit between two terms'],
      ['apple - banana', 'Operator "-" must be followed by a term'],
      ['/(a+)+$/', 'Unsafe or invalid regular expression'],
      ['/[/', 'Unsafe or invalid regular expression'],
      ['"a b"c', 'Unexpected "c" at position 5'],
      ['/launch/g', 'Unexpected "g" at position 8'],
      ['/launch/ix', 'Unexpected "x" at position 9'],
    ])('should reject %s', (expression, message) => {
      expect(() => parseAdvancedFilter(expression)).toThrow(FilterError)
      expect(() => parseAdvancedFilter(expression)).toThrow(message)
    })

    it('should carry the expression on the error', () => {
      try {
        parseAdvancedFilter('  "open  ')
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(FilterError)
        if (error instanceof FilterError) {
          expect(error.expression).toBe('"open')
          expect(error.code).toBe('FILTER_ERROR')
        }
      }
    })
  })

  describe('matchesAdvancedFilter', () => {
    it('should match words as case-insensitive substrings', () => {
      const filter = parse('launch')

      expect(matchesAdvancedFilter(filter, 'Rocket LAUNCHES today')).toBe(true)
      expect(matchesAdvancedFilter(filter, 'Rocket delayed')).toBe(false)
    })

    it('should require every term of a group', () => {
      const filter = parse('apple +earnings')

      expect(matchesAdvancedFilter(filter, 'Apple earnings beat')).toBe(true)
      expect(matchesAdvancedFilter(filter, 'Apple unveils phone')).toBe(false)
    })

    it('should exclude negated terms', () => {
      const filter = parse('apple -rumor')

      expect(matchesAdvancedFilter(filter, 'Apple ships update')).toBe(true)
      expect(matchesAdvancedFilter(filter, 'Apple rumor mill')).toBe(false)
    })

    it('should pass when any OR group holds', () => {
      const filter = parse('apple -rumor OR "space launch"')

      expect(matchesAdvancedFilter(filter, 'Apple rumor mill')).toBe(false)
      expect(matchesAdvancedFilter(filter, 'Apple rumor on space launch')).toBe(
        true,
      )
      expect(matchesAdvancedFilter(filter, 'Weather report')).toBe(false)
    })

    it('should match phrases only as a whole', () => {
      const filter = parse('"space launch"')

      expect(matchesAdvancedFilter(filter, 'launch into space')).toBe(false)
      expect(matchesAdvancedFilter(filter, 'A Space Launch window')).toBe(true)
    })

    it('should evaluate regex atoms', () => {
      const filter = parse('/^breaking\\b/ -/sports?/')

      expect(matchesAdvancedFilter(filter, 'Breaking: markets fall')).toBe(true)
      expect(matchesAdvancedFilter(filter, 'Breaking: sport results')).toBe(
        false,
      )
      expect(matchesAdvancedFilter(filter, 'Not breaking news')).toBe(false)
    })

    it('should match non-ASCII text', () => {
      const filter = parse('속보 -광고')

      expect(matchesAdvancedFilter(filter, '[속보] 국회 본회의 통과')).toBe(true)
      expect(matchesAdvancedFilter(filter, '속보 광고 안내')).toBe(false)
    })
  })

  describe('filterableText', () => {
    const item: NewsItem = {
      guid: 'g-1',
      title: 'Budget passes',
      link: 'https://news.example.com/1',
      pubDate: null,
      related: [],
    }

    it('should use the title alone when there is no source', () => {
      expect(filterableText(item)).toBe('Budget passes')
    })

    it('should append the publisher name', () => {
      expect(filterableText({ ...item, source: 'Example Times' })).toBe(
        'Budget passes Example Times',
      )
    })
  })
})
