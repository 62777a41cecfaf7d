/**
 * Advanced Filter
 *
 * Keyword rules evaluated against an item's title and publisher name.
 *
 * Grammar:
 *
 *   expression := group ( "OR" group )*
 *   group      := term+              terms in a group must all hold
 *   term       := [ "+" | "-" ] atom "-" means the atom must not match
 *   atom       := word | "quoted phrase" | /regex/ | /regex/i
 *
 * Words and phrases match as case-insensitive substrings. Regexes are
 * compiled with the i and u flags. An item passes when any group holds.
 *
 * @example
 * parseAdvancedFilter('apple -rumor OR "space launch"')
 * // (contains "apple" AND NOT "rumor") OR contains "space launch"
 */

import type {
  AdvancedFilter,
  FilterAtom,
  FilterTerm,
} from '../../types/filter.types.js'
import type { NewsItem } from '../../types/news.types.js'
import { FilterError } from '../../types/errors.js'
import { compileSafeRegex } from '../../utils/regex-safety.js'

type Token =
  | { type: 'or' }
  | { type: 'term'; negate: boolean; atom: FilterAtom }

function isWhitespace(char: string): boolean {
  return /\s/.test(char)
}

/**
 * Ensures a quoted phrase or regex is followed by whitespace or the end of
 * the expression.
 */
function requireBoundary(expression: string, end: number): number {
  if (end < expression.length && !isWhitespace(expression[end])) {
    throw new FilterError(
      `Unexpected "${expression[end]}" at position ${end}, terms must be separated by spaces`,
      expression,
    )
  }
  return end
}

/**
 * Reads the atom starting at `start` and returns it with the index just past it.
 */
function readAtom(
  expression: string,
  start: number,
): { atom: FilterAtom; end: number } {
  const opener = expression[start]

  if (opener === '"') {
    const close = expression.indexOf('"', start + 1)
    if (close === -1) {
      throw new FilterError(
        `Unterminated quoted phrase at position ${start}`,
        expression,
      )
    }
    const value = expression.slice(start + 1, close).trim().toLowerCase()
    if (value.length === 0) {
      throw new FilterError(`Empty quoted phrase at position ${start}`, expression)
    }
    return {
      atom: { kind: 'text', value },
      end: requireBoundary(expression, close + 1),
    }
  }

  if (opener === '/') {
    let index = start + 1
    while (index < expression.length && expression[index] !== '/') {
      // Skip escaped characters, including an escaped slash
      index += expression[index] === '\\' ? 2 : 1
    }
    if (index >= expression.length) {
      throw new FilterError(
        `Unterminated regular expression at position ${start}`,
        expression,
      )
    }
    const pattern = expression.slice(start + 1, index)
    const regex = compileSafeRegex(pattern, 'i')
    if (!regex) {
      throw new FilterError(
        `Unsafe or invalid regular expression: /${pattern}/`,
        expression,
      )
    }
    // A trailing i flag is accepted; matching is always case-insensitive
    const afterFlags = expression[index + 1] === 'i' ? index + 2 : index + 1
    return {
      atom: { kind: 'regex', pattern, regex },
      end: requireBoundary(expression, afterFlags),
    }
  }

  let end = start
  while (end < expression.length && !isWhitespace(expression[end])) {
    end++
  }
  return {
    atom: { kind: 'text', value: expression.slice(start, end).toLowerCase() },
    end,
  }
}

function tokenize(expression: string): Token[] {
  const tokens: Token[] = []
  let index = 0

  while (index < expression.length) {
    const char = expression[index]
    if (isWhitespace(char)) {
      index++
      continue
    }

    // OR is an operator only as a standalone uppercase word
    if (
      expression.startsWith('OR', index) &&
      (index + 2 === expression.length || isWhitespace(expression[index + 2]))
    ) {
      tokens.push({ type: 'or' })
      index += 2
      continue
    }

    let negate = false
    if (char === '+' || char === '-') {
      negate = char === '-'
      index++
      if (index >= expression.length || isWhitespace(expression[index])) {
        throw new FilterError(
          `Operator "${char}" must be followed by a term`,
          expression,
        )
      }
    }

    const { atom, end } = readAtom(expression, index)
    tokens.push({ type: 'term', negate, atom })
    index = end
  }

  return tokens
}

/**
 * Parses an advanced filter expression.
 *
 * @returns null for an empty or blank expression (everything passes)
 * @throws FilterError when the expression is malformed
 */
export function parseAdvancedFilter(
  expression: string | undefined,
): AdvancedFilter | null {
  const source = expression?.trim() ?? ''
  if (source.length === 0) {
    return null
  }

  const groups: FilterTerm[][] = [[]]
  for (const token of tokenize(source)) {
    if (token.type === 'or') {
      if (groups[groups.length - 1].length === 0) {
        throw new FilterError('"OR" must sit between two terms', source)
      }
      groups.push([])
      continue
    }
    groups[groups.length - 1].push({ negate: token.negate, atom: token.atom })
  }

  if (groups[groups.length - 1].length === 0) {
    throw new FilterError('"OR" must sit between two terms', source)
  }

  return { expression: source, groups }
}

function atomMatches(atom: FilterAtom, text: string): boolean {
  if (atom.kind === 'text') {
    return text.toLowerCase().includes(atom.value)
  }
  return atom.regex.test(text)
}

/**
 * Checks a block of text against a parsed filter.
 */
export function matchesAdvancedFilter(
  filter: AdvancedFilter,
  text: string,
): boolean {
  return filter.groups.some((group) =>
    group.every((term) => atomMatches(term.atom, text) !== term.negate),
  )
}

/**
 * Text an advanced filter is evaluated against: title and publisher name.
 */
export function filterableText(item: NewsItem): string {
  return item.source ? `${item.title} ${item.source}` : item.title
}
