/**
 * Date Filter
 *
 * Recency rules written as space separated tokens:
 *
 * - `past:N{h|d|m|y}` keep items published in the last N hours, days,
 *   months (30 days) or years (365 days)
 * - `since:YYYY-MM-DD` keep items published at or after UTC midnight
 * - `until:YYYY-MM-DD` keep items published at or before UTC midnight
 *
 * When `past:` is present it alone decides. Items without a known date
 * never pass an active date filter.
 */

import type { DateFilter, PastUnit } from '../../types/filter.types.js'
import { FilterError } from '../../types/errors.js'

const HOUR_MS = 60 * 60 * 1000
const DAY_MS = 24 * HOUR_MS

const UNIT_MS: Record<PastUnit, number> = {
  h: HOUR_MS,
  d: DAY_MS,
  m: 30 * DAY_MS,
  y: 365 * DAY_MS,
}

function isPastUnit(value: string): value is PastUnit {
  return Object.hasOwn(UNIT_MS, value)
}

const PAST_PATTERN = /^past:(\d+)([hdmy])$/
const DAY_PATTERN = /^(since|until):(\d{4})-(\d{2})-(\d{2})$/

function parseDay(
  token: string,
  year: string,
  month: string,
  day: string,
  expression: string,
): Date {
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)))
  // Date.UTC rolls over out-of-range parts, so compare them back
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day)
  ) {
    throw new FilterError(`Invalid calendar date in "${token}"`, expression)
  }
  return date
}

/**
 * Parses a date filter expression.
 *
 * @returns null for an empty or blank expression (no date filtering)
 * @throws FilterError for unknown tokens or invalid dates
 */
export function parseDateFilter(
  expression: string | undefined,
): DateFilter | null {
  const source = expression?.trim() ?? ''
  if (source.length === 0) {
    return null
  }

  const filter: DateFilter = { expression: source }

  for (const token of source.split(/\s+/)) {
    const past = PAST_PATTERN.exec(token)
    if (past) {
      const amount = Number(past[1])
      if (amount <= 0) {
        throw new FilterError(`"${token}" must use a positive amount`, source)
      }
      const unit = past[2]
      if (!isPastUnit(unit)) {
        throw new FilterError(`Unknown unit in "${token}"`, source)
      }
      filter.past = { amount, unit }
      continue
    }

    const day = DAY_PATTERN.exec(token)
    if (day) {
      const date = parseDay(token, day[2], day[3], day[4], source)
      if (day[1] === 'since') {
        filter.since = date
      } else {
        filter.until = date
      }
      continue
    }

    throw new FilterError(`Unrecognized date filter token "${token}"`, source)
  }

  if (filter.since && filter.until && filter.since > filter.until) {
    throw new FilterError('"since" must not be later than "until"', source)
  }

  return filter
}

/**
 * Returns the oldest publication time a `past:` rule accepts.
 */
export function pastCutoff(filter: DateFilter, now: Date): Date | undefined {
  if (!filter.past) return undefined
  return new Date(now.getTime() - filter.past.amount * UNIT_MS[filter.past.unit])
}

/**
 * Checks whether a publication date satisfies the filter.
 *
 * @param now - Start time of the run; `past:` windows are measured from it.
 */
export function isWithinDateRange(
  filter: DateFilter,
  pubDate: Date | null,
  now: Date,
): boolean {
  if (!pubDate) {
    return false
  }

  const cutoff = pastCutoff(filter, now)
  if (cutoff) {
    return pubDate.getTime() >= cutoff.getTime()
  }

  if (filter.since && pubDate.getTime() < filter.since.getTime()) {
    return false
  }
  if (filter.until && pubDate.getTime() > filter.until.getTime()) {
    return false
  }
  return true
}
