/**
 * Compiled forms of the advanced and date filter expressions.
 */

export type FilterAtom =
  | { kind: 'text'; value: string }
  | { kind: 'regex'; pattern: string; regex: RegExp }

export interface FilterTerm {
  /** true for "-term" (the term must not match) */
  negate: boolean
  atom: FilterAtom
}

export interface AdvancedFilter {
  expression: string
  /** Alternatives joined by OR; the terms inside each group are ANDed */
  groups: FilterTerm[][]
}

export type PastUnit = 'h' | 'd' | 'm' | 'y'

export interface DateFilter {
  expression: string
  past?: { amount: number; unit: PastUnit }
  since?: Date
  until?: Date
}

export interface FilterSettings {
  dateFilter: DateFilter | null
  advancedFilter: AdvancedFilter | null
  originLink: boolean
}
