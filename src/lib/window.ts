import { formatYearMonth, sameYearMonth } from './dates'
import type { CanonicalWorklogEntry, CostWindow, YearMonth } from './types'

export const ALL_TIME: CostWindow = Object.freeze({ kind: 'all' })

export function monthWindow(month: YearMonth): CostWindow {
  return { kind: 'month', month: { year: month.year, month: month.month } }
}

export function inWindow(entry: CanonicalWorklogEntry, window: CostWindow): boolean {
  switch (window.kind) {
    case 'all':
      return true
    case 'month':
      return sameYearMonth(entry.month, window.month)
  }
}

export function describeWindow(window: CostWindow): string {
  switch (window.kind) {
    case 'all':
      return 'all'
    case 'month':
      return formatYearMonth(window.month)
  }
}

/** `YYYY-MM` keys of the months that have entries, newest first. */
export function listMonths(entries: readonly CanonicalWorklogEntry[]): string[] {
  const months = new Set(entries.map(e => formatYearMonth(e.month)))
  return [...months].sort().reverse()
}

export function entriesForPerson(
  entries: readonly CanonicalWorklogEntry[],
  person: string,
  window: CostWindow
): CanonicalWorklogEntry[] {
  return entries.filter(e => e.person === person && inWindow(e, window))
}
