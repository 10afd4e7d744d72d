import { ParseError } from './errors'
import type { YearMonth } from './types'

const ISO = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ T]\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/
const SLASHED = /^(\d{4})\/(\d{1,2})\/(\d{1,2})(?:\s+\d{1,2}:\d{2}(?::\d{2})?)?$/
const DOTTED = /^(\d{1,2})\.(\d{1,2})\.(\d{4})(?:\s+\d{1,2}:\d{2}(?::\d{2})?)?$/

function pad2(n: number): string {
  return String(n).padStart(2, '0')
}

function toIso(year: number, month: number, day: number, source: unknown): string {
  const d = new Date(Date.UTC(year, month - 1, day))
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    throw new ParseError('startDate', source, `Not a calendar date: ${year}-${pad2(month)}-${pad2(day)}`)
  }
  return `${year}-${pad2(month)}-${pad2(day)}`
}

/**
 * Calendar date of a worklog as `YYYY-MM-DD`. The time of day is dropped; a `Date` is read
 * in local time, as spreadsheet readers build it.
 */
export function parseCalendarDate(value: string | Date): string {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) throw new ParseError('startDate', value, 'Invalid Date')
    return toIso(value.getFullYear(), value.getMonth() + 1, value.getDate(), value)
  }
  const t = value.trim()
  let m = t.match(ISO)
  if (m) return toIso(+m[1], +m[2], +m[3], value)
  m = t.match(SLASHED)
  if (m) return toIso(+m[1], +m[2], +m[3], value)
  m = t.match(DOTTED)
  if (m) return toIso(+m[3], +m[2], +m[1], value)
  throw new ParseError('startDate', value, `Unrecognised date: "${t}"`)
}

export function toYearMonth(isoDate: string): YearMonth {
  return { year: parseInt(isoDate.slice(0, 4), 10), month: parseInt(isoDate.slice(5, 7), 10) }
}

export function formatYearMonth(ym: YearMonth): string {
  return `${ym.year}-${pad2(ym.month)}`
}

export function parseYearMonth(text: string): YearMonth {
  const m = text.trim().match(/^(\d{4})-(\d{1,2})$/)
  if (!m || +m[2] < 1 || +m[2] > 12) throw new ParseError('month', text, `Expected YYYY-MM, got "${text}"`)
  return { year: +m[1], month: +m[2] }
}

export function sameYearMonth(a: YearMonth, b: YearMonth): boolean {
  return a.year === b.year && a.month === b.month
}
