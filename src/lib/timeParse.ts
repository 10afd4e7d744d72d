import { ParseError, ValidationError } from './errors'

// seconds, when present, are dropped
const HH_MM = /^(\d+):([0-5]\d)(?::[0-5]\d)?$/
const DECIMAL = /^(\d+(?:[.,]\d+)?)$/
const WITH_UNIT = /^(\d+(?:[.,]\d+)?)\s*(h|hr|hrs|hour|hours|godz|m|min|mins|minutes)\.?$/i
// Jira style "1h 30m", "2h", "45m"
const JIRA_DURATION = /^(?:(\d+(?:[.,]\d+)?)\s*h)?\s*(?:(\d+)\s*m)?$/i

const MINUTE_UNITS = new Set(['m', 'min', 'mins', 'minutes'])

function toNumber(text: string): number {
  return parseFloat(text.replace(',', '.'))
}

/**
 * Converts a logged duration to hours.
 *
 * Accepts `H:MM` or `H:MM:SS` with any number of hours, bare decimals (`2.5`, `2,5`), a
 * number with a unit (`3h`, `90 min`) and Jira durations (`1h 30m`). Numbers are taken as
 * hours.
 */
export function parseTime(value: unknown): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new ParseError('timeSpent', value, 'Time spent is not a finite number')
    if (value < 0) throw new ParseError('timeSpent', value, `Negative time spent: ${value}`)
    return value
  }
  const text = typeof value === 'string' ? value.trim() : ''
  if (!text) throw new ParseError('timeSpent', value, 'Time spent is empty')
  if (text.startsWith('-')) throw new ParseError('timeSpent', value, `Negative time spent: ${text}`)

  const hm = text.match(HH_MM)
  if (hm) return parseInt(hm[1], 10) + parseInt(hm[2], 10) / 60

  const dec = text.match(DECIMAL)
  if (dec) return toNumber(dec[1])

  const unit = text.match(WITH_UNIT)
  if (unit) {
    const n = toNumber(unit[1])
    return MINUTE_UNITS.has(unit[2].toLowerCase()) ? n / 60 : n
  }

  const jira = text.match(JIRA_DURATION)
  if (jira && (jira[1] !== undefined || jira[2] !== undefined)) {
    const h = jira[1] !== undefined ? toNumber(jira[1]) : 0
    const m = jira[2] !== undefined ? parseInt(jira[2], 10) : 0
    return h + m / 60
  }

  throw new ParseError('timeSpent', value, `Unrecognised time format: "${text}"`)
}

const NO_DATA_MARKERS = [/no procent/i, /brak danych/i, /^none$/i, /^nan$/i, /^n\/a$/i, /^-$/, /^—$/]

/** Empty cells and the exporter's "no data" placeholders mean the percentage was never entered. */
export function isMissingPercentage(value: unknown): boolean {
  if (value === null || value === undefined) return true
  if (typeof value === 'number') return Number.isNaN(value)
  if (typeof value !== 'string') return false
  const t = value.trim()
  return t === '' || NO_DATA_MARKERS.some(re => re.test(t))
}

const PERCENT = /^(-?\d+(?:[.,]\d+)?)\s*%?$/

export function parsePercentage(value: unknown): number {
  let pct: number
  if (typeof value === 'number') {
    pct = value
  } else if (typeof value === 'string') {
    const m = value.trim().match(PERCENT)
    if (!m) throw new ParseError('creativePercent', value, `Unrecognised percentage: "${value.trim()}"`)
    pct = toNumber(m[1])
  } else {
    throw new ParseError('creativePercent', value, 'Percentage is neither a number nor text')
  }
  if (!Number.isFinite(pct)) throw new ParseError('creativePercent', value, 'Percentage is not a finite number')
  if (pct < 0 || pct > 100) {
    throw new ValidationError('creativePercent', `Creative percentage ${pct} is outside 0-100`)
  }
  return pct
}

/** `10.5` -> `"10:30"`, rounded to the minute. */
export function formatHours(hours: number): string {
  if (!Number.isFinite(hours) || hours <= 0) return '0:00'
  const totalMinutes = Math.round(hours * 60)
  const h = Math.floor(totalMinutes / 60)
  const m = totalMinutes % 60
  return `${h}:${String(m).padStart(2, '0')}`
}
