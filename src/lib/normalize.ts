import { parseCalendarDate, toYearMonth } from './dates'
import { repairEncoding } from './encodingRepair'
import { isRowError, ValidationError } from './errors'
import { logger } from './logger'
import { normalizeName } from './nameNormalize'
import { isMissingPercentage, parsePercentage, parseTime } from './timeParse'
import type { CanonicalWorklogEntry, RawWorklogEntry, RejectedRow, RejectionReport } from './types'

export type NormalizeResult = {
  entries: readonly CanonicalWorklogEntry[]
  rejections: RejectionReport
}

function text(value: string | undefined | null): string {
  return repairEncoding(String(value ?? '')).trim()
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && !value.trim())
}

// throws ParseError / ValidationError; the caller turns them into rejected rows
function toCanonical(raw: RawWorklogEntry, sourceIndex: number): CanonicalWorklogEntry {
  const person = normalizeName(raw.author)
  if (!person) throw new ValidationError('author', 'Author is missing')
  const taskKey = text(raw.issueKey)
  if (!taskKey) throw new ValidationError('issueKey', 'Issue key is missing')
  if (isBlank(raw.startDate)) throw new ValidationError('startDate', 'Start date is missing')

  const date = parseCalendarDate(raw.startDate)
  const hours = parseTime(raw.timeSpent)
  const hasCreativeData = !isMissingPercentage(raw.creativePercent)
  const creativePct = hasCreativeData ? parsePercentage(raw.creativePercent) : 0

  return Object.freeze({
    sourceIndex,
    person,
    taskKey,
    taskSummary: text(raw.issueSummary),
    taskType: text(raw.issueType),
    status: text(raw.issueStatus),
    components: text(raw.components),
    date,
    month: Object.freeze(toYearMonth(date)),
    hours,
    creativePct,
    hasCreativeData,
  })
}

export function emptyRejectionReport(): RejectionReport {
  return { total: 0, byKind: { ParseError: 0, ValidationError: 0 }, rows: [] }
}

export function addRejection(report: RejectionReport, row: RejectedRow): void {
  report.rows.push(row)
  report.byKind[row.kind] += 1
  report.total += 1
}

/**
 * Turns raw rows into canonical entries. A bad row never stops the run: it is left out and
 * recorded in the rejection report with the first problem found.
 */
export function normalizeWorklogs(rows: readonly RawWorklogEntry[]): NormalizeResult {
  const entries: CanonicalWorklogEntry[] = []
  const rejections = emptyRejectionReport()

  rows.forEach((raw, i) => {
    try {
      entries.push(toCanonical(raw, i))
    } catch (err) {
      if (!isRowError(err)) throw err
      addRejection(rejections, { sourceIndex: i, kind: err.kind, field: err.field, message: err.message })
    }
  })

  if (rejections.total > 0) {
    logger.warn(`Rejected ${rejections.total} of ${rows.length} worklog rows`, rejections.byKind)
  }
  logger.debug(`Normalized ${entries.length} worklog rows`)
  return { entries: Object.freeze(entries), rejections }
}
