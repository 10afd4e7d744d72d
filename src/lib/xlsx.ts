import * as XLSX from 'xlsx'
import { creativeBand } from './config'
import { repairEncoding } from './encodingRepair'
import { WorkbookFormatError } from './errors'
import type { WorklogReport } from './pipeline'
import { formatHours } from './timeParse'
import type { CostAllocation, LegacyReportRow, RawWorklogEntry } from './types'
import { describeWindow } from './window'

type HeaderAliases<F extends string> = Record<F, RegExp>

type WorklogField = keyof RawWorklogEntry
type LegacyField = keyof LegacyReportRow

const WORKLOG_COLUMNS: HeaderAliases<WorklogField> = {
  author: /^(author|autor|user|użytkownik|osoba)$/i,
  issueKey: /^(issue key|key|klucz)$/i,
  issueSummary: /^(issue summary|summary|zadanie|task)$/i,
  startDate: /^(start date|date|data|started)$/i,
  timeSpent: /^(time spent|czas|czas pracy)$/i,
  creativePercent: /procent pracy twórczej|creative/i,
  issueType: /^(issue type|type|typ)$/i,
  issueStatus: /^(issue status|status)$/i,
  components: /^components?$/i,
}
const WORKLOG_REQUIRED: WorklogField[] = ['author', 'issueKey', 'startDate', 'timeSpent']

const LEGACY_COLUMNS: HeaderAliases<LegacyField> = {
  level: /^level$/i,
  description: /^users \/ issues|^description$/i,
  key: /^(key|issue key)$/i,
  totalTimeSpent: /^total time spent$/i,
}
const LEGACY_REQUIRED: LegacyField[] = ['level', 'description']

const HEADER_SEARCH_ROWS = 20

type Located<F extends string> = {
  sheetName: string
  headerIdx: number
  columns: Partial<Record<F, number>>
  formatted: unknown[][]
  raw: unknown[][]
}

function cellText(v: unknown): string {
  return v === null || v === undefined ? '' : String(v).trim()
}

function locate<F extends string>(
  wb: XLSX.WorkBook,
  aliases: HeaderAliases<F>,
  required: F[]
): Located<F> | null {
  const fields = Object.keys(aliases).filter((f): f is F => f in aliases)
  for (const sheetName of wb.SheetNames) {
    const ws = wb.Sheets[sheetName]
    const opts = { header: 1 as const, defval: '', blankrows: true }
    const formatted = XLSX.utils.sheet_to_json<unknown[]>(ws, { ...opts, raw: false })
    if (!formatted.length) continue
    for (let i = 0; i < Math.min(HEADER_SEARCH_ROWS, formatted.length); i++) {
      const header = (formatted[i] || []).map(v => repairEncoding(cellText(v)))
      const columns: Partial<Record<F, number>> = {}
      for (const f of fields) {
        const idx = header.findIndex(h => aliases[f].test(h))
        if (idx >= 0) columns[f] = idx
      }
      if (required.every(f => columns[f] !== undefined)) {
        const raw = XLSX.utils.sheet_to_json<unknown[]>(ws, { ...opts, raw: true })
        return { sheetName, headerIdx: i, columns, formatted, raw }
      }
    }
  }
  return null
}

function column<F extends string>(loc: Located<F>, row: number, field: F): string {
  const idx = loc.columns[field]
  return idx === undefined ? '' : cellText((loc.formatted[row] || [])[idx])
}

const EXCEL_EPOCH_MS = Date.UTC(1899, 11, 30)
const DAY_MS = 86_400_000

// date cells come through as serial day numbers; formatted text depends on the cell format
function dateCell<F extends string>(loc: Located<F>, row: number, field: F): string {
  const idx = loc.columns[field]
  if (idx === undefined) return ''
  const v = (loc.raw[row] || [])[idx]
  if (typeof v === 'number' && Number.isFinite(v) && v > 0) {
    return new Date(EXCEL_EPOCH_MS + Math.floor(v) * DAY_MS).toISOString().slice(0, 10)
  }
  return cellText(v)
}

function isEmptyRow(cells: unknown[] | undefined): boolean {
  return !cells || cells.every(c => cellText(c) === '')
}

/** Worklog export: one row per logged entry, header row found by column names. */
export function readWorklogWorkbook(data: ArrayBuffer | Uint8Array): RawWorklogEntry[] {
  const wb = XLSX.read(data, { type: 'array' })
  const loc = locate(wb, WORKLOG_COLUMNS, WORKLOG_REQUIRED)
  if (!loc) {
    throw new WorkbookFormatError(
      'No worklog header row found. Expected columns: Author, Issue Key, Start Date and Time Spent.'
    )
  }
  const out: RawWorklogEntry[] = []
  for (let r = loc.headerIdx + 1; r < loc.formatted.length; r++) {
    if (isEmptyRow(loc.formatted[r])) continue
    out.push({
      author: column(loc, r, 'author'),
      issueKey: column(loc, r, 'issueKey'),
      issueSummary: column(loc, r, 'issueSummary'),
      startDate: dateCell(loc, r, 'startDate'),
      timeSpent: column(loc, r, 'timeSpent'),
      creativePercent: column(loc, r, 'creativePercent') || null,
      issueType: column(loc, r, 'issueType'),
      issueStatus: column(loc, r, 'issueStatus'),
      components: column(loc, r, 'components'),
    })
  }
  return out
}

/** Level 0/1/2 report: person rows, task rows under them, creative percentage under a task. */
export function readLegacyWorkbook(data: ArrayBuffer | Uint8Array): LegacyReportRow[] {
  const wb = XLSX.read(data, { type: 'array' })
  const loc = locate(wb, LEGACY_COLUMNS, LEGACY_REQUIRED)
  if (!loc) {
    throw new WorkbookFormatError('No report header row found. Expected columns: Level and "Users / Issues / ...".')
  }
  const out: LegacyReportRow[] = []
  for (let r = loc.headerIdx + 1; r < loc.formatted.length; r++) {
    if (isEmptyRow(loc.formatted[r])) continue
    out.push({
      level: column(loc, r, 'level'),
      description: column(loc, r, 'description'),
      key: column(loc, r, 'key'),
      totalTimeSpent: column(loc, r, 'totalTimeSpent'),
    })
  }
  return out
}

export type SheetRow = Record<string, string | number | boolean | null>

/** Plain result tables; colours, widths and filters belong to whoever renders them. */
export function buildReportSheets(report: WorklogReport, allocation?: CostAllocation): Record<string, SheetRow[]> {
  const thresholds = report.config.creativeThresholds
  const sheets: Record<string, SheetRow[]> = {
    Aggregates: report.aggregates.map(r => ({
      Person: r.person,
      Task: r.taskSummary,
      Key: r.taskKey,
      Type: r.taskType,
      Category: r.category,
      Time: formatHours(r.totalHours),
      'Time (h)': r.totalHours,
      'Creative %': r.hasCreativeData ? r.weightedCreativePct : null,
      'Creative band': r.hasCreativeData ? creativeBand(r.weightedCreativePct, thresholds) : null,
      'Creative hours': r.creativeHours,
      'Creative Score': r.creativeScore,
      Entries: r.entryCount,
      From: r.dateRange.from,
      To: r.dateRange.to,
    })),
    People: report.team.people.map(p => ({
      Person: p.person,
      Tasks: p.taskCount,
      'Total (h)': p.totalHours,
      'Creative (h)': p.creativeHours,
      'Creative %': p.creativeRatio,
      Coverage: p.coverage,
      'Creative Score': p.creativeScore,
    })),
    Rejected: report.rejections.rows.map(r => ({
      Row: r.sourceIndex + 1,
      Problem: r.kind,
      Field: r.field,
      Message: r.message,
    })),
  }
  if (allocation) {
    sheets.Costs = allocation.categories.map(c => ({
      Person: allocation.person,
      Window: describeWindow(allocation.window),
      Category: c.category,
      Tasks: c.taskCount,
      Hours: c.hours,
      Cost: c.cost,
      'Creative hours': c.creativeHours,
      'Creative cost': c.creativeCost,
    }))
  }
  return sheets
}

export function writeWorkbook(sheets: Record<string, SheetRow[]>): Uint8Array {
  const wb = XLSX.utils.book_new()
  for (const [name, rows] of Object.entries(sheets)) {
    const ws = XLSX.utils.json_to_sheet(rows)
    XLSX.utils.book_append_sheet(wb, ws, name.slice(0, 31))
  }
  const out: ArrayBuffer = XLSX.write(wb, { bookType: 'xlsx', type: 'array' })
  return new Uint8Array(out)
}
