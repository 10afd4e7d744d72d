import { ValidationError } from './errors'
import { normalizeName } from './nameNormalize'
import { addRejection, emptyRejectionReport, normalizeWorklogs } from './normalize'
import type { NormalizeResult } from './normalize'
import { isMissingPercentage } from './timeParse'
import type { LegacyReportRow, RawWorklogEntry, RejectionReport } from './types'

export type LegacyStructureCheck = {
  issues: string[]
  warnings: string[]
}

function levelOf(row: LegacyReportRow): number | null {
  const n = typeof row.level === 'number' ? row.level : parseInt(String(row.level).trim(), 10)
  return n === 0 || n === 1 || n === 2 ? n : null
}

// level-2 cells read like "90", "90%" or "Procent: 80.5"; the first number is the percentage
function percentFromText(description: string): string | null {
  if (isMissingPercentage(description)) return null
  const m = description.match(/-?\d+(?:[.,]\d+)?/)
  return m ? m[0] : null
}

/** Problems that make the report unusable go to `issues`; the rest are `warnings`. */
export function validateLegacyStructure(rows: readonly LegacyReportRow[]): LegacyStructureCheck {
  const issues: string[] = []
  const warnings: string[] = []
  if (!rows.length) {
    issues.push('The report is empty')
    return { issues, warnings }
  }

  const levels = new Set(rows.map(levelOf))
  if (!levels.has(0)) warnings.push('No level 0 rows (people); the structure may be wrong')
  if (!levels.has(1)) warnings.push('No level 1 rows (tasks); nothing to analyse')

  const seen = new Set<string>()
  const duplicates: string[] = []
  for (const r of rows) {
    if (levelOf(r) !== 0) continue
    const name = normalizeName(r.description)
    if (seen.has(name) && !duplicates.includes(name)) duplicates.push(name)
    seen.add(name)
  }
  if (duplicates.length) {
    const more = duplicates.length > 3 ? ` and ${duplicates.length - 3} more` : ''
    warnings.push(`Duplicated people: ${duplicates.slice(0, 3).join(', ')}${more}`)
  }

  const taskRows = rows.filter(r => levelOf(r) === 1)
  if (taskRows.length && !taskRows.some(r => r.totalTimeSpent !== undefined && String(r.totalTimeSpent).trim())) {
    warnings.push('No time spent on any task')
  }
  if (!rows.some(r => levelOf(r) === 2 && percentFromText(r.description) !== null)) {
    warnings.push('No creative percentages (level 2)')
  }
  return { issues, warnings }
}

export type LegacyConversion = {
  rows: RawWorklogEntry[]
  // source index of each converted row in the legacy report
  sourceRows: number[]
  rejections: RejectionReport
}

/**
 * Flattens a Level 0/1/2 report into worklog rows. The report has no dates, types or
 * statuses: every task is dated `reportDate` and the other fields are left empty.
 */
export function convertLegacyReport(rows: readonly LegacyReportRow[], reportDate: string): LegacyConversion {
  const out: RawWorklogEntry[] = []
  const sourceRows: number[] = []
  const rejections = emptyRejectionReport()
  let person: string | null = null
  let current: RawWorklogEntry | null = null

  rows.forEach((row, i) => {
    switch (levelOf(row)) {
      case 0:
        person = row.description
        current = null
        break
      case 1:
        if (person === null) {
          const err = new ValidationError('author', 'Task row appears before any person row')
          addRejection(rejections, { sourceIndex: i, kind: err.kind, field: err.field, message: err.message })
          current = null
          break
        }
        current = {
          author: person,
          issueKey: row.key ?? '',
          issueSummary: row.description,
          startDate: reportDate,
          timeSpent: row.totalTimeSpent ?? '',
          creativePercent: null,
        }
        out.push(current)
        sourceRows.push(i)
        break
      case 2:
        // percentage rows without a task above them carry nothing to attach to
        if (current) current.creativePercent = percentFromText(row.description) ?? current.creativePercent
        break
      default: {
        const err = new ValidationError('level', `Unknown level "${row.level}"`)
        addRejection(rejections, { sourceIndex: i, kind: err.kind, field: err.field, message: err.message })
      }
    }
  })
  return { rows: out, sourceRows, rejections }
}

/**
 * Converts and normalizes a legacy report in one step. Rejections from both stages refer to
 * rows of the legacy report.
 */
export function normalizeLegacyReport(rows: readonly LegacyReportRow[], reportDate: string): NormalizeResult {
  const conversion = convertLegacyReport(rows, reportDate)
  const normalized = normalizeWorklogs(conversion.rows)
  const rejections = conversion.rejections
  for (const r of normalized.rejections.rows) {
    addRejection(rejections, { ...r, sourceIndex: conversion.sourceRows[r.sourceIndex] })
  }
  rejections.rows.sort((a, b) => a.sourceIndex - b.sourceIndex)
  const entries = normalized.entries.map(e => Object.freeze({ ...e, sourceIndex: conversion.sourceRows[e.sourceIndex] }))
  return { entries: Object.freeze(entries), rejections }
}
