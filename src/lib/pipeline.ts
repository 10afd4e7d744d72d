import { aggregateWorklogs, checkConservation } from './aggregate'
import type { ConservationCheck } from './aggregate'
import { allocateCost, validateCostParams } from './allocateCost'
import type { CostParams } from './allocateCost'
import { categorizeRows } from './categorize'
import { resolveConfig } from './config'
import type { EngineConfig } from './config'
import { EmptyInputError } from './errors'
import type { ValidationError } from './errors'
import { normalizeLegacyReport } from './legacyReport'
import { logger } from './logger'
import { summarizeTeam } from './metrics'
import type { TeamSummary } from './metrics'
import { normalizeWorklogs } from './normalize'
import type { NormalizeResult } from './normalize'
import type {
  CanonicalWorklogEntry,
  CategorizedAggregateRow,
  CostAllocation,
  LegacyReportRow,
  RawWorklogEntry,
  RejectionReport,
} from './types'
import { listMonths } from './window'

export type WorklogReport = {
  entries: readonly CanonicalWorklogEntry[]
  aggregates: CategorizedAggregateRow[]
  rejections: RejectionReport
  conservation: ConservationCheck
  team: TeamSummary
  months: string[]
  config: EngineConfig
}

export type ReportResult =
  | { ok: true; report: WorklogReport }
  | { ok: false; error: EmptyInputError; rejections: RejectionReport }

export type AllocationResult =
  | { ok: true; allocation: CostAllocation }
  | { ok: false; issues: ValidationError[] }

function fromNormalized(normalized: NormalizeResult, config: EngineConfig): ReportResult {
  const { entries, rejections } = normalized
  if (!entries.length) {
    const error = new EmptyInputError(rejections)
    logger.warn(error.message)
    return { ok: false, error, rejections }
  }

  const rows = aggregateWorklogs(entries)
  const conservation = checkConservation(entries, rows)
  if (!conservation.conserved) {
    logger.error('Aggregated hours differ from logged hours', conservation)
  }
  const aggregates = categorizeRows(rows, config.categoryRules)
  logger.debug(`Aggregated ${entries.length} entries into ${aggregates.length} person/task rows`)

  return {
    ok: true,
    report: {
      entries,
      aggregates,
      rejections,
      conservation,
      team: summarizeTeam(aggregates, { excludedPeople: config.excludedPeople }),
      months: listMonths(entries),
      config,
    },
  }
}

/** Full recomputation from raw worklog rows. */
export function buildReport(rows: readonly RawWorklogEntry[], overrides?: Partial<EngineConfig>): ReportResult {
  const config = resolveConfig(overrides)
  return fromNormalized(normalizeWorklogs(rows), config)
}

/** Same as `buildReport` for a Level 0/1/2 report; every task is dated `reportDate`. */
export function buildLegacyReport(
  rows: readonly LegacyReportRow[],
  reportDate: string,
  overrides?: Partial<EngineConfig>
): ReportResult {
  const config = resolveConfig(overrides)
  return fromNormalized(normalizeLegacyReport(rows, reportDate), config)
}

/** `allocateCost` over a built report, with parameter problems returned instead of thrown. */
export function allocateForReport(report: WorklogReport, params: CostParams): AllocationResult {
  const resolved: CostParams = {
    ...params,
    standardMonthlyHours: params.standardMonthlyHours ?? report.config.standardMonthlyHours,
  }
  const issues = validateCostParams(resolved)
  if (issues.length) return { ok: false, issues }
  return { ok: true, allocation: allocateCost(report.entries, resolved, report.config.categoryRules) }
}
