export * from './lib/types'
export * from './lib/errors'
export { Logger, logger } from './lib/logger'
export type { LogEntry, LogLevel } from './lib/logger'
export { formatHours, isMissingPercentage, parsePercentage, parseTime } from './lib/timeParse'
export { repairEncoding } from './lib/encodingRepair'
export { normalizeName } from './lib/nameNormalize'
export { formatYearMonth, parseCalendarDate, parseYearMonth } from './lib/dates'
export { normalizeWorklogs } from './lib/normalize'
export type { NormalizeResult } from './lib/normalize'
export { convertLegacyReport, normalizeLegacyReport, validateLegacyStructure } from './lib/legacyReport'
export type { LegacyConversion, LegacyStructureCheck } from './lib/legacyReport'
export { aggregateWorklogs, checkConservation, CONSERVATION_TOLERANCE, sortAggregates } from './lib/aggregate'
export type { ConservationCheck } from './lib/aggregate'
export { creativeHours, creativeScore, rowMetrics, summarizePeople, summarizePerson, summarizeTeam } from './lib/metrics'
export type { EfficiencyBucket, PersonSummary, RowMetrics, TeamSummary, TopTask } from './lib/metrics'
export { categorizeRows, categorizeTask, compileCategoryRules, DEFAULT_CATEGORY_RULES } from './lib/categorize'
export { creativeBand, DEFAULT_CONFIG, resolveConfig } from './lib/config'
export type { CreativeBand, CreativeThresholds, EngineConfig } from './lib/config'
export { ALL_TIME, describeWindow, listMonths, monthWindow } from './lib/window'
export { breakdownByCategory, personalStats, TOP_TASK_LIMIT } from './lib/personalStats'
export type { CategoryBreakdown, PersonalStats } from './lib/personalStats'
export { allocateCost, validateCostParams } from './lib/allocateCost'
export type { CostParams } from './lib/allocateCost'
export { allocateForReport, buildLegacyReport, buildReport } from './lib/pipeline'
export type { AllocationResult, ReportResult, WorklogReport } from './lib/pipeline'
export { fingerprint, ReportCache } from './lib/reportCache'
export type { CacheStats } from './lib/reportCache'
export { buildReportSheets, readLegacyWorkbook, readWorklogWorkbook, writeWorkbook } from './lib/xlsx'
export type { SheetRow } from './lib/xlsx'
