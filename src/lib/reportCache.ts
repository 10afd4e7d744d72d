import { createHash } from 'node:crypto'
import type { CostParams } from './allocateCost'
import { resolveConfig } from './config'
import type { EngineConfig } from './config'
import { logger } from './logger'
import { allocateForReport, buildLegacyReport, buildReport } from './pipeline'
import type { AllocationResult, ReportResult, WorklogReport } from './pipeline'
import type { LegacyReportRow, RawWorklogEntry } from './types'

export function fingerprint(...parts: unknown[]): string {
  return createHash('sha256').update(JSON.stringify(parts)).digest('hex')
}

// a Date and its ISO string must not share a key: they can fall on different local days
function hashableRows(rows: readonly RawWorklogEntry[]): unknown[] {
  return rows.map(r => (r.startDate instanceof Date ? { ...r, startDate: { epochMs: r.startDate.getTime() } } : r))
}

export type CacheStats = {
  hits: number
  misses: number
  size: number
}

/**
 * Memoizes reports and allocations under a fingerprint of everything they are computed from:
 * the input rows, the resolved configuration and, for allocations, the cost parameters.
 * Changing any of them changes the key; `invalidate()` drops everything at once.
 */
export class ReportCache {
  private reports = new Map<string, ReportResult>()
  private allocations = new Map<string, AllocationResult>()
  private reportKeys = new WeakMap<WorklogReport, string>()
  private hits = 0
  private misses = 0

  constructor(private readonly maxEntries = 16) {}

  private remember<T>(store: Map<string, T>, key: string, compute: () => T): T {
    const cached = store.get(key)
    if (cached !== undefined) {
      this.hits += 1
      return cached
    }
    this.misses += 1
    const value = compute()
    store.set(key, value)
    if (store.size > this.maxEntries) {
      // Map iterates in insertion order: the first key is the oldest
      const oldest = store.keys().next()
      if (!oldest.done) store.delete(oldest.value)
    }
    return value
  }

  private track(key: string, result: ReportResult): ReportResult {
    if (result.ok) this.reportKeys.set(result.report, key)
    return result
  }

  report(rows: readonly RawWorklogEntry[], overrides?: Partial<EngineConfig>): ReportResult {
    const key = fingerprint('worklogs', hashableRows(rows), resolveConfig(overrides))
    return this.track(key, this.remember(this.reports, key, () => buildReport(rows, overrides)))
  }

  legacyReport(rows: readonly LegacyReportRow[], reportDate: string, overrides?: Partial<EngineConfig>): ReportResult {
    const key = fingerprint('legacy', rows, reportDate, resolveConfig(overrides))
    return this.track(key, this.remember(this.reports, key, () => buildLegacyReport(rows, reportDate, overrides)))
  }

  allocation(report: WorklogReport, params: CostParams): AllocationResult {
    const reportKey = this.reportKeys.get(report)
    // reports built outside this cache are computed every time
    if (reportKey === undefined) return allocateForReport(report, params)
    const key = fingerprint('allocation', reportKey, params)
    return this.remember(this.allocations, key, () => allocateForReport(report, params))
  }

  invalidate(): void {
    logger.debug(`Dropping ${this.reports.size} cached reports and ${this.allocations.size} allocations`)
    this.reports.clear()
    this.allocations.clear()
    this.reportKeys = new WeakMap()
  }

  /** `invalidate()` plus a reset of the hit and miss counters. */
  clear(): void {
    this.invalidate()
    this.hits = 0
    this.misses = 0
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, size: this.reports.size + this.allocations.size }
  }
}
