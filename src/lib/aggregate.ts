import { compareText, creativeHours, creativeScore } from './metrics'
import type { AggregateRow, CanonicalWorklogEntry } from './types'

type Group = {
  person: string
  taskKey: string
  hours: number
  weightedPctSum: number
  entryCount: number
  hasCreativeData: boolean
  summaries: Map<string, number>
  types: Map<string, number>
  from: string
  to: string
}

// Map keeps insertion order, so the first value to reach the top count wins ties
function mostFrequent(counts: Map<string, number>): string {
  let best = ''
  let bestCount = 0
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value
      bestCount = count
    }
  }
  return best
}

function count(counts: Map<string, number>, value: string): void {
  if (value) counts.set(value, (counts.get(value) ?? 0) + 1)
}

/**
 * Rolls worklog entries up to one row per (person, task key).
 *
 * The key must be the pair: several people often log time on the same issue, and grouping
 * on the issue key alone keeps one author's hours and drops everyone else's.
 */
export function aggregateWorklogs(entries: readonly CanonicalWorklogEntry[]): AggregateRow[] {
  const byPerson = new Map<string, Map<string, Group>>()

  for (const e of entries) {
    let tasks = byPerson.get(e.person)
    if (!tasks) {
      tasks = new Map()
      byPerson.set(e.person, tasks)
    }
    let g = tasks.get(e.taskKey)
    if (!g) {
      g = {
        person: e.person,
        taskKey: e.taskKey,
        hours: 0,
        weightedPctSum: 0,
        entryCount: 0,
        hasCreativeData: false,
        summaries: new Map(),
        types: new Map(),
        from: e.date,
        to: e.date,
      }
      tasks.set(e.taskKey, g)
    }
    g.hours += e.hours
    g.weightedPctSum += e.hours * e.creativePct
    g.entryCount += 1
    g.hasCreativeData ||= e.hasCreativeData
    count(g.summaries, e.taskSummary)
    count(g.types, e.taskType)
    if (e.date < g.from) g.from = e.date
    if (e.date > g.to) g.to = e.date
  }

  const rows: AggregateRow[] = []
  for (const tasks of byPerson.values()) {
    for (const g of tasks.values()) {
      const pct = g.hours > 0 ? g.weightedPctSum / g.hours : 0
      const ch = creativeHours(g.hours, pct)
      rows.push({
        person: g.person,
        taskKey: g.taskKey,
        taskSummary: mostFrequent(g.summaries),
        taskType: mostFrequent(g.types),
        totalHours: g.hours,
        weightedCreativePct: pct,
        creativeHours: ch,
        creativeScore: creativeScore(ch, pct),
        entryCount: g.entryCount,
        hasCreativeData: g.hasCreativeData,
        dateRange: { from: g.from, to: g.to },
      })
    }
  }
  return sortAggregates(rows)
}

/** Person, then most hours first, then task key. */
export function sortAggregates<T extends AggregateRow>(rows: T[]): T[] {
  return rows.sort(
    (a, b) =>
      compareText(a.person, b.person) || b.totalHours - a.totalHours || compareText(a.taskKey, b.taskKey)
  )
}

export function sumHours(rows: ReadonlyArray<{ hours: number } | { totalHours: number }>): number {
  let total = 0
  for (const r of rows) total += 'hours' in r ? r.hours : r.totalHours
  return total
}

export type ConservationCheck = {
  inputHours: number
  outputHours: number
  delta: number
  conserved: boolean
}

export const CONSERVATION_TOLERANCE = 1e-6

export function checkConservation(
  entries: readonly CanonicalWorklogEntry[],
  rows: readonly AggregateRow[]
): ConservationCheck {
  const inputHours = sumHours(entries)
  const outputHours = sumHours(rows)
  const delta = outputHours - inputHours
  return { inputHours, outputHours, delta, conserved: Math.abs(delta) <= CONSERVATION_TOLERANCE }
}
