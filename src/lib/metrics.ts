/**
 * Creative hours and Creative Score, plus the per-person and team figures built on them.
 *
 * Creative Score is `hours × (pct / 100)²`: quadratic in the creative percentage on purpose,
 * so that a lot of time spent on highly creative work outranks either a lot of routine time or
 * a little highly creative time.
 */
import type { AggregateRow, CanonicalWorklogEntry } from './types'

export function creativeHours(totalHours: number, creativePct: number): number {
  return (totalHours * creativePct) / 100
}

export function creativeScore(creativeHoursValue: number, creativePct: number): number {
  return (creativeHoursValue * creativePct) / 100
}

export type RowMetrics = {
  creativeHours: number
  creativeScore: number
}

export function rowMetrics(entry: Pick<CanonicalWorklogEntry, 'hours' | 'creativePct'>): RowMetrics {
  const ch = creativeHours(entry.hours, entry.creativePct)
  return { creativeHours: ch, creativeScore: creativeScore(ch, entry.creativePct) }
}

export type TopTask = {
  taskKey: string
  taskSummary: string
  totalHours: number
  creativePct: number | null
  creativeHours: number
  score: number
  hasCreativeData: boolean
}

export type PersonSummary = {
  person: string
  taskCount: number
  totalHours: number
  creativeHours: number
  /** Creative hours over the hours of tasks that have a percentage, in %; null without any. */
  creativeRatio: number | null
  /** Share of tasks with a creative percentage, in %. */
  coverage: number
  creativeScore: number
  avgHoursPerTask: number
  topTask: TopTask
}

function topTaskOf(rows: readonly AggregateRow[]): TopTask {
  const withData = rows.filter(r => r.hasCreativeData && r.creativeHours > 0)
  if (withData.length) {
    const best = withData.reduce((a, b) => (b.creativeScore > a.creativeScore ? b : a))
    return {
      taskKey: best.taskKey,
      taskSummary: best.taskSummary,
      totalHours: best.totalHours,
      creativePct: best.weightedCreativePct,
      creativeHours: best.creativeHours,
      score: best.creativeScore,
      hasCreativeData: true,
    }
  }
  // without creative data, the longest task stands in
  const longest = rows.reduce((a, b) => (b.totalHours > a.totalHours ? b : a))
  return {
    taskKey: longest.taskKey,
    taskSummary: longest.taskSummary,
    totalHours: longest.totalHours,
    creativePct: longest.hasCreativeData ? longest.weightedCreativePct : null,
    creativeHours: longest.creativeHours,
    score: 0,
    hasCreativeData: false,
  }
}

export function groupByPerson<T extends { person: string }>(rows: readonly T[]): Map<string, T[]> {
  const out = new Map<string, T[]>()
  for (const r of rows) {
    const list = out.get(r.person)
    if (list) list.push(r)
    else out.set(r.person, [r])
  }
  return out
}

function sum(values: number[]): number {
  return values.reduce((a, b) => a + b, 0)
}

// code-point order, independent of the runtime locale
export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

export function summarizePerson(person: string, rows: readonly AggregateRow[]): PersonSummary {
  const withData = rows.filter(r => r.hasCreativeData)
  const totalHours = sum(rows.map(r => r.totalHours))
  const hoursWithData = sum(withData.map(r => r.totalHours))
  const ch = sum(rows.map(r => r.creativeHours))
  return {
    person,
    taskCount: rows.length,
    totalHours,
    creativeHours: ch,
    creativeRatio: withData.length && hoursWithData > 0 ? (ch / hoursWithData) * 100 : null,
    coverage: rows.length ? (withData.length / rows.length) * 100 : 0,
    creativeScore: sum(withData.map(r => r.creativeScore)),
    avgHoursPerTask: rows.length ? totalHours / rows.length : 0,
    topTask: topTaskOf(rows),
  }
}

/** One summary per person, highest Creative Score first. */
export function summarizePeople(rows: readonly AggregateRow[]): PersonSummary[] {
  return [...groupByPerson(rows)]
    .map(([person, list]) => summarizePerson(person, list))
    .sort((a, b) => b.creativeScore - a.creativeScore || compareText(a.person, b.person))
}

export type EfficiencyBucket = {
  label: 'long-tasks' | 'short-tasks' | 'high-creativity' | 'medium-creativity' | 'low-creativity'
  count: number
  avgCreativePct: number | null
}

export type TeamSummary = {
  topPerformer: string | null
  topPerformerScore: number
  dataCoverage: number
  avgCreativePct: number | null
  totalCreativeHours: number
  peopleWithoutData: string[]
  people: PersonSummary[]
  efficiency: EfficiencyBucket[]
}

function bucket(label: EfficiencyBucket['label'], rows: readonly AggregateRow[]): EfficiencyBucket {
  const withData = rows.filter(r => r.hasCreativeData)
  return {
    label,
    count: rows.length,
    avgCreativePct: withData.length ? sum(withData.map(r => r.weightedCreativePct)) / withData.length : null,
  }
}

/**
 * Executive-summary figures over aggregate rows. People in `excludedPeople` are left out
 * here only; they stay in every total elsewhere.
 */
export function summarizeTeam(
  rows: readonly AggregateRow[],
  options: { excludedPeople?: readonly string[] } = {}
): TeamSummary {
  const excluded = new Set(options.excludedPeople ?? [])
  const included = rows.filter(r => !excluded.has(r.person))
  const people = summarizePeople(included)
  const withData = included.filter(r => r.hasCreativeData)

  const scored = people.filter(p => p.creativeRatio !== null)
  const top = scored[0] ?? null

  const personAverages: number[] = []
  for (const [, list] of groupByPerson(withData)) {
    const hours = sum(list.map(r => r.totalHours))
    if (hours > 0) personAverages.push(sum(list.map(r => r.totalHours * r.weightedCreativePct)) / hours)
  }

  return {
    topPerformer: top ? top.person : null,
    topPerformerScore: top ? top.creativeScore : 0,
    dataCoverage: included.length ? (withData.length / included.length) * 100 : 0,
    avgCreativePct: personAverages.length ? sum(personAverages) / personAverages.length : null,
    totalCreativeHours: sum(included.map(r => r.creativeHours)),
    peopleWithoutData: people.filter(p => p.creativeRatio === null).map(p => p.person).sort(compareText),
    people,
    efficiency: [
      bucket('long-tasks', included.filter(r => r.totalHours >= 10)),
      bucket('short-tasks', included.filter(r => r.totalHours <= 5)),
      bucket('high-creativity', withData.filter(r => r.weightedCreativePct >= 80)),
      bucket('medium-creativity', withData.filter(r => r.weightedCreativePct >= 40 && r.weightedCreativePct < 80)),
      bucket('low-creativity', withData.filter(r => r.weightedCreativePct < 40)),
    ],
  }
}
