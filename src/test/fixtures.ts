import { toYearMonth } from '../lib/dates'
import type { CanonicalWorklogEntry, RawWorklogEntry } from '../lib/types'

type EntryInput = Partial<CanonicalWorklogEntry> & Pick<CanonicalWorklogEntry, 'person' | 'taskKey' | 'hours'>

let nextIndex = 0

/** Canonical entry with neutral defaults; a given `creativePct` implies creative data. */
export function entry(input: EntryInput): CanonicalWorklogEntry {
  const date = input.date ?? '2025-03-10'
  return {
    sourceIndex: input.sourceIndex ?? nextIndex++,
    person: input.person,
    taskKey: input.taskKey,
    taskSummary: input.taskSummary ?? `Task ${input.taskKey}`,
    taskType: input.taskType ?? '',
    status: input.status ?? '',
    components: input.components ?? '',
    date,
    month: input.month ?? toYearMonth(date),
    hours: input.hours,
    creativePct: input.creativePct ?? 0,
    hasCreativeData: input.hasCreativeData ?? input.creativePct !== undefined,
  }
}

export function raw(input: Partial<RawWorklogEntry> = {}): RawWorklogEntry {
  return {
    author: 'Anna Nowak',
    issueKey: 'PRJ-1',
    issueSummary: 'Implement export feature',
    startDate: '2025-03-10',
    timeSpent: '2:00',
    creativePercent: 80,
    ...input,
  }
}

/** Deterministic LCG in [0, 1) for property-style tests. */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0
    return state / 0x100000000
  }
}
