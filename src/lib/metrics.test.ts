import { describe, it, expect } from 'vitest'
import { entry } from '../test/fixtures'
import { aggregateWorklogs } from './aggregate'
import { creativeHours, creativeScore, rowMetrics, summarizePeople, summarizePerson, summarizeTeam } from './metrics'

function teamRows() {
  return aggregateWorklogs([
    entry({ person: 'Anna', taskKey: 'A-1', hours: 10, creativePct: 90 }),
    entry({ person: 'Anna', taskKey: 'A-2', hours: 10 }),
    entry({ person: 'Bob', taskKey: 'B-1', hours: 4, creativePct: 30 }),
    entry({ person: 'Carol', taskKey: 'C-1', hours: 12 }),
  ])
}

describe('creative metrics', () => {
  it('computes creative hours and Creative Score', () => {
    expect(creativeHours(10, 90)).toBe(9)
    expect(creativeScore(9, 90)).toBeCloseTo(8.1, 10)
    const m = rowMetrics({ hours: 10, creativePct: 90 })
    expect(m.creativeHours).toBe(9)
    expect(m.creativeScore).toBeCloseTo(8.1, 10)
  })

  it('grows with the square of the percentage', () => {
    expect(rowMetrics({ hours: 10, creativePct: 100 }).creativeScore).toBe(10)
    expect(rowMetrics({ hours: 10, creativePct: 50 }).creativeScore).toBe(2.5)
    expect(rowMetrics({ hours: 10, creativePct: 0 }).creativeScore).toBe(0)
  })
})

describe('row and aggregate metrics', () => {
  it('agree for a task with one entry', () => {
    const cases = [
      entry({ person: 'Anna', taskKey: 'A-1', hours: 7.5, creativePct: 37 }),
      entry({ person: 'Anna', taskKey: 'A-2', hours: 2.25, creativePct: 100 }),
      entry({ person: 'Anna', taskKey: 'A-3', hours: 3 }),
    ]
    for (const e of cases) {
      const row = rowMetrics(e)
      const [aggregate] = aggregateWorklogs([e])
      expect(aggregate.creativeHours).toBeCloseTo(row.creativeHours, 10)
      expect(aggregate.creativeScore).toBeCloseTo(row.creativeScore, 10)
    }
  })
})

describe('summarizePerson', () => {
  it('summarizes tasks with and without creative data', () => {
    const rows = teamRows().filter(r => r.person === 'Anna')
    const s = summarizePerson('Anna', rows)

    expect(s.taskCount).toBe(2)
    expect(s.totalHours).toBe(20)
    expect(s.creativeHours).toBe(9)
    expect(s.creativeRatio).toBe(90)
    expect(s.coverage).toBe(50)
    expect(s.creativeScore).toBeCloseTo(8.1, 10)
    expect(s.avgHoursPerTask).toBe(10)
    expect(s.topTask.taskKey).toBe('A-1')
    expect(s.topTask.hasCreativeData).toBe(true)
  })

  it('falls back to the longest task without creative data', () => {
    const rows = aggregateWorklogs([
      entry({ person: 'Carol', taskKey: 'C-1', hours: 3 }),
      entry({ person: 'Carol', taskKey: 'C-2', hours: 7 }),
    ])
    const s = summarizePerson('Carol', rows)

    expect(s.creativeRatio).toBeNull()
    expect(s.creativeScore).toBe(0)
    expect(s.topTask).toEqual({
      taskKey: 'C-2',
      taskSummary: 'Task C-2',
      totalHours: 7,
      creativePct: null,
      creativeHours: 0,
      score: 0,
      hasCreativeData: false,
    })
  })
})

describe('summarizePeople', () => {
  it('orders people by Creative Score', () => {
    expect(summarizePeople(teamRows()).map(p => p.person)).toEqual(['Anna', 'Bob', 'Carol'])
  })
})

describe('summarizeTeam', () => {
  it('computes the executive summary figures', () => {
    const team = summarizeTeam(teamRows())

    expect(team.topPerformer).toBe('Anna')
    expect(team.topPerformerScore).toBeCloseTo(8.1, 10)
    expect(team.dataCoverage).toBe(50)
    expect(team.avgCreativePct).toBe(60)
    expect(team.totalCreativeHours).toBeCloseTo(10.2, 10)
    expect(team.peopleWithoutData).toEqual(['Carol'])
    expect(team.efficiency).toEqual([
      { label: 'long-tasks', count: 3, avgCreativePct: 90 },
      { label: 'short-tasks', count: 1, avgCreativePct: 30 },
      { label: 'high-creativity', count: 1, avgCreativePct: 90 },
      { label: 'medium-creativity', count: 0, avgCreativePct: null },
      { label: 'low-creativity', count: 1, avgCreativePct: 30 },
    ])
  })

  it('leaves excluded people out of the summary only', () => {
    const team = summarizeTeam(teamRows(), { excludedPeople: ['Anna'] })

    expect(team.topPerformer).toBe('Bob')
    expect(team.people.map(p => p.person)).toEqual(['Bob', 'Carol'])
    expect(team.avgCreativePct).toBe(30)
  })

  it('has no top performer when nobody has creative data', () => {
    const team = summarizeTeam(aggregateWorklogs([entry({ person: 'Carol', taskKey: 'C-1', hours: 3 })]))
    expect(team.topPerformer).toBeNull()
    expect(team.topPerformerScore).toBe(0)
    expect(team.avgCreativePct).toBeNull()
  })
})
