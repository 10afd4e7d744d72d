import { describe, it, expect } from 'vitest'
import { entry } from '../test/fixtures'
import { allocateCost, validateCostParams } from './allocateCost'
import { ValidationError } from './errors'
import { ALL_TIME, monthWindow } from './window'

const march = monthWindow({ year: 2025, month: 3 })

const monthEntries = [
  entry({ person: 'Anna', taskKey: 'A-1', hours: 40, creativePct: 90, taskSummary: 'Implement export feature' }),
  entry({ person: 'Anna', taskKey: 'A-2', hours: 35, creativePct: 50, taskSummary: 'Fix crash on save' }),
  entry({ person: 'Anna', taskKey: 'A-3', hours: 25, taskSummary: 'Sprint planning' }),
  entry({ person: 'Bob', taskKey: 'B-1', hours: 60, creativePct: 70, taskSummary: 'Implement export feature' }),
  entry({ person: 'Anna', taskKey: 'A-4', hours: 8, taskSummary: 'Lunch', date: '2025-04-01' }),
]

describe('allocateCost', () => {
  it('splits a month of pay by share of hours', () => {
    const a = allocateCost(monthEntries, { person: 'Anna', grossCompensation: 16000, window: march })

    expect(a.status).toBe('allocated')
    expect(a.noHoursLogged).toBe(false)
    expect(a.totalHours).toBe(100)
    expect(a.totalCost).toBe(16000)
    expect(a.costByCategory.Development).toBe(6400)
    expect(a.costByCategory['Bug/Hotfix']).toBe(5600)
    expect(a.costByCategory.Meetings).toBe(4000)
    expect(a.costByCategory.Other).toBe(0)
    expect(a.costByTask).toEqual({ 'A-1': 6400, 'A-2': 5600, 'A-3': 4000 })
    expect(a.categories.map(c => [c.category, c.cost])).toEqual([
      ['Development', 6400],
      ['Bug/Hotfix', 5600],
      ['Meetings', 4000],
    ])
    expect(a.creativeHours).toBe(53.5)
    expect(a.creativeCost).toBe(8560)
    expect(a.mostExpensiveTask?.taskKey).toBe('A-1')
    expect(a.leastExpensiveTask?.taskKey).toBe('A-3')
  })

  it('values hours at the hourly rate across all months', () => {
    const entries = [
      entry({ person: 'Anna', taskKey: 'A-1', hours: 40, taskSummary: 'Implement export feature' }),
      entry({ person: 'Anna', taskKey: 'A-2', hours: 110, taskSummary: 'Fix crash on save', date: '2025-04-10' }),
      entry({ person: 'Anna', taskKey: 'A-3', hours: 100, taskSummary: 'Sprint planning', date: '2025-05-10' }),
    ]
    const a = allocateCost(entries, { person: 'Anna', grossCompensation: 16800, standardMonthlyHours: 168, window: ALL_TIME })

    expect(a.hourlyRate).toBe(100)
    expect(a.totalHours).toBe(250)
    expect(a.totalCost).toBe(25000)
    expect(a.costByCategory.Development).toBe(4000)
    expect(a.costByCategory['Bug/Hotfix']).toBe(11000)
    expect(a.costByCategory.Meetings).toBe(10000)
    expect(a.mostExpensiveTask?.taskKey).toBe('A-2')
    expect(a.leastExpensiveTask?.taskKey).toBe('A-1')
  })

  it('defaults to 168 standard hours', () => {
    const a = allocateCost(monthEntries, { person: 'Anna', grossCompensation: 16800, window: ALL_TIME })
    expect(a.standardMonthlyHours).toBe(168)
    expect(a.hourlyRate).toBe(100)
  })

  it('marks a window without hours as allocation-undefined', () => {
    const a = allocateCost(monthEntries, {
      person: 'Anna',
      grossCompensation: 16000,
      window: monthWindow({ year: 2025, month: 6 }),
    })

    expect(a.status).toBe('allocation-undefined')
    expect(a.noHoursLogged).toBe(true)
    expect(a.totalCost).toBe(0)
    expect(a.tasks).toEqual([])
    expect(a.categories).toEqual([])
    expect(a.mostExpensiveTask).toBeNull()
    expect(a.leastExpensiveTask).toBeNull()
    expect(Object.values(a.costByCategory).every(c => c === 0)).toBe(true)
  })

  it('picks most and least expensive from every task in costByTask', () => {
    const a = allocateCost(
      [
        entry({ person: 'Anna', taskKey: 'A-1', hours: 10 }),
        entry({ person: 'Anna', taskKey: 'A-9', hours: 0 }),
      ],
      { person: 'Anna', grossCompensation: 16000, window: march }
    )
    expect(a.costByTask).toEqual({ 'A-1': 16000, 'A-9': 0 })
    expect(a.mostExpensiveTask?.taskKey).toBe('A-1')
    expect(a.leastExpensiveTask?.taskKey).toBe('A-9')
  })

  it('keeps zero-hour tasks of a window without hours', () => {
    const a = allocateCost([entry({ person: 'Anna', taskKey: 'A-9', hours: 0, date: '2025-07-01' })], {
      person: 'Anna',
      grossCompensation: 16000,
      window: monthWindow({ year: 2025, month: 7 }),
    })
    expect(a.status).toBe('allocation-undefined')
    expect(a.tasks.map(t => [t.taskKey, t.cost])).toEqual([['A-9', 0]])
    expect(a.mostExpensiveTask?.taskKey).toBe('A-9')
    expect(a.leastExpensiveTask?.taskKey).toBe('A-9')
  })

  it('breaks cost ties by task key', () => {
    const a = allocateCost(
      [
        entry({ person: 'Anna', taskKey: 'B-2', hours: 10 }),
        entry({ person: 'Anna', taskKey: 'B-1', hours: 10 }),
      ],
      { person: 'Anna', grossCompensation: 10000, window: march }
    )
    expect(a.tasks.map(t => t.taskKey)).toEqual(['B-1', 'B-2'])
    expect(a.mostExpensiveTask?.taskKey).toBe('B-1')
    expect(a.leastExpensiveTask?.taskKey).toBe('B-1')
  })

  it('throws on unusable parameters', () => {
    expect(() => allocateCost(monthEntries, { person: 'Anna', grossCompensation: 0, window: march })).toThrow(
      ValidationError
    )
  })
})

describe('validateCostParams', () => {
  it('lists every problem', () => {
    const issues = validateCostParams({
      person: ' ',
      grossCompensation: -1,
      standardMonthlyHours: 0,
      window: { kind: 'month', month: { year: 2025, month: 13 } },
    })
    expect(issues.map(i => i.field)).toEqual(['person', 'grossCompensation', 'standardMonthlyHours', 'window'])
  })

  it('accepts usable parameters', () => {
    expect(validateCostParams({ person: 'Anna', grossCompensation: 1, window: ALL_TIME })).toEqual([])
  })
})
