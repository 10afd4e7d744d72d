import { describe, it, expect } from 'vitest'
import { formatYearMonth, parseCalendarDate, parseYearMonth, sameYearMonth, toYearMonth } from './dates'
import { ParseError } from './errors'

describe('parseCalendarDate', () => {
  it.each([
    ['2025-03-10', '2025-03-10'],
    ['2025-03-10T14:30:00', '2025-03-10'],
    ['2025-03-10 08:15', '2025-03-10'],
    ['2025-03-10T14:30:00.000+02:00', '2025-03-10'],
    ['2025-3-5', '2025-03-05'],
    ['2025/03/10', '2025-03-10'],
    ['10.03.2025', '2025-03-10'],
    ['1.3.2025 9:00', '2025-03-01'],
  ])('reads %j', (input, expected) => {
    expect(parseCalendarDate(input)).toBe(expected)
  })

  it('reads a Date in local time', () => {
    expect(parseCalendarDate(new Date(2025, 2, 10, 23, 30))).toBe('2025-03-10')
  })

  it.each(['2025-02-30', '2025-13-01', 'yesterday', ''])('rejects %j', input => {
    expect(() => parseCalendarDate(input)).toThrow(ParseError)
  })

  it('rejects an invalid Date', () => {
    expect(() => parseCalendarDate(new Date(Number.NaN))).toThrow('Invalid Date')
  })
})

describe('year-month helpers', () => {
  it('converts between dates and months', () => {
    expect(toYearMonth('2025-03-10')).toEqual({ year: 2025, month: 3 })
    expect(formatYearMonth({ year: 2025, month: 3 })).toBe('2025-03')
    expect(parseYearMonth('2025-7')).toEqual({ year: 2025, month: 7 })
    expect(sameYearMonth({ year: 2025, month: 3 }, toYearMonth('2025-03-31'))).toBe(true)
  })

  it('rejects months outside 1-12', () => {
    expect(() => parseYearMonth('2025-13')).toThrow(ParseError)
    expect(() => parseYearMonth('2025-00')).toThrow(ParseError)
  })
})
