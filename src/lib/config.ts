import { compileCategoryRules, DEFAULT_CATEGORY_RULES } from './categorize'
import { ValidationError } from './errors'
import { normalizeName } from './nameNormalize'
import type { CategoryRule } from './types'

// ≤ low is "low", ≤ medium is "medium", above is "high"
export type CreativeThresholds = {
  low: number
  medium: number
}

export type CreativeBand = 'low' | 'medium' | 'high'

export type EngineConfig = {
  /** Working hours in a month of full-time pay (21 days × 8 h). */
  standardMonthlyHours: number
  categoryRules: readonly CategoryRule[]
  creativeThresholds: CreativeThresholds
  /** Left out of team summaries; their hours still count in every total. */
  excludedPeople: readonly string[]
}

export const DEFAULT_CONFIG: Readonly<EngineConfig> = Object.freeze({
  standardMonthlyHours: 168,
  categoryRules: DEFAULT_CATEGORY_RULES,
  creativeThresholds: Object.freeze({ low: 50, medium: 80 }),
  excludedPeople: Object.freeze([]),
})

function positive(field: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(field, `${field} must be a positive number, got ${value}`)
  }
  return value
}

export function resolveConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const thresholds = overrides.creativeThresholds ?? DEFAULT_CONFIG.creativeThresholds
  if (!(thresholds.low >= 0 && thresholds.low < thresholds.medium && thresholds.medium <= 100)) {
    throw new ValidationError(
      'creativeThresholds',
      `Expected 0 <= low < medium <= 100, got low=${thresholds.low} medium=${thresholds.medium}`
    )
  }
  return {
    standardMonthlyHours: positive(
      'standardMonthlyHours',
      overrides.standardMonthlyHours ?? DEFAULT_CONFIG.standardMonthlyHours
    ),
    categoryRules: overrides.categoryRules
      ? compileCategoryRules(overrides.categoryRules)
      : DEFAULT_CONFIG.categoryRules,
    creativeThresholds: { low: thresholds.low, medium: thresholds.medium },
    excludedPeople: (overrides.excludedPeople ?? DEFAULT_CONFIG.excludedPeople).map(normalizeName),
  }
}

export function creativeBand(pct: number, thresholds: CreativeThresholds = DEFAULT_CONFIG.creativeThresholds): CreativeBand {
  if (pct <= thresholds.low) return 'low'
  if (pct <= thresholds.medium) return 'medium'
  return 'high'
}
