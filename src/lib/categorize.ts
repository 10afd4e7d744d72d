import defaultTable from './categoryKeywords.json'
import { ValidationError } from './errors'
import { TASK_CATEGORIES } from './types'
import type { AggregateRow, CategorizedAggregateRow, CategoryRule, TaskCategory } from './types'

type RuleInput = { category: string; keywords: readonly string[] }

function isRuleCategory(name: string): name is CategoryRule['category'] {
  return name !== 'Other' && TASK_CATEGORIES.some(c => c === name)
}

/**
 * Validates an ordered keyword table. Order is part of the result: a task goes to the first
 * category with a matching keyword, so the table stays an array, never an object.
 */
export function compileCategoryRules(table: readonly RuleInput[]): CategoryRule[] {
  const seen = new Set<string>()
  return table.map((entry, i) => {
    if (!isRuleCategory(entry.category)) {
      throw new ValidationError(`categoryRules[${i}].category`, `Unknown task category "${entry.category}"`)
    }
    if (seen.has(entry.category)) {
      throw new ValidationError(`categoryRules[${i}].category`, `Category "${entry.category}" is listed twice`)
    }
    seen.add(entry.category)
    const keywords = entry.keywords.map(k => k.toLowerCase())
    if (!keywords.length || keywords.some(k => !k.trim())) {
      throw new ValidationError(`categoryRules[${i}].keywords`, `Category "${entry.category}" has an empty keyword`)
    }
    return { category: entry.category, keywords: Object.freeze(keywords) }
  })
}

export const DEFAULT_CATEGORY_RULES: readonly CategoryRule[] = Object.freeze(compileCategoryRules(defaultTable))

export function categorizeTask(
  summary: string,
  taskType = '',
  rules: readonly CategoryRule[] = DEFAULT_CATEGORY_RULES
): TaskCategory {
  const text = `${summary} ${taskType}`.toLowerCase()
  for (const rule of rules) {
    if (rule.keywords.some(k => text.includes(k))) return rule.category
  }
  return 'Other'
}

export function categorizeRows(
  rows: readonly AggregateRow[],
  rules: readonly CategoryRule[] = DEFAULT_CATEGORY_RULES
): CategorizedAggregateRow[] {
  return rows.map(r => ({ ...r, category: categorizeTask(r.taskSummary, r.taskType, rules) }))
}
