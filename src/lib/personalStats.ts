import { aggregateWorklogs } from './aggregate'
import { categorizeRows, DEFAULT_CATEGORY_RULES } from './categorize'
import { compareText } from './metrics'
import { normalizeName } from './nameNormalize'
import { TASK_CATEGORIES } from './types'
import type {
  CanonicalWorklogEntry,
  CategorizedAggregateRow,
  CategoryRule,
  CostWindow,
  TaskCategory,
} from './types'
import { entriesForPerson } from './window'

export type CategoryBreakdown = {
  category: TaskCategory
  taskCount: number
  hours: number
  creativeHours: number
}

export type PersonalStats = {
  person: string
  window: CostWindow
  taskCount: number
  totalHours: number
  creativeHours: number
  /** Hours-weighted over tasks with a percentage; null when there are none. */
  creativePctAvg: number | null
  creativeScore: number
  tasks: CategorizedAggregateRow[]
  topTasks: CategorizedAggregateRow[]
  categories: CategoryBreakdown[]
}

export const TOP_TASK_LIMIT = 10

/** Categories that have tasks, in the order of `TASK_CATEGORIES`. */
export function breakdownByCategory(tasks: readonly CategorizedAggregateRow[]): CategoryBreakdown[] {
  const byCategory = new Map<TaskCategory, CategoryBreakdown>()
  for (const t of tasks) {
    const c = byCategory.get(t.category) ?? { category: t.category, taskCount: 0, hours: 0, creativeHours: 0 }
    c.taskCount += 1
    c.hours += t.totalHours
    c.creativeHours += t.creativeHours
    byCategory.set(t.category, c)
  }
  return TASK_CATEGORIES.flatMap(c => byCategory.get(c) ?? [])
}

export function personalStats(
  entries: readonly CanonicalWorklogEntry[],
  person: string,
  window: CostWindow,
  rules: readonly CategoryRule[] = DEFAULT_CATEGORY_RULES
): PersonalStats {
  const name = normalizeName(person)
  const tasks = categorizeRows(aggregateWorklogs(entriesForPerson(entries, name, window)), rules)
  const withData = tasks.filter(t => t.hasCreativeData)

  let totalHours = 0
  let creativeHours = 0
  for (const t of tasks) {
    totalHours += t.totalHours
    creativeHours += t.creativeHours
  }
  let dataHours = 0
  let weighted = 0
  let score = 0
  for (const t of withData) {
    dataHours += t.totalHours
    weighted += t.totalHours * t.weightedCreativePct
    score += t.creativeScore
  }

  const topTasks = [...withData]
    .sort((a, b) => b.creativeScore - a.creativeScore || compareText(a.taskKey, b.taskKey))
    .slice(0, TOP_TASK_LIMIT)

  return {
    person: name,
    window,
    taskCount: tasks.length,
    totalHours,
    creativeHours,
    creativePctAvg: dataHours > 0 ? weighted / dataHours : null,
    creativeScore: score,
    tasks,
    topTasks,
    categories: breakdownByCategory(tasks),
  }
}
