import { DEFAULT_CATEGORY_RULES } from './categorize'
import { DEFAULT_CONFIG } from './config'
import { ValidationError } from './errors'
import { compareText } from './metrics'
import { personalStats } from './personalStats'
import type {
  CanonicalWorklogEntry,
  CategoryCost,
  CategoryRule,
  CostAllocation,
  CostWindow,
  TaskCategory,
  TaskCost,
} from './types'

export type CostParams = {
  person: string
  grossCompensation: number
  standardMonthlyHours?: number
  window: CostWindow
}

/** Every problem with the parameters; an empty list means they are usable. */
export function validateCostParams(params: CostParams): ValidationError[] {
  const issues: ValidationError[] = []
  if (!params.person.trim()) issues.push(new ValidationError('person', 'Person is required'))
  if (!(Number.isFinite(params.grossCompensation) && params.grossCompensation > 0)) {
    issues.push(
      new ValidationError('grossCompensation', `Gross compensation must be positive, got ${params.grossCompensation}`)
    )
  }
  const hours = params.standardMonthlyHours ?? DEFAULT_CONFIG.standardMonthlyHours
  if (!(Number.isFinite(hours) && hours > 0)) {
    issues.push(new ValidationError('standardMonthlyHours', `Standard monthly hours must be positive, got ${hours}`))
  }
  const w = params.window
  if (w.kind === 'month' && !(Number.isInteger(w.month.month) && w.month.month >= 1 && w.month.month <= 12)) {
    issues.push(new ValidationError('window', `Month must be 1-12, got ${w.month.month}`))
  }
  return issues
}

// hours -> money for the selected window
type Pricing = (hours: number) => number

/**
 * A single month is paid in full whatever was logged, so its cost is the month's pay split
 * by share of hours. Across all months there is no fixed pay to split, so hours are valued
 * at the hourly rate instead. The two must stay separate formulas.
 */
function pricingFor(window: CostWindow, gross: number, rate: number, totalHours: number): Pricing {
  switch (window.kind) {
    case 'month':
      return hours => (totalHours > 0 ? (hours * gross) / totalHours : 0)
    case 'all':
      return hours => hours * rate
  }
}

function pickTask(tasks: readonly TaskCost[], better: (a: number, b: number) => boolean): TaskCost | null {
  let best: TaskCost | null = null
  for (const t of tasks) {
    if (!best || better(t.cost, best.cost) || (t.cost === best.cost && compareText(t.taskKey, best.taskKey) < 0)) {
      best = t
    }
  }
  return best
}

function emptyCategoryCosts(): Record<TaskCategory, number> {
  return {
    'Bug/Hotfix': 0,
    'Code Review': 0,
    Testing: 0,
    Development: 0,
    'Analysis/Design': 0,
    'DevOps/Infrastructure': 0,
    Training: 0,
    'Administration/Support': 0,
    Meetings: 0,
    Other: 0,
  }
}

function totalCostFor(window: CostWindow, gross: number, price: Pricing, totalHours: number): number {
  switch (window.kind) {
    case 'month':
      return totalHours > 0 ? gross : 0
    case 'all':
      return price(totalHours)
  }
}

/**
 * Spreads a person's gross pay over their tasks and task categories for one window.
 * Throws `ValidationError` on unusable parameters (see `validateCostParams`). A window with
 * no logged hours is not an error: every cost is 0 and `status` is `allocation-undefined`.
 */
export function allocateCost(
  entries: readonly CanonicalWorklogEntry[],
  params: CostParams,
  rules: readonly CategoryRule[] = DEFAULT_CATEGORY_RULES
): CostAllocation {
  const issues = validateCostParams(params)
  if (issues.length) throw issues[0]

  const gross = params.grossCompensation
  const standardMonthlyHours = params.standardMonthlyHours ?? DEFAULT_CONFIG.standardMonthlyHours
  const hourlyRate = gross / standardMonthlyHours
  const stats = personalStats(entries, params.person, params.window, rules)
  const noHoursLogged = !(stats.totalHours > 0)
  const price = pricingFor(params.window, gross, hourlyRate, stats.totalHours)

  const tasks: TaskCost[] = stats.tasks
    .map(t => ({
      taskKey: t.taskKey,
      taskSummary: t.taskSummary,
      category: t.category,
      hours: t.totalHours,
      creativePct: t.weightedCreativePct,
      cost: price(t.totalHours),
    }))
    .sort((a, b) => compareText(a.taskKey, b.taskKey))

  const costByTask: Record<string, number> = {}
  for (const t of tasks) costByTask[t.taskKey] = t.cost

  const costByCategory = emptyCategoryCosts()
  const categories: CategoryCost[] = stats.categories.map(c => {
    const cost = price(c.hours)
    costByCategory[c.category] = cost
    return { ...c, cost, creativeCost: price(c.creativeHours) }
  })
  // stable sort keeps TASK_CATEGORIES order among equal costs
  categories.sort((a, b) => b.cost - a.cost)

  return {
    person: stats.person,
    window: params.window,
    grossCompensation: gross,
    standardMonthlyHours,
    hourlyRate,
    totalHours: stats.totalHours,
    creativeHours: stats.creativeHours,
    totalCost: totalCostFor(params.window, gross, price, stats.totalHours),
    creativeCost: price(stats.creativeHours),
    costByCategory,
    categories,
    costByTask,
    tasks,
    mostExpensiveTask: pickTask(tasks, (a, b) => a > b),
    leastExpensiveTask: pickTask(tasks, (a, b) => a < b),
    status: noHoursLogged ? 'allocation-undefined' : 'allocated',
    noHoursLogged,
  }
}
