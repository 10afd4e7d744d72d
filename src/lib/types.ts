export type RawWorklogEntry = {
  author: string
  issueKey: string
  issueSummary: string
  startDate: string | Date
  timeSpent: string | number
  creativePercent?: string | number | null
  issueType?: string
  issueStatus?: string
  components?: string
}

// one row of the hierarchical "Level 0/1/2" report (0 = person, 1 = task, 2 = creative %)
export type LegacyReportRow = {
  level: number | string
  description: string
  key?: string
  totalTimeSpent?: string | number
}

export type YearMonth = {
  year: number
  month: number // 1-12
}

export type CanonicalWorklogEntry = {
  readonly sourceIndex: number
  readonly person: string
  readonly taskKey: string
  readonly taskSummary: string
  readonly taskType: string
  readonly status: string
  readonly components: string
  readonly date: string // YYYY-MM-DD
  readonly month: YearMonth
  readonly hours: number
  readonly creativePct: number
  readonly hasCreativeData: boolean
}

export const TASK_CATEGORIES = [
  'Bug/Hotfix',
  'Code Review',
  'Testing',
  'Development',
  'Analysis/Design',
  'DevOps/Infrastructure',
  'Training',
  'Administration/Support',
  'Meetings',
  'Other',
] as const

export type TaskCategory = (typeof TASK_CATEGORIES)[number]

export type CategoryRule = {
  category: Exclude<TaskCategory, 'Other'>
  keywords: readonly string[]
}

export type DateRange = {
  from: string
  to: string
}

export type AggregateRow = {
  person: string
  taskKey: string
  taskSummary: string
  taskType: string
  totalHours: number
  weightedCreativePct: number
  creativeHours: number
  creativeScore: number
  entryCount: number
  hasCreativeData: boolean
  dateRange: DateRange
}

export type CategorizedAggregateRow = AggregateRow & {
  category: TaskCategory
}

export type RejectionKind = 'ParseError' | 'ValidationError'

export type RejectedRow = {
  sourceIndex: number
  kind: RejectionKind
  field: string
  message: string
}

export type RejectionReport = {
  total: number
  byKind: Record<RejectionKind, number>
  rows: RejectedRow[]
}

export type CostWindow =
  | { kind: 'month'; month: YearMonth }
  | { kind: 'all' }

export type TaskCost = {
  taskKey: string
  taskSummary: string
  category: TaskCategory
  hours: number
  creativePct: number
  cost: number
}

export type CategoryCost = {
  category: TaskCategory
  taskCount: number
  hours: number
  creativeHours: number
  cost: number
  creativeCost: number
}

export type AllocationStatus = 'allocated' | 'allocation-undefined'

export type CostAllocation = {
  person: string
  window: CostWindow
  grossCompensation: number
  standardMonthlyHours: number
  hourlyRate: number
  totalHours: number
  creativeHours: number
  totalCost: number
  creativeCost: number
  costByCategory: Record<TaskCategory, number>
  categories: CategoryCost[]
  costByTask: Record<string, number>
  tasks: TaskCost[]
  mostExpensiveTask: TaskCost | null
  leastExpensiveTask: TaskCost | null
  status: AllocationStatus
  noHoursLogged: boolean
}
