import type { RejectionReport } from './types'

export type WorklogErrorKind =
  | 'ParseError'
  | 'ValidationError'
  | 'EmptyInputError'
  | 'WorkbookFormatError'

export abstract class WorklogError extends Error {
  abstract readonly kind: WorklogErrorKind

  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** Malformed time, date or percentage text. */
export class ParseError extends WorklogError {
  readonly kind = 'ParseError' as const

  constructor(
    readonly field: string,
    readonly value: unknown,
    message: string
  ) {
    super(message)
  }
}

/** A value that parsed but is out of range, or a mandatory field that is missing. */
export class ValidationError extends WorklogError {
  readonly kind = 'ValidationError' as const

  constructor(
    readonly field: string,
    message: string
  ) {
    super(message)
  }
}

export class EmptyInputError extends WorklogError {
  readonly kind = 'EmptyInputError' as const

  constructor(readonly rejections: RejectionReport) {
    super(
      rejections.total > 0
        ? `No valid worklog rows: all ${rejections.total} rows were rejected`
        : 'No worklog rows to process'
    )
  }
}

export class WorkbookFormatError extends WorklogError {
  readonly kind = 'WorkbookFormatError' as const
}

export function isRowError(err: unknown): err is ParseError | ValidationError {
  return err instanceof ParseError || err instanceof ValidationError
}
