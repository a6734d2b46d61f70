/** Failure categories raised by the decision table core. */
export type DecisionTableErrorKind =
  | 'shape'
  | 'degenerate_weights'
  | 'index'
  | 'no_complete_row'
  | 'config'
  | 'parse'

export class DecisionTableError extends Error {
  readonly kind: DecisionTableErrorKind
  readonly details: string[]

  constructor(kind: DecisionTableErrorKind, message: string, details: string[] = []) {
    super(message)
    this.name = 'DecisionTableError'
    this.kind = kind
    this.details = details
  }
}

export function isDecisionTableError(error: unknown, kind?: DecisionTableErrorKind): error is DecisionTableError {
  return error instanceof DecisionTableError && (kind === undefined || error.kind === kind)
}
