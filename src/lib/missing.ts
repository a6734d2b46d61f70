/**
 * Missing scores: an unmeasured cell is stored as NaN and tested only through
 * isMissing, never by comparison.
 */

export const MISSING = Number.NaN

const MISSING_TOKENS = new Set(['', '?', 'na', 'n/a', 'nan', '-', '--'])

export function isMissing(value: number): boolean {
  return Number.isNaN(value)
}

export function hasMissing(row: readonly number[]): boolean {
  return row.some(isMissing)
}

export function countMissing(row: readonly number[]): number {
  let n = 0
  for (const v of row) if (isMissing(v)) n++
  return n
}

/** Raw cell to score. Blank and the usual "don't know" tokens become MISSING; anything else non-numeric is null. */
export function parseScore(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) return MISSING
  if (typeof value === 'number') return value
  const trimmed = value.trim()
  if (MISSING_TOKENS.has(trimmed.toLowerCase())) return MISSING
  const num = Number(trimmed)
  return Number.isNaN(num) ? null : num
}
