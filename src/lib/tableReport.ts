/**
 * Plain-text rendering of decision tables and sensitivity results.
 * Read-only: takes tables and records, returns lines.
 */

import type { DecisionTable } from './decisionTable'
import { isMissing } from './missing'
import type { SensitivityRecord } from './sensitivity'

const MISSING_TEXT = '--'

function num(value: number, width: number, digits = 2): string {
  return (isMissing(value) ? MISSING_TEXT : value.toFixed(digits)).padStart(width)
}

function headerLine(table: DecisionTable): string {
  const m = table.alternativeCount
  let line = 'criterion         W'
  for (let i = 0; i < m; i++) line += `    S${i + 1}`
  for (let i = 0; i < m; i++) line += `     WS${i + 1}`
  return line
}

function criterionLine(table: DecisionTable, c: number): string {
  let line = table.criteria[c].padEnd(14) + num(table.weights[c], 5)
  for (let a = 0; a < table.alternativeCount; a++) line += ' ' + num(table.scores[a][c], 5)
  for (let a = 0; a < table.alternativeCount; a++) line += '  ' + num(table.weightedScore(a, c), 6)
  return line
}

function totalsLine(table: DecisionTable): string {
  let line = ' TOTALS             ' + '      '.repeat(table.alternativeCount)
  for (const total of table.totals()) line += ` ${num(total, 5)} `
  return line
}

export function formatDecisionTable(table: DecisionTable): string[] {
  return [
    headerLine(table),
    ...table.criteria.map((_, c) => criterionLine(table, c)),
    totalsLine(table),
  ]
}

/** Alternatives with their 1-based column number, as referenced by S1..Sm. */
export function formatAlternativeLegend(table: DecisionTable): string[] {
  return table.alternatives.map((name, a) => `S${a + 1} = ${name}`)
}

export function formatSensitivityRecords(records: readonly SensitivityRecord[]): string[] {
  return records.map((r) => {
    const best = r.bestRank === null ? MISSING_TEXT : `${r.bestRank} (${r.bestName})`
    return `${r.criterion.padEnd(14)} weight=${r.weight.toFixed(1).padStart(5)}  best=${best}`
  })
}
