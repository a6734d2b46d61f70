import Papa from 'papaparse'
import { DecisionTable } from './decisionTable'
import { DecisionTableError } from './errors'
import { parseScore } from './missing'

/**
 * Parse a decision table laid out one criterion per row:
 *
 *   criterion,weight,Alt A,Alt B
 *   Safety,10,8,9
 *   Cost,8,7,?
 *
 * Blank or "?" cells are missing scores.
 */
export function parseDecisionTableCSV(csvText: string): DecisionTable {
  const parsed = Papa.parse<string[]>(csvText, { skipEmptyLines: true })
  if (parsed.errors.length) {
    const details = parsed.errors.map((e) => `row ${e.row ?? '?'}: ${e.message}`)
    throw new DecisionTableError('parse', `Could not parse decision table CSV: ${details[0]}`, details)
  }
  const rows = parsed.data
  if (rows.length < 2) throw new DecisionTableError('parse', 'Decision table CSV needs a header and at least one criterion row.')

  const header = rows[0].map((h) => h.trim())
  if (header.length < 2) throw new DecisionTableError('parse', 'Header must start with a criterion and a weight column.')
  const alternatives = header.slice(2).map((h, j) => h || `Alternative_${j + 1}`)

  const criteria: string[] = []
  const weights: number[] = []
  const columns: number[][] = alternatives.map(() => [])

  for (let i = 1; i < rows.length; i++) {
    const row = rows[i]
    if (row.length !== header.length)
      throw new DecisionTableError('shape', `Row ${i + 1} has ${row.length} cells, expected ${header.length}.`)
    const name = row[0].trim() || `Criterion_${i}`
    const weight = Number(row[1].trim())
    if (row[1].trim() === '' || Number.isNaN(weight))
      throw new DecisionTableError('parse', `Weight for "${name}" is not a number: "${row[1]}".`)
    criteria.push(name)
    weights.push(weight)
    alternatives.forEach((alt, j) => {
      const score = parseScore(row[j + 2])
      if (score === null)
        throw new DecisionTableError('parse', `Score of "${alt}" on "${name}" is not a number: "${row[j + 2]}".`)
      columns[j].push(score)
    })
  }

  return new DecisionTable({ criteria, weights, alternatives, scores: columns })
}
