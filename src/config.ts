import { z } from 'zod'
import { DEFAULT_MAX_SCORE } from './lib/decisionTable'
import { DecisionTableError } from './lib/errors'
import { DEFAULT_PERTURBATION_FACTORS } from './lib/sensitivity'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

export const AnalysisConfigSchema = z.object({
  /** Top of the scoring scale; normalized scores are raw / maxScore */
  maxScore: z.number().finite().positive().default(DEFAULT_MAX_SCORE),
  /** Multipliers applied to one criterion weight at a time */
  perturbationFactors: z.array(z.number().finite()).default(() => [...DEFAULT_PERTURBATION_FACTORS]),
  noCompleteRow: z.enum(['error', 'least_incomplete']).default('error'),
  logLevel: z.enum(LOG_LEVELS).default('warn'),
})

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>
export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>

export function resolveAnalysisConfig(input: AnalysisConfigInput = {}): AnalysisConfig {
  const parsed = AnalysisConfigSchema.safeParse(input)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    throw new DecisionTableError('config', `Invalid analysis config: ${issues.join('; ')}`, issues)
  }
  return parsed.data
}
