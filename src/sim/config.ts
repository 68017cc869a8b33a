import { z } from 'zod'
import { DEFAULT_SANDBOX_SIZE, MAX_SANDBOX_SIZE, MIN_SANDBOX_SIZE } from './constants'
import { timeSeed } from './rng'
import { createLogger } from '../logger'

const log = createLogger('config')

const dimension = z.number()
  .int()
  .min(MIN_SANDBOX_SIZE)
  .max(MAX_SANDBOX_SIZE)
  .default(DEFAULT_SANDBOX_SIZE)

export const SimulationConfigSchema = z.object({
  width: dimension,
  height: dimension,
  seed: z.number().int().min(-0x80000000).max(0xFFFFFFFF).optional(),
  running: z.boolean().default(true),
})

export type SimulationConfigInput = z.input<typeof SimulationConfigSchema>

export interface SimulationConfig {
  width: number
  height: number
  seed: number
  running: boolean
}

/** Validate simulation options and fill in defaults. Throws listing every problem. */
export function parseSimulationConfig(input: SimulationConfigInput = {}): SimulationConfig {
  const result = SimulationConfigSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    log.error('Rejected simulation config', issues)
    throw new Error(`Invalid simulation config: ${issues}`)
  }
  const { width, height, seed, running } = result.data
  return { width, height, running, seed: seed ?? timeSeed() }
}
