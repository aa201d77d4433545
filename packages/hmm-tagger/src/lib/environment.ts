import { z } from 'zod'
import { ConfigurationError } from './errors.js'

const environmentSchema = z.object({
  HMM_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  // seed for models constructed without an explicit random source
  HMM_RANDOM_SEED: z.coerce.number().int().default(1337)
})

export type Environment = z.infer<typeof environmentSchema>

function buildFromProcess(): Record<string, string | undefined> {
  const values: Record<string, string | undefined> = {}
  for (const key of Object.keys(environmentSchema.shape)) {
    values[key] = process.env[key]
  }
  return values
}

let validated: Environment | null = null

/** Environment variables, validated on first access and cached afterwards. */
export function environment(): Environment {
  if (validated) return validated

  const parsed = environmentSchema.safeParse(buildFromProcess())
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
    throw new ConfigurationError('Missing or invalid environment variables', issues)
  }

  validated = parsed.data
  return validated
}
