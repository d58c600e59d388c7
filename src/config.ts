import { z } from 'zod'

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Diagnostics
  logLevel: z.enum(LOG_LEVELS).default('silent'),

  // Re-check marker invariants after every mutation
  validateMutations: z.boolean().default(false),
})

export type Config = z.infer<typeof configSchema>
export type LogLevel = Config['logLevel']

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined
  }
  return value === 'true' || value === '1'
}

/**
 * Load and validate configuration from environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    logLevel: env.ATTRIBUTED_SPANS_LOG_LEVEL || undefined,
    validateMutations: parseFlag(env.ATTRIBUTED_SPANS_VALIDATE),
  }

  return configSchema.parse(raw)
}

// Global config instance
export const config = loadConfig()
