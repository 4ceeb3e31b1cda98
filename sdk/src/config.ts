import { z } from 'zod'
import { AttributeScope } from './attributes/attribute'
import { ConfigError } from './types'

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Logging
  debug: z.boolean().default(false),

  // Reject attributes the catalog does not define
  strict: z.boolean().default(true),

  // Extra attribute definitions merged into the default catalog
  attributes: z
    .array(
      z.object({
        key: z.string().min(1),
        scope: z.nativeEnum(AttributeScope),
        exclusiveGroup: z.string().min(1).optional()
      })
    )
    .default([]),

  // Snapshots (autosave, clipboard)
  snapshot: z
    .object({
      compressThreshold: z.number().int().nonnegative().default(1024)
    })
    .default({})
})

export type QuireConfig = z.infer<typeof configSchema>

export type QuireConfigInput = z.input<typeof configSchema>

/**
 * Load and validate configuration
 *
 * Explicit options win over the environment (`QUIRE_DEBUG=1` turns on debug
 * logging).
 *
 * @throws ConfigError if the options do not match the schema
 */
export function loadConfig(
  input: QuireConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): QuireConfig {
  const envDebug = env.QUIRE_DEBUG === '1' || env.QUIRE_DEBUG === 'true'
  const raw = { ...input, debug: input.debug ?? envDebug }

  const result = configSchema.safeParse(raw)
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${details}`)
  }

  return result.data
}
