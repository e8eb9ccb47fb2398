import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'

import { parse as parseYaml } from 'yaml'
import { z } from 'zod'

import { LOG_LEVELS } from './log/logger.js'

const defaultConfigSchema = z
  .object({
    tailer: z
      .object({
        pollMs: z.number().int().positive(),
        chunkBytes: z.number().int().positive(),
      })
      .strict(),
    store: z
      .object({
        initialCapacity: z.number().int().positive(),
      })
      .strict(),
    listener: z
      .object({
        idleTimeoutMs: z.number().int().nonnegative(),
        maxPending: z.number().int().positive(),
      })
      .strict(),
    log: z
      .object({
        level: z.enum(LOG_LEVELS),
      })
      .strict(),
  })
  .strict()

export type AppDefaults = z.infer<typeof defaultConfigSchema>

export const DEFAULT_CONFIG_PATH = fileURLToPath(
  new URL('../config/default.yaml', import.meta.url),
)

export const parseDefaultConfigYaml = (source: string): AppDefaults => {
  const parsed: unknown = parseYaml(source)
  const validated = defaultConfigSchema.safeParse(parsed)
  if (validated.success) return validated.data

  const issues = validated.error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ')
  throw new Error(`[config] invalid yaml defaults: ${issues}`)
}

export const loadDefaultConfigFromYaml = (
  path = DEFAULT_CONFIG_PATH,
): AppDefaults => {
  const source = readFileSync(path, 'utf8')
  return parseDefaultConfigYaml(source)
}
