import { isLogLevel } from '../log/logger.js'

import type { AppConfig } from '../config.js'

const parseEnvPositiveInteger = (
  name: string,
  value: string | undefined,
): number | undefined => {
  if (!value) return undefined
  const parsed = Number(value)
  if (Number.isInteger(parsed) && parsed > 0) return parsed
  console.warn(`[cli] invalid ${name}:`, value)
  return undefined
}

const parseEnvNonNegativeInteger = (
  name: string,
  value: string | undefined,
): number | undefined => {
  if (!value) return undefined
  const parsed = Number(value)
  if (Number.isInteger(parsed) && parsed >= 0) return parsed
  console.warn(`[cli] invalid ${name}:`, value)
  return undefined
}

const applyTailerEnv = (config: AppConfig): void => {
  const pollMs = parseEnvPositiveInteger(
    'RECORD_TAIL_POLL_MS',
    process.env.RECORD_TAIL_POLL_MS?.trim(),
  )
  if (pollMs !== undefined) config.tailer.pollMs = pollMs

  const chunkBytes = parseEnvPositiveInteger(
    'RECORD_TAIL_CHUNK_BYTES',
    process.env.RECORD_TAIL_CHUNK_BYTES?.trim(),
  )
  if (chunkBytes !== undefined) config.tailer.chunkBytes = chunkBytes

  const capacity = parseEnvPositiveInteger(
    'RECORD_TAIL_STORE_CAPACITY',
    process.env.RECORD_TAIL_STORE_CAPACITY?.trim(),
  )
  if (capacity !== undefined) config.store.initialCapacity = capacity
}

const applyListenerEnv = (config: AppConfig): void => {
  const idleTimeoutMs = parseEnvNonNegativeInteger(
    'RECORD_TAIL_IDLE_TIMEOUT_MS',
    process.env.RECORD_TAIL_IDLE_TIMEOUT_MS?.trim(),
  )
  if (idleTimeoutMs !== undefined) config.listener.idleTimeoutMs = idleTimeoutMs

  const maxPending = parseEnvPositiveInteger(
    'RECORD_TAIL_MAX_PENDING',
    process.env.RECORD_TAIL_MAX_PENDING?.trim(),
  )
  if (maxPending !== undefined) config.listener.maxPending = maxPending
}

const applyLogEnv = (config: AppConfig): void => {
  const level = process.env.RECORD_TAIL_LOG_LEVEL?.trim().toLowerCase()
  if (!level) return
  if (isLogLevel(level)) {
    config.log.level = level
    return
  }
  console.warn('[cli] invalid RECORD_TAIL_LOG_LEVEL:', level)
}

export const applyCliEnvOverrides = (config: AppConfig): void => {
  applyTailerEnv(config)
  applyListenerEnv(config)
  applyLogEnv(config)
}
