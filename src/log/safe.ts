import { readErrorCode } from '../shared/error-code.js'

import { getLogger } from './logger.js'

import type { Logger } from 'pino'

export type SafeOptions = {
  logger?: Logger
  meta?: Record<string, unknown>
  ignoreCodes?: string[]
}

export const logSafeError = (
  context: string,
  error: unknown,
  options: SafeOptions = {},
): void => {
  const logger = options.logger ?? getLogger('safe')
  const code = readErrorCode(error)
  logger.error(
    {
      context,
      err: error,
      ...(code ? { code } : {}),
      ...(options.meta ? { meta: options.meta } : {}),
    },
    `[safe] ${context}`,
  )
}

export const safe = async <T, F>(
  context: string,
  fn: () => T | Promise<T>,
  fallback: F,
  options: SafeOptions = {},
): Promise<T | F> => {
  try {
    return await fn()
  } catch (error) {
    const code = readErrorCode(error)
    if (!code || !options.ignoreCodes?.includes(code))
      logSafeError(context, error, options)
    return fallback
  }
}

export const safeOrUndefined = <T>(
  context: string,
  fn: () => T | Promise<T>,
  options: SafeOptions = {},
): Promise<T | undefined> => safe(context, fn, undefined, options)

export const bestEffort = async (
  context: string,
  fn: () => unknown,
  options: SafeOptions = {},
): Promise<void> => {
  await safe(context, fn, undefined, options)
}
