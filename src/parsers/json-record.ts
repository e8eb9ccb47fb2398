import { getLogger } from '../log/logger.js'

import type { RecordParser } from './types.js'
import type { Logger } from 'pino'
import type { z } from 'zod'

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ')

export const createJsonRecordParser = <D, T>(params: {
  schema: z.ZodType<D>
  toRecords: (data: D) => readonly T[]
  logger?: Logger
}): RecordParser<T> => {
  const logger = params.logger ?? getLogger('parser')
  return (line, sink) => {
    const trimmed = line.trim()
    if (!trimmed) return 0
    let value: unknown
    try {
      value = JSON.parse(trimmed)
    } catch {
      logger.warn({ line }, 'line was not valid JSON, ignoring')
      return 0
    }
    const validated = params.schema.safeParse(value)
    if (!validated.success) {
      logger.warn(
        { line, issues: formatIssues(validated.error) },
        'line is missing required fields, ignoring',
      )
      return 0
    }
    let records: readonly T[]
    try {
      records = params.toRecords(validated.data)
    } catch (error) {
      logger.warn({ line, err: error }, 'line could not be mapped, ignoring')
      return 0
    }
    for (const record of records) sink.append(record)
    return records.length
  }
}
