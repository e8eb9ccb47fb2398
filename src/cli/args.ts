import { parseArgs } from 'node:util'

import { parseLinesRange } from '../listener/range.js'
import { isLogLevel, type LogLevel } from '../log/logger.js'

export const TAIL_KINDS = ['spot-finding', 'raw-lines'] as const

export type TailKind = (typeof TAIL_KINDS)[number]

export type TailArgs = {
  path: string
  kind: TailKind
  from: number
  idleTimeoutMs?: number
  pollMs?: number
  logFile?: string
  logLevel?: LogLevel
}

export type TailParseResult =
  | { ok: true; value: TailArgs }
  | { ok: false; error: string }

export const TAIL_USAGE =
  'usage: record-tail <path> [--kind spot-finding|raw-lines] [--from N] [--idle-timeout MS] [--poll MS] [--log-file PATH] [--log-level LEVEL]'

const isTailKind = (value: string): value is TailKind =>
  TAIL_KINDS.some((kind) => kind === value)

const parseInteger = (
  value: string | undefined,
  min: number,
): number | 'invalid' | undefined => {
  if (value === undefined) return undefined
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < min) return 'invalid'
  return parsed
}

const parseTailOptions = (args: string[]) =>
  parseArgs({
    args,
    allowPositionals: true,
    strict: true,
    options: {
      kind: { type: 'string', short: 'k' },
      from: { type: 'string' },
      'idle-timeout': { type: 'string' },
      poll: { type: 'string' },
      'log-file': { type: 'string' },
      'log-level': { type: 'string' },
    },
  })

export const parseTailArgs = (args: string[]): TailParseResult => {
  let parsed: ReturnType<typeof parseTailOptions>
  try {
    parsed = parseTailOptions(args)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    return { ok: false, error: message }
  }
  const { values, positionals } = parsed

  const [path, ...extra] = positionals
  if (!path) return { ok: false, error: 'a file path is required' }
  if (extra.length > 0)
    return { ok: false, error: `unexpected argument: ${extra[0]}` }

  const kind = values.kind ?? 'spot-finding'
  if (!isTailKind(kind))
    return { ok: false, error: `--kind must be ${TAIL_KINDS.join('|')}` }

  const from = values.from === undefined ? 0 : parseLinesRange(values.from)
  if (from === undefined)
    return { ok: false, error: '--from must be N or lines=N-' }

  const idleTimeoutMs = parseInteger(values['idle-timeout'], 0)
  if (idleTimeoutMs === 'invalid')
    return { ok: false, error: '--idle-timeout must be a non-negative integer' }

  const pollMs = parseInteger(values.poll, 1)
  if (pollMs === 'invalid')
    return { ok: false, error: '--poll must be a positive integer' }

  const logLevel = values['log-level']?.trim().toLowerCase()
  if (logLevel !== undefined && !isLogLevel(logLevel))
    return { ok: false, error: `invalid --log-level: ${logLevel}` }

  return {
    ok: true,
    value: {
      path,
      kind,
      from,
      ...(idleTimeoutMs !== undefined ? { idleTimeoutMs } : {}),
      ...(pollMs !== undefined ? { pollMs } : {}),
      ...(values['log-file'] ? { logFile: values['log-file'] } : {}),
      ...(logLevel !== undefined ? { logLevel } : {}),
    },
  }
}
