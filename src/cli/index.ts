#!/usr/bin/env node
import { defaultConfig } from '../config.js'
import { closeRotatingLogs } from '../log/rotating-log.js'
import { configureLogging } from '../log/logger.js'
import { bestEffort } from '../log/safe.js'

import { parseTailArgs, TAIL_USAGE } from './args.js'
import { applyCliEnvOverrides } from './env.js'
import { createTailRegistry, runTail } from './run.js'

const parsed = parseTailArgs(process.argv.slice(2))
if (!parsed.ok) {
  console.error(`[cli] ${parsed.error}`)
  console.error(TAIL_USAGE)
  process.exit(1)
}
const args = parsed.value

const config = defaultConfig()
applyCliEnvOverrides(config)
if (args.pollMs !== undefined) config.tailer.pollMs = args.pollMs
if (args.idleTimeoutMs !== undefined)
  config.listener.idleTimeoutMs = args.idleTimeoutMs
if (args.logLevel) config.log.level = args.logLevel

const logger = await configureLogging({
  level: config.log.level,
  ...(args.logFile ? { file: args.logFile } : {}),
})
const registry = createTailRegistry(config, logger.child({ component: 'cli' }))
const controller = new AbortController()

const shutdown = async (reason: string, code = 0): Promise<never> => {
  logger.info({ reason }, 'shutting down')
  await bestEffort('cli:close_registry', () => registry.close(), {
    meta: { reason },
    logger,
  })
  await bestEffort('cli:close_logs', () => closeRotatingLogs(), { logger })
  process.exit(code)
}

process.on('SIGINT', () => controller.abort())
process.on('SIGTERM', () => controller.abort())

try {
  const outcome = await runTail({
    args,
    config,
    registry,
    signal: controller.signal,
    write: (line) => {
      process.stdout.write(line)
    },
  })
  logger.info(outcome, 'tail finished')
  await shutdown(outcome.status, outcome.status === 'failed' ? 1 : 0)
} catch (error) {
  const message = error instanceof Error ? error.message : String(error)
  await shutdown(`tail failed: ${message}`, 1)
}
