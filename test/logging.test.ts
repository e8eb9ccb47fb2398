import { readFile } from 'node:fs/promises'
import { join } from 'node:path'

import { afterEach, describe, expect, test } from 'vitest'

import { configureLogging, getLogger, isLogLevel } from '../src/log/logger.js'
import { closeRotatingLogs } from '../src/log/rotating-log.js'

import { createTmpDir } from './helpers/fixtures.js'

afterEach(async () => {
  await closeRotatingLogs()
})

describe('logging', () => {
  test('writes component logs to a rotating file when configured', async () => {
    const dir = await createTmpDir('logging')
    const file = join(dir, 'logs', 'tail.log')
    await configureLogging({ level: 'info', file })

    getLogger('watcher').info({ path: 'a.out' }, 'watcher started')
    getLogger('watcher').debug('below the level')
    await closeRotatingLogs()

    const lines = (await readFile(file, 'utf8')).trim().split('\n')
    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      level: 30,
      schema: 'record-tail.log.v1',
      component: 'watcher',
      path: 'a.out',
      msg: 'watcher started',
    })
  })

  test('recognises pino level names only', () => {
    expect(isLogLevel('debug')).toBe(true)
    expect(isLogLevel('silent')).toBe(true)
    expect(isLogLevel('verbose')).toBe(false)
  })
})
