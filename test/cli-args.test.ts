import { describe, expect, test } from 'vitest'

import { parseTailArgs } from '../src/cli/args.js'

describe('parseTailArgs', () => {
  test('defaults to spot-finding from the first record', () => {
    expect(parseTailArgs(['results.out'])).toEqual({
      ok: true,
      value: { path: 'results.out', kind: 'spot-finding', from: 0 },
    })
  })

  test('reads every option', () => {
    expect(
      parseTailArgs([
        '-k',
        'raw-lines',
        'results.out',
        '--from',
        'lines=3-',
        '--idle-timeout',
        '0',
        '--poll',
        '20',
        '--log-file',
        'tail.log',
        '--log-level',
        'Debug',
      ]),
    ).toEqual({
      ok: true,
      value: {
        path: 'results.out',
        kind: 'raw-lines',
        from: 3,
        idleTimeoutMs: 0,
        pollMs: 20,
        logFile: 'tail.log',
        logLevel: 'debug',
      },
    })
  })

  test.each([
    [[], 'a file path is required'],
    [['a.out', 'b.out'], 'unexpected argument: b.out'],
    [['a.out', '--kind', 'xml'], '--kind must be spot-finding|raw-lines'],
    [['a.out', '--from', 'bytes=1-'], '--from must be N or lines=N-'],
    [
      ['a.out', '--idle-timeout', '-1'],
      '--idle-timeout must be a non-negative integer',
    ],
    [['a.out', '--poll', '0'], '--poll must be a positive integer'],
    [['a.out', '--log-level', 'loud'], 'invalid --log-level: loud'],
  ])('rejects %j', (args, error) => {
    expect(parseTailArgs(args)).toEqual({ ok: false, error })
  })

  test('reports unknown options', () => {
    const result = parseTailArgs(['a.out', '--nope'])
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error).toContain("'--nope'")
  })
})
