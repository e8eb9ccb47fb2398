import { describe, expect, test } from 'vitest'

import { rawLinesKind } from '../src/parsers/raw-lines.js'
import { spotFindingKind, toSpotResult } from '../src/parsers/spot-finding.js'
import { RecordStore } from '../src/store/record-store.js'

import {
  createMemoryLogger,
  createRejectingParser,
  createTripleParser,
  silentLogger,
} from './helpers/fixtures.js'

import type { SpotRecord } from '../src/parsers/spot-finding.js'
import type { Triple } from './helpers/fixtures.js'

describe('spot-finding parser', () => {
  test('maps one JSON object to one record', () => {
    const store = new RecordStore<SpotRecord>(4)
    const parse = spotFindingKind.createParser(silentLogger)
    const added = parse(
      '{"file-number": 332, "n_spots_total": 50, "n_spots_4A": 42, "extra": "x"}',
      store,
    )
    expect(added).toBe(1)
    expect(store.slice()).toEqual([[332, 50, 42]])
  })

  test('skips invalid JSON with a warning', () => {
    const { logger, entries } = createMemoryLogger()
    const store = new RecordStore<SpotRecord>(4)
    const parse = spotFindingKind.createParser(logger)
    expect(parse('{"file-number": 1,', store)).toBe(0)
    expect(store.length).toBe(0)
    expect(entries).toEqual([
      expect.objectContaining({
        level: 40,
        msg: 'line was not valid JSON, ignoring',
        line: '{"file-number": 1,',
      }),
    ])
  })

  test('skips objects missing required fields with a warning', () => {
    const { logger, entries } = createMemoryLogger()
    const store = new RecordStore<SpotRecord>(4)
    const parse = spotFindingKind.createParser(logger)
    expect(parse('{"file-number": 1, "n_spots_total": 5}', store)).toBe(0)
    expect(parse('{"file-number": 1.5, "n_spots_total": 5, "n_spots_4A": 2}', store)).toBe(0)
    expect(store.length).toBe(0)
    expect(entries).toHaveLength(2)
    expect(entries[0]).toEqual(
      expect.objectContaining({
        level: 40,
        msg: 'line is missing required fields, ignoring',
      }),
    )
  })

  test('skips a line whose mapping throws and keeps parsing', () => {
    const { logger, entries } = createMemoryLogger()
    const store = new RecordStore<number>(4)
    const parse = createRejectingParser(2, logger)
    expect(parse('{"n":2}', store)).toBe(0)
    expect(parse('{"n":3}', store)).toBe(1)
    expect(store.slice()).toEqual([3])
    expect(entries).toEqual([
      expect.objectContaining({
        level: 40,
        msg: 'line could not be mapped, ignoring',
        line: '{"n":2}',
        err: expect.objectContaining({ message: 'cannot map 2' }),
      }),
    ])
  })

  test('ignores blank lines silently', () => {
    const { logger, entries } = createMemoryLogger()
    const parse = spotFindingKind.createParser(logger)
    expect(parse('   \r', new RecordStore<SpotRecord>(1))).toBe(0)
    expect(entries).toEqual([])
  })

  test('tolerates a trailing carriage return', () => {
    const store = new RecordStore<SpotRecord>(1)
    const parse = spotFindingKind.createParser(silentLogger)
    expect(
      parse('{"file-number": 3, "n_spots_total": 2, "n_spots_4A": 1}\r', store),
    ).toBe(1)
    expect(store.at(0)).toEqual([3, 2, 1])
  })

  test('converts records to the result shape', () => {
    expect(toSpotResult([332, 50, 42])).toEqual({
      file_number: 332,
      n_spots_total: 50,
      n_spots_4A: 42,
    })
  })
})

describe('json record parser', () => {
  test('parses custom field layouts', () => {
    const store = new RecordStore<Triple>(2)
    const parse = createTripleParser(silentLogger)
    expect(parse('{"n":1,"total":50,"filtered":42}', store)).toBe(1)
    expect(parse('{"n":2,"total":12,"filtered":12}', store)).toBe(1)
    expect(store.slice()).toEqual([
      [1, 50, 42],
      [2, 12, 12],
    ])
  })
})

describe('raw-lines parser', () => {
  test('keeps each line as one record without its carriage return', () => {
    const store = new RecordStore<string>(2)
    const parse = rawLinesKind.createParser(silentLogger)
    expect(parse('first\r', store)).toBe(1)
    expect(parse('', store)).toBe(1)
    expect(store.slice()).toEqual(['first', ''])
  })
})
