import { z } from 'zod'

import { createJsonRecordParser } from './json-record.js'
import { defineWatcherKind } from './types.js'

export type SpotRecord = readonly [
  fileNumber: number,
  spotsTotal: number,
  spotsFiltered: number,
]

export type SpotResult = {
  file_number: number
  n_spots_total: number
  n_spots_4A: number
}

const spotLineSchema = z.object({
  'file-number': z.number().int(),
  n_spots_total: z.number().int(),
  n_spots_4A: z.number().int(),
})

type SpotLine = z.infer<typeof spotLineSchema>

export const spotFindingKind = defineWatcherKind<SpotRecord>({
  name: 'spot-finding',
  createParser: (logger) =>
    createJsonRecordParser<SpotLine, SpotRecord>({
      schema: spotLineSchema,
      toRecords: (data) => [
        [data['file-number'], data.n_spots_total, data.n_spots_4A],
      ],
      logger,
    }),
})

export const toSpotResult = ([
  fileNumber,
  spotsTotal,
  spotsFiltered,
]: SpotRecord): SpotResult => ({
  file_number: fileNumber,
  n_spots_total: spotsTotal,
  n_spots_4A: spotsFiltered,
})
