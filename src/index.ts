import { defaultConfig } from './config.js'
import { DeltaChannel } from './listener/delta-channel.js'
import { followRecords } from './listener/follow.js'
import { Listener } from './listener/listener.js'
import { parseLinesRange } from './listener/range.js'
import { configureLogging, createLogger, getLogger } from './log/logger.js'
import { createJsonRecordParser } from './parsers/json-record.js'
import { rawLinesKind } from './parsers/raw-lines.js'
import { spotFindingKind, toSpotResult } from './parsers/spot-finding.js'
import { defineWatcherKind } from './parsers/types.js'
import { RecordStore } from './store/record-store.js'
import { readLinesContinuous } from './tailer/read-lines.js'
import { splitCompleteLines } from './tailer/split-lines.js'
import { WatcherRegistry } from './watcher/registry.js'
import { Watcher } from './watcher/watcher.js'

import type { AppConfig, ConfigOverrides } from './config.js'
import type { Delta } from './listener/delta-channel.js'
import type {
  Chunk,
  ListenerOptions,
  RecordSource,
} from './listener/listener.js'
import type { LogLevel } from './log/logger.js'
import type { SpotRecord, SpotResult } from './parsers/spot-finding.js'
import type { RecordParser, RecordSink, WatcherKind } from './parsers/types.js'
import type { ReadLinesOptions } from './tailer/read-lines.js'
import type { WatcherKinds } from './watcher/registry.js'
import type { WatcherOptions, WatcherStatus } from './watcher/watcher.js'

export {
  DeltaChannel,
  Listener,
  RecordStore,
  Watcher,
  WatcherRegistry,
  configureLogging,
  createJsonRecordParser,
  createLogger,
  defaultConfig,
  defineWatcherKind,
  followRecords,
  getLogger,
  parseLinesRange,
  rawLinesKind,
  readLinesContinuous,
  splitCompleteLines,
  spotFindingKind,
  toSpotResult,
}
export type {
  AppConfig,
  Chunk,
  ConfigOverrides,
  Delta,
  ListenerOptions,
  LogLevel,
  ReadLinesOptions,
  RecordParser,
  RecordSink,
  RecordSource,
  SpotRecord,
  SpotResult,
  WatcherKind,
  WatcherKinds,
  WatcherOptions,
  WatcherStatus,
}
