import type { Logger } from 'pino'

export type RecordSink<T> = {
  append: (record: T) => unknown
}

/**
 * Turns one raw line into zero or more records pushed through `sink`, and
 * returns how many it pushed. Malformed data is logged and counts as 0; a
 * parser never throws for bad input.
 */
export type RecordParser<T> = (line: string, sink: RecordSink<T>) => number

export type WatcherKind<T> = {
  name: string
  createParser: (logger: Logger) => RecordParser<T>
}

export const defineWatcherKind = <T>(kind: WatcherKind<T>): WatcherKind<T> =>
  kind
