import { defineWatcherKind } from './types.js'

export const rawLinesKind = defineWatcherKind<string>({
  name: 'raw-lines',
  createParser: () => (line, sink) => {
    sink.append(line.endsWith('\r') ? line.slice(0, -1) : line)
    return 1
  },
})
