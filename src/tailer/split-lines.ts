export type SplitLines = {
  lines: string[]
  rest: string
}

export const splitCompleteLines = (text: string): SplitLines => {
  const parts = text.split('\n')
  const rest = parts.pop() ?? ''
  return { lines: parts, rest }
}
