const RANGE_RE = /^\s*(?:lines\s*=\s*)?(\d+)\s*(?:-\s*)?$/i

export const parseLinesRange = (
  header: string | undefined,
): number | undefined => {
  if (!header) return undefined
  const match = header.match(RANGE_RE)
  if (!match?.[1]) return undefined
  const start = Number(match[1])
  return Number.isSafeInteger(start) ? start : undefined
}
