export const DEFAULT_INITIAL_CAPACITY = 26_000

const clampIndex = (index: number, length: number): number => {
  if (Number.isNaN(index)) return 0
  const whole = Math.trunc(index)
  if (whole < 0) return Math.max(0, length + whole)
  return Math.min(whole, length)
}

/**
 * Append-only record buffer. Slots are preallocated and the backing array
 * doubles once it is full; entries below `length` never move or change.
 *
 * One writer only. Readers get copies, so a slice taken before an append is
 * unaffected by it.
 */
export class RecordStore<T> {
  private slots: T[]
  private count = 0

  constructor(initialCapacity = DEFAULT_INITIAL_CAPACITY) {
    if (!Number.isInteger(initialCapacity) || initialCapacity <= 0)
      throw new RangeError(
        `[store] initial capacity must be a positive integer: ${initialCapacity}`,
      )
    this.slots = new Array<T>(initialCapacity)
  }

  get length(): number {
    return this.count
  }

  get capacity(): number {
    return this.slots.length
  }

  append(record: T): number {
    if (this.count === this.slots.length) this.grow()
    const index = this.count
    this.slots[index] = record
    this.count += 1
    return index
  }

  at(index: number): T | undefined {
    const position = index < 0 ? this.count + index : index
    if (!Number.isInteger(position)) return undefined
    if (position < 0 || position >= this.count) return undefined
    return this.slots[position]
  }

  slice(start = 0, end = this.count): T[] {
    const from = clampIndex(start, this.count)
    const to = clampIndex(end, this.count)
    if (to <= from) return []
    return this.slots.slice(from, to)
  }

  tail(n: number): T[] {
    if (!(n > 0)) return []
    return this.slice(Math.max(0, this.count - Math.floor(n)))
  }

  private grow(): void {
    const next = this.slots.slice(0, this.count)
    next.length = this.slots.length * 2
    this.slots = next
  }
}
