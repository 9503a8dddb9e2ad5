/**
 * A closed interval as a `[start, end]` pair, `start <= end`.
 */
export type Interval<T extends number | Date = number> = readonly [T, T]

const valueOf = (point: number | Date): number =>
  point instanceof Date ? point.getTime() : point

/**
 * Merges overlapping intervals into maximal non-overlapping spans.
 *
 * Intervals are sorted by start; a following interval whose start is at or
 * before the running end extends it. Touching intervals (`next.start ===
 * current.end`) merge; separated ones do not.
 *
 * @example
 * ```typescript
 * mergeIntervals([[1, 3], [2, 5], [7, 9]])  // [[1, 5], [7, 9]]
 * mergeIntervals([[1, 2], [3, 4]])          // [[1, 2], [3, 4]]
 * mergeIntervals([])                        // []
 * ```
 */
export function mergeIntervals<T extends number | Date>(
  intervals: ReadonlyArray<Interval<T>>
): Array<[T, T]> {
  if (intervals.length === 0) return []

  const sorted = [...intervals].sort((a, b) => valueOf(a[0]) - valueOf(b[0]))

  const merged: Array<[T, T]> = []
  let [currentStart, currentEnd] = sorted[0]

  for (let i = 1; i < sorted.length; i++) {
    const [start, end] = sorted[i]
    if (valueOf(start) <= valueOf(currentEnd)) {
      if (valueOf(end) > valueOf(currentEnd)) {
        currentEnd = end
      }
    } else {
      merged.push([currentStart, currentEnd])
      currentStart = start
      currentEnd = end
    }
  }
  merged.push([currentStart, currentEnd])

  return merged
}

/**
 * Total length of a set of intervals, in the units of their points
 * (milliseconds for `Date`s).
 */
export function totalLength<T extends number | Date>(
  intervals: ReadonlyArray<Interval<T>>
): number {
  return intervals.reduce(
    (sum, [start, end]) => sum + (valueOf(end) - valueOf(start)),
    0
  )
}
