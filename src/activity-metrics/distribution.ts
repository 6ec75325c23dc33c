import { maxOf, minOf, present } from '../utils/series'
import type { DistributionBin } from './activity-metrics.types'

/**
 * Histogram with `binSize`-wide bins starting at floor(min). Bins are half-open except the
 * last, which also takes values equal to its upper edge.
 */
export const computeDistribution = (
  values: ReadonlyArray<number | null>,
  binSize: number,
): DistributionBin[] => {
  const xs = present(values)
  const lo = minOf(xs)
  const hi = maxOf(xs)
  if (lo === null || hi === null || binSize <= 0) return []

  const start = Math.floor(lo)
  const end = Math.floor(hi) + 1
  const binCount = Math.max(1, Math.ceil((end - start) / binSize))

  const bins: DistributionBin[] = Array.from({ length: binCount }, (_, i) => {
    const from = start + i * binSize
    const to = from + binSize
    return { range: `${from.toFixed(1)}-${to.toFixed(1)}`, from, to, count: 0 }
  })

  for (const x of xs) {
    const idx = Math.min(binCount - 1, Math.floor((x - start) / binSize))
    bins[idx]!.count++
  }

  return bins
}
