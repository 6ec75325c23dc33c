import type { ActivityStream } from '../types/stream.types'
import type { GradeSource, IntensitySource, SegmentDetectorConfig, Signal } from './segments.types'

/**
 * Centered moving average. The window covers floor((w-1)/2) samples to the left and the
 * rest to the right, clipped at both ends; nulls are left out of the mean.
 */
export const smoothCentered = (
  values: ReadonlyArray<number | null>,
  window: number,
): Array<number | null> => {
  const w = Math.max(1, Math.floor(window))
  const left = Math.floor((w - 1) / 2)
  const right = w - 1 - left

  // prefix sums over present values and their counts
  const sums = [0]
  const counts = [0]
  values.forEach((v, i) => {
    sums.push(sums[i]! + (v ?? 0))
    counts.push(counts[i]! + (v === null ? 0 : 1))
  })

  return values.map((_, i) => {
    const from = Math.max(0, i - left)
    const to = Math.min(values.length - 1, i + right) + 1
    const n = counts[to]! - counts[from]!
    return n > 0 ? (sums[to]! - sums[from]!) / n : null
  })
}

/** Recorded grade, or 100·Δaltitude/Δdistance when the stream has altitude and distance only. */
export const gradeSignal = (stream: ActivityStream): Signal<GradeSource> => {
  if (stream.available.grade) {
    return { values: stream.samples.map((s) => s.grade), source: 'recorded' }
  }
  if (!stream.available.altitude || !stream.available.distance) {
    return { values: stream.samples.map(() => null), source: null }
  }
  const values = stream.samples.map((s, i) => {
    const prev = stream.samples[i - 1]
    if (!prev || prev.altitude === null || s.altitude === null) return null
    if (prev.distance === null || s.distance === null) return null
    const dd = s.distance - prev.distance
    return dd > 0 ? (100 * (s.altitude - prev.altitude)) / dd : null
  })
  return { values, source: 'derived' }
}

/** Power when recorded, heart rate otherwise; the threshold follows the chosen signal. */
export const intensitySignal = (
  stream: ActivityStream,
  thresholds: SegmentDetectorConfig['effortThresholds'],
): Signal<IntensitySource> & { threshold: number } => {
  if (stream.available.power) {
    return { values: stream.samples.map((s) => s.power), source: 'power', threshold: thresholds.power }
  }
  if (stream.available.heartRate) {
    return {
      values: stream.samples.map((s) => s.heartRate),
      source: 'heartRate',
      threshold: thresholds.heartRate,
    }
  }
  return { values: stream.samples.map(() => null), source: null, threshold: thresholds.power }
}
