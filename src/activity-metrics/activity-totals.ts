import type { ActivityStream } from '../types/stream.types'
import { deltaTotals, maxOf, mean, minOf, present } from '../utils/series'
import type { ActivityTotals } from './activity-metrics.types'

export type TotalsConfig = {
  /** samples at or below this speed count as stopped */
  minMovingSpeedMps: number
}

/** Recorded speed, or distance deltas over time deltas when only distance was recorded. */
export const speedSignal = (stream: ActivityStream): Array<number | null> => {
  if (stream.available.speed) return stream.samples.map((s) => s.speed)
  if (!stream.available.distance) return stream.samples.map(() => null)
  return stream.samples.map((s, i) => {
    const prev = stream.samples[i - 1]
    if (!prev || prev.distance === null || s.distance === null) return null
    const dt = s.time - prev.time
    return dt > 0 ? (s.distance - prev.distance) / dt : null
  })
}

export const computeActivityTotals = (stream: ActivityStream, config: TotalsConfig): ActivityTotals => {
  const { samples, sampleIntervalSec } = stream
  const first = samples[0]
  const last = samples[samples.length - 1]
  const elapsedSec = first && last ? last.time - first.time + sampleIntervalSec : 0

  const speed = speedSignal(stream)
  const hasSpeed = speed.some((v) => v !== null)

  // without any speed signal the whole activity counts as moving
  const movingTimeSec = hasSpeed
    ? speed.filter((v) => v !== null && v > config.minMovingSpeedMps).length * sampleIntervalSec
    : elapsedSec

  const distances = present(samples.map((s) => s.distance))
  let distanceM: number | null = null
  if (stream.available.distance) {
    distanceM = (distances[distances.length - 1] ?? 0) - (distances[0] ?? 0)
  } else if (hasSpeed) {
    distanceM = present(speed).reduce((s, v) => s + v * sampleIntervalSec, 0)
  }

  const altitude = samples.map((s) => s.altitude)
  const { gain, loss } = deltaTotals(altitude)
  const elevation = stream.available.altitude
    ? { gainM: gain, lossM: loss, minM: minOf(altitude), maxM: maxOf(altitude) }
    : null

  const heartRate = samples.map((s) => s.heartRate)
  // zero cadence is coasting, not a pedalling rate
  const cadence = samples.map((s) => (s.cadence !== null && s.cadence > 0 ? s.cadence : null))

  const avgSpeed =
    distanceM !== null && movingTimeSec > 0 && hasSpeed ? distanceM / movingTimeSec : mean(speed)

  return {
    distanceM,
    elapsedSec,
    movingTimeSec,
    elevation,
    avgSpeed,
    maxSpeed: maxOf(speed),
    avgHeartRate: mean(heartRate),
    maxHeartRate: maxOf(heartRate),
    avgCadence: mean(cadence),
    maxCadence: maxOf(cadence),
  }
}

export const computeTrainingLoad = (movingTimeSec: number, avgHeartRate: number | null): number | null =>
  avgHeartRate === null ? null : (movingTimeSec * avgHeartRate) / 3600
