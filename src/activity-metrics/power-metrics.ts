import type { ActivityStream } from '../types/stream.types'
import { bestRollingMean, maxOf, rollingMeans } from '../utils/series'
import type { PowerCurve, PowerMetrics } from './activity-metrics.types'

export const POWER_CURVE_DURATIONS_SEC = [5, 10, 30, 60, 300, 600, 1200, 1800, 3600]

const windowSamples = (seconds: number, intervalSec: number) =>
  Math.max(1, Math.round(seconds / intervalSec))

/** 30 s rolling average, raised to the 4th power, averaged, 4th root. */
export const normalizedPower = (watts: ReadonlyArray<number>, intervalSec: number): number | null => {
  const rolling = rollingMeans(watts, windowSamples(30, intervalSec))
  if (rolling.length === 0) return null
  const meanFourth = rolling.reduce((s, p) => s + p ** 4, 0) / rolling.length
  return meanFourth ** 0.25
}

/** 95 % of the best 20 minute average. */
export const estimateFtp = (watts: ReadonlyArray<number>, intervalSec: number): number | null => {
  const best = bestRollingMean(watts, windowSamples(1200, intervalSec))
  return best === null ? null : best * 0.95
}

export const powerCurve = (watts: ReadonlyArray<number>, intervalSec: number): PowerCurve => {
  const curve: PowerCurve = {}
  if (watts.length < windowSamples(60, intervalSec)) return curve

  for (const duration of POWER_CURVE_DURATIONS_SEC) {
    const best = bestRollingMean(watts, windowSamples(duration, intervalSec))
    if (best !== null) curve[`${duration}s`] = best
  }
  return curve
}

/** Power figures over pedalling samples (watts > 0); null when the ride has none. */
export const computePowerMetrics = (stream: ActivityStream): PowerMetrics | null => {
  const watts = stream.samples
    .map((s) => s.power)
    .filter((p): p is number => p !== null && p > 0)
  if (watts.length === 0) return null

  const interval = stream.sampleIntervalSec
  return {
    avgPower: watts.reduce((s, p) => s + p, 0) / watts.length,
    maxPower: maxOf(watts) ?? 0,
    normalizedPower: normalizedPower(watts, interval),
    ftpEstimate: estimateFtp(watts, interval),
    powerCurve: powerCurve(watts, interval),
  }
}
