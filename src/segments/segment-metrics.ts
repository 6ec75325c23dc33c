import type { ActivityStream } from '../types/stream.types'
import { deltaTotals, maxOf, mean } from '../utils/series'
import type { ClassifiedRun, Segment } from './segments.types'

export const computeSegmentMetrics = (
  stream: ActivityStream,
  run: ClassifiedRun,
  grade: ReadonlyArray<number | null>,
): Segment => {
  const samples = stream.samples.slice(run.start, run.end + 1)
  const first = samples[0]
  const last = samples[samples.length - 1]
  const startTimeSec = first?.time ?? 0
  const endTimeSec = last?.time ?? startTimeSec

  const heartRate = samples.map((s) => s.heartRate)
  const power = samples.map((s) => s.power)
  const altitude = samples.map((s) => s.altitude)

  const distanceM =
    first?.distance != null && last?.distance != null ? last.distance - first.distance : null

  return {
    kind: run.kind,
    startIndex: run.start,
    endIndex: run.end,
    startTimeSec,
    endTimeSec,
    durationSec: endTimeSec - startTimeSec + stream.sampleIntervalSec,
    distanceM,
    avgHeartRate: mean(heartRate),
    maxHeartRate: maxOf(heartRate),
    avgPower: mean(power),
    maxPower: maxOf(power),
    avgSpeed: mean(samples.map((s) => s.speed)),
    avgGrade: mean(grade.slice(run.start, run.end + 1)),
    elevationGainM: stream.available.altitude ? deltaTotals(altitude).gain : null,
  }
}
