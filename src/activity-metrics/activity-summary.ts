import { gradeSignal } from '../segments/segment-signals'
import type { SegmentDetection } from '../segments/segments.types'
import type { ActivityStream } from '../types/stream.types'
import type { ZoneResult, ZoneResults } from '../zones/zones.types'
import type { ActivitySummary, SummaryRecord } from './activity-metrics.types'
import { computeActivityTotals, computeTrainingLoad, speedSignal, type TotalsConfig } from './activity-totals'
import { computeDistribution } from './distribution'
import { computePowerMetrics } from './power-metrics'

export const buildActivitySummary = (
  stream: ActivityStream,
  zones: ZoneResults,
  detection: SegmentDetection,
  config: TotalsConfig,
): ActivitySummary => {
  const totals = computeActivityTotals(stream, config)

  return {
    activity: { ...stream.meta },
    ...totals,
    power: computePowerMetrics(stream),
    trainingLoad: computeTrainingLoad(totals.movingTimeSec, totals.avgHeartRate),
    zones,
    segments: detection.segments,
    segmentSources: {
      grade: detection.gradeSource,
      intensity: detection.intensitySource,
    },
    distributions: {
      cadence: computeDistribution(
        stream.samples.map((s) => (s.cadence !== null && s.cadence > 0 ? s.cadence : null)),
        5,
      ),
      speed: computeDistribution(speedSignal(stream), 1),
      grade: computeDistribution(gradeSignal(stream).values, 1),
    },
  }
}

const fixed = (n: number | null | undefined, digits = 2): number | null =>
  n === null || n === undefined ? null : Number(n.toFixed(digits))

export const zoneColumnName = (prefix: string, zoneName: string): string =>
  `${prefix}_${zoneName.toLowerCase().replace(/[^a-z0-9]+/g, '_').replace(/^_+|_+$/g, '')}_pct`

const zoneColumns = (prefix: string, result: ZoneResult): SummaryRecord => {
  const record: SummaryRecord = {}
  if (result.status !== 'available') return record
  for (const zone of result.zones) {
    record[zoneColumnName(prefix, zone.name)] = fixed(zone.percentage)
  }
  return record
}

/** One flat row per activity, e.g. for CSV storage. */
export const toSummaryRecord = (summary: ActivitySummary): SummaryRecord => ({
  activity_id: summary.activity.id,
  name: summary.activity.name ?? null,
  type: summary.activity.type,
  start_time: summary.activity.startTimeIso,
  distance_km: fixed(summary.distanceM !== null ? summary.distanceM / 1000 : null),
  moving_time_min: fixed(summary.movingTimeSec / 60),
  elapsed_time_min: fixed(summary.elapsedSec / 60),
  elevation_gain_m: fixed(summary.elevation?.gainM, 1),
  avg_speed_kmh: fixed(summary.avgSpeed !== null ? summary.avgSpeed * 3.6 : null),
  max_speed_kmh: fixed(summary.maxSpeed !== null ? summary.maxSpeed * 3.6 : null),
  avg_heartrate: fixed(summary.avgHeartRate, 1),
  max_heartrate: summary.maxHeartRate,
  avg_cadence: fixed(summary.avgCadence, 1),
  avg_watts: fixed(summary.power?.avgPower, 1),
  max_watts: summary.power?.maxPower ?? null,
  normalized_power: fixed(summary.power?.normalizedPower, 1),
  ftp_estimate: fixed(summary.power?.ftpEstimate, 1),
  training_load: fixed(summary.trainingLoad, 1),
  climb_segments: summary.segments.filter((s) => s.kind === 'climb').length,
  effort_segments: summary.segments.filter((s) => s.kind === 'effort').length,
  ...zoneColumns('hr', summary.zones.heartRate),
  ...zoneColumns('power', summary.zones.power),
})
