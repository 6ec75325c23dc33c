import type { ActivitySummary } from '../activity-metrics/activity-metrics.types'
import type { Segment } from '../segments/segments.types'
import type { ActivityStream } from '../types/stream.types'
import { deepFreeze } from '../utils/deep-freeze'
import type { ZoneResult, ZoneResults } from '../zones/zones.types'
import type {
  AssembleOptions,
  DashboardBundle,
  Route,
  SegmentRow,
  SeriesKey,
  TimeSeriesPanel,
  ZonePanel,
} from './dashboard.types'

const PANELS: Array<{ key: SeriesKey; label: string; unit: string }> = [
  { key: 'heartRate', label: 'Heart Rate', unit: 'bpm' },
  { key: 'power', label: 'Power', unit: 'W' },
  { key: 'cadence', label: 'Cadence', unit: 'rpm' },
  { key: 'speed', label: 'Speed', unit: 'm/s' },
  { key: 'altitude', label: 'Altitude', unit: 'm' },
  { key: 'grade', label: 'Grade', unit: '%' },
]

/**
 * Evenly spaced indices into an array of `length` items, first and last included.
 * Returns every index when there is no cap or the array already fits.
 */
export const downsampleIndices = (length: number, maxPoints?: number): number[] => {
  if (maxPoints !== undefined && (!Number.isInteger(maxPoints) || maxPoints < 2)) {
    throw new RangeError(`maxPoints must be an integer >= 2, got ${maxPoints}`)
  }
  if (maxPoints === undefined || length <= maxPoints) {
    return Array.from({ length }, (_, i) => i)
  }
  return Array.from({ length: maxPoints }, (_, k) => Math.round((k * (length - 1)) / (maxPoints - 1)))
}

const zonePanel = (result: ZoneResult): ZonePanel =>
  result.status === 'available'
    ? {
        status: 'available',
        labels: result.zones.map((z) => z.name),
        seconds: result.zones.map((z) => z.seconds),
        percentages: result.zones.map((z) => z.percentage),
      }
    : { ...result }

const segmentRow = (segment: Segment, index: number): SegmentRow => ({
  index,
  kind: segment.kind,
  startTimeSec: segment.startTimeSec,
  durationSec: segment.durationSec,
  distanceM: segment.distanceM,
  avgPower: segment.avgPower,
  avgHeartRate: segment.avgHeartRate,
  avgSpeed: segment.avgSpeed,
  avgGrade: segment.avgGrade,
  elevationGainM: segment.elevationGainM,
})

const buildRoute = (stream: ActivityStream, options: AssembleOptions): Route | null => {
  if (!stream.available.position) return null
  const colorMetric = options.routeColorMetric ?? 'altitude'
  const positioned = stream.samples.filter((s) => s.position !== null)
  const points = downsampleIndices(positioned.length, options.maxPoints).flatMap((i) => {
    const sample = positioned[i]
    return sample?.position
      ? [{ lat: sample.position.lat, lng: sample.position.lng, value: sample[colorMetric] }]
      : []
  })
  return { colorMetric, points }
}

export type AssembleInput = {
  summary: ActivitySummary
  segments: ReadonlyArray<Segment>
  zones: ZoneResults
  stream: ActivityStream
}

/** Packs already computed results into one frozen bundle; keeps no state between calls. */
export const assembleDashboard = (input: AssembleInput, options: AssembleOptions = {}): DashboardBundle => {
  const { summary, segments, zones, stream } = input
  const indices = downsampleIndices(stream.samples.length, options.maxPoints)
  const picked = indices.flatMap((i) => {
    const sample = stream.samples[i]
    return sample ? [sample] : []
  })

  const panels: TimeSeriesPanel[] = PANELS.filter((p) => stream.available[p.key]).map((p) => ({
    ...p,
    values: picked.map((s) => s[p.key]),
  }))

  return deepFreeze({
    activity: { ...stream.meta },
    summary: structuredClone(summary),
    timeSeries: {
      timeSec: picked.map((s) => s.time),
      panels,
      sourcePoints: stream.samples.length,
    },
    zonePanels: {
      heartRate: zonePanel(zones.heartRate),
      power: zonePanel(zones.power),
    },
    segmentTable: segments.map(segmentRow),
    route: buildRoute(stream, options),
    distributions: structuredClone(summary.distributions),
  })
}
