import type { ActivitySummary, Distributions } from '../activity-metrics/activity-metrics.types'
import type { SegmentKind } from '../segments/segments.types'
import type { ActivityMeta, ScalarField } from '../types/stream.types'
import type { MetricUnavailable, ZoneKind } from '../zones/zones.types'

export type SeriesKey = 'heartRate' | 'power' | 'cadence' | 'speed' | 'altitude' | 'grade'

export type TimeSeriesPanel = {
  key: SeriesKey
  label: string
  unit: string
  values: ReadonlyArray<number | null>
}

export type TimeSeries = {
  timeSec: ReadonlyArray<number>
  panels: ReadonlyArray<TimeSeriesPanel>
  /** samples in the aligned stream before down-sampling */
  sourcePoints: number
}

export type ZonePanel =
  | {
      status: 'available'
      labels: ReadonlyArray<string>
      seconds: ReadonlyArray<number>
      percentages: ReadonlyArray<number>
    }
  | MetricUnavailable

export type SegmentRow = {
  index: number
  kind: SegmentKind
  startTimeSec: number
  durationSec: number
  distanceM: number | null
  avgPower: number | null
  avgHeartRate: number | null
  avgSpeed: number | null
  avgGrade: number | null
  elevationGainM: number | null
}

export type RoutePoint = {
  lat: number
  lng: number
  value: number | null
}

export type Route = {
  colorMetric: ScalarField
  points: ReadonlyArray<RoutePoint>
}

export type DashboardBundle = {
  readonly activity: ActivityMeta
  readonly summary: ActivitySummary
  readonly timeSeries: TimeSeries
  readonly zonePanels: Readonly<Record<ZoneKind, ZonePanel>>
  readonly segmentTable: ReadonlyArray<SegmentRow>
  readonly route: Route | null
  readonly distributions: Distributions
}

export type AssembleOptions = {
  /** cap on points per time-series and route; all points when omitted */
  maxPoints?: number
  routeColorMetric?: ScalarField
}
