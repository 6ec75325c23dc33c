import type { Segment, GradeSource, IntensitySource } from '../segments/segments.types'
import type { ActivityMeta } from '../types/stream.types'
import type { ZoneKind, ZoneResults } from '../zones/zones.types'

export type Elevation = {
  gainM: number
  lossM: number
  minM: number | null
  maxM: number | null
}

export type ActivityTotals = {
  distanceM: number | null
  elapsedSec: number
  movingTimeSec: number
  elevation: Elevation | null
  avgSpeed: number | null // m/s
  maxSpeed: number | null
  avgHeartRate: number | null
  maxHeartRate: number | null
  avgCadence: number | null
  maxCadence: number | null
}

export type PowerCurve = Record<string, number>

export type PowerMetrics = {
  avgPower: number
  maxPower: number
  normalizedPower: number | null
  ftpEstimate: number | null
  powerCurve: PowerCurve
}

export type DistributionBin = {
  range: string
  from: number
  to: number
  count: number
}

export type Distributions = {
  cadence: DistributionBin[]
  speed: DistributionBin[]
  grade: DistributionBin[]
}

export type ActivitySummary = ActivityTotals & {
  activity: ActivityMeta
  power: PowerMetrics | null
  /** moving time (h) × average heart rate */
  trainingLoad: number | null
  zones: ZoneResults
  segments: Segment[]
  segmentSources: {
    grade: GradeSource | null
    intensity: IntensitySource | null
  }
  distributions: Distributions
}

export type SummaryRecord = Record<string, string | number | null>

export type RollupZone = {
  min: number
  max: number
  seconds: number
}

export type WeightedSum = {
  sum: number
  weight: number
}

/** Order-independent partial rollup; `finalizeRollup` turns it into a PeriodRollup. */
export type RollupAccumulator = {
  activityIds: string[]
  firstStartIso: string | null
  lastStartIso: string | null
  distanceM: number
  elapsedSec: number
  movingTimeSec: number
  elevationGainM: number
  trainingLoad: number
  heartRate: WeightedSum
  power: WeightedSum
  maxHeartRate: number | null
  maxPower: number | null
  zones: Record<ZoneKind, Record<string, RollupZone>>
  /** training load per local calendar day (YYYY-MM-DD) */
  dailyLoad: Record<string, number>
}

export type DailyLoad = {
  date: string
  load: number
  /** mean over this day and the six before it; null until seven days are covered */
  rollingMean7: number | null
}

export type RollupFilter = {
  /** exact match on the activity type, e.g. `Ride` */
  activityType?: string
}

export type PeriodWindow = {
  fromIso: string
  toIso: string
}

export type PeriodRollup = {
  period: { from: string | null; to: string | null }
  activityIds: string[]
  activityCount: number
  distanceM: number
  elapsedSec: number
  movingTimeSec: number
  elevationGainM: number
  trainingLoad: number
  avgHeartRate: number | null
  avgPower: number | null
  maxHeartRate: number | null
  maxPower: number | null
  zones: ZoneResults
  dailyLoad: DailyLoad[]
}
