export type SegmentKind = 'climb' | 'effort'

export type SegmentDetectorConfig = {
  /** moving-average window, in samples */
  smoothingWindow: number
  gradeThresholdPct: number
  effortThresholds: {
    power: number // W
    heartRate: number // bpm
  }
  minSegmentDurationSec: number
  /** longest dip between two same-kind runs that still merges them */
  mergeGapSec: number
}

export type GradeSource = 'recorded' | 'derived'
export type IntensitySource = 'power' | 'heartRate'

export type Signal<S> = {
  values: Array<number | null>
  source: S | null
}

export type TriggerRun = {
  start: number
  end: number
  climbCount: number
  effortCount: number
  bothCount: number
}

export type ClassifiedRun = TriggerRun & { kind: SegmentKind }

export type Segment = {
  kind: SegmentKind
  startIndex: number
  endIndex: number
  startTimeSec: number
  endTimeSec: number
  durationSec: number
  distanceM: number | null
  avgHeartRate: number | null
  maxHeartRate: number | null
  avgPower: number | null
  maxPower: number | null
  avgSpeed: number | null
  avgGrade: number | null
  elevationGainM: number | null
}

export type SegmentDetection = {
  segments: Segment[]
  gradeSource: GradeSource | null
  intensitySource: IntensitySource | null
}
