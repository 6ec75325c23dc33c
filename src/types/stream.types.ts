export type LatLng = {
  lat: number
  lng: number
}

export const SCALAR_FIELDS = [
  'distance',
  'heartRate',
  'power',
  'cadence',
  'altitude',
  'speed',
  'grade',
] as const

export type ScalarField = (typeof SCALAR_FIELDS)[number]

export type StreamField = ScalarField | 'position'

export type RawSeries<T> = {
  values: ReadonlyArray<T | null>
  /** Own time basis in seconds; when missing the series is index-aligned with the default time. */
  time?: ReadonlyArray<number>
}

export type RawActivityStreams = {
  time?: ReadonlyArray<number>
  distance?: RawSeries<number>
  heartRate?: RawSeries<number>
  power?: RawSeries<number>
  cadence?: RawSeries<number>
  altitude?: RawSeries<number>
  speed?: RawSeries<number>
  grade?: RawSeries<number>
  position?: RawSeries<LatLng>
}

export type ActivityMeta = {
  id: string
  /** ISO start time of the activity */
  startTimeIso: string
  /** Wall-clock start where the source records one; calendar bucketing reads it */
  startTimeLocalIso?: string | null
  type: string
  name?: string | null
}

export type StreamSample = {
  time: number
  distance: number | null // m
  heartRate: number | null // bpm
  power: number | null // W
  cadence: number | null // rpm
  altitude: number | null // m
  speed: number | null // m/s
  grade: number | null // %
  position: LatLng | null
}

export type ActivityStream = {
  readonly meta: ActivityMeta
  readonly samples: ReadonlyArray<Readonly<StreamSample>>
  /** Median spacing between consecutive samples */
  readonly sampleIntervalSec: number
  readonly available: Readonly<Record<StreamField, boolean>>
}

export type CanonicalAxis = 'densest' | 'union'
