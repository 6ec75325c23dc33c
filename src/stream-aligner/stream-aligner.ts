import { InsufficientDataError } from '../errors/analysis.errors'
import {
  SCALAR_FIELDS,
  type ActivityMeta,
  type ActivityStream,
  type CanonicalAxis,
  type LatLng,
  type RawActivityStreams,
  type RawSeries,
  type ScalarField,
  type StreamField,
  type StreamSample,
} from '../types/stream.types'

export type AlignOptions = {
  axis: CanonicalAxis
  minSamples: number
  /** Largest gap between two recorded samples that is still bridged by interpolation */
  maxInterpolationGapSec: number
  /** Spacing assumed for series that carry no time basis at all */
  defaultIntervalSec: number
}

type Pair<T> = { time: number; value: T | null }

type Interpolate<T> = (a: T, b: T, ratio: number) => T

const isFiniteNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v)

const cleanNumber = (v: number | null): number | null => (isFiniteNumber(v) ? v : null)

const cleanLatLng = (v: LatLng | null): LatLng | null =>
  v && isFiniteNumber(v.lat) && isFiniteNumber(v.lng) ? { lat: v.lat, lng: v.lng } : null

const lerp: Interpolate<number> = (a, b, ratio) => a + (b - a) * ratio

const lerpLatLng: Interpolate<LatLng> = (a, b, ratio) => ({
  lat: lerp(a.lat, b.lat, ratio),
  lng: lerp(a.lng, b.lng, ratio),
})

// finite times only, stably sorted, first pair wins on duplicate times
const normalizePairs = <T>(pairs: Pair<T>[]): Pair<T>[] => {
  const sorted = pairs.filter((p) => isFiniteNumber(p.time)).sort((a, b) => a.time - b.time)
  const out: Pair<T>[] = []
  for (const p of sorted) {
    const last = out[out.length - 1]
    if (last && last.time === p.time) continue
    out.push(p)
  }
  return out
}

const toPairs = <T>(
  series: RawSeries<T>,
  defaultTime: ReadonlyArray<number> | undefined,
  defaultIntervalSec: number,
  clean: (v: T | null) => T | null,
): Pair<T>[] => {
  const basis = series.time ?? defaultTime
  const count = basis ? Math.min(series.values.length, basis.length) : series.values.length
  const pairs: Pair<T>[] = []
  for (let i = 0; i < count; i++) {
    const time = basis ? basis[i] : i * defaultIntervalSec
    if (time === undefined) continue
    pairs.push({ time, value: clean(series.values[i] ?? null) })
  }
  return normalizePairs(pairs)
}

const resample = <T>(
  pairs: Pair<T>[],
  axis: number[],
  maxGapSec: number,
  interpolate: Interpolate<T>,
): Array<T | null> => {
  const out: Array<T | null> = []
  let j = 0
  for (const t of axis) {
    while (j < pairs.length && pairs[j]!.time < t) j++
    const next = pairs[j]
    if (next && next.time === t) {
      out.push(next.value)
      continue
    }
    const prev = j > 0 ? pairs[j - 1] : undefined
    if (
      prev &&
      next &&
      prev.value !== null &&
      next.value !== null &&
      next.time - prev.time <= maxGapSec
    ) {
      out.push(interpolate(prev.value, next.value, (t - prev.time) / (next.time - prev.time)))
    } else {
      out.push(null)
    }
  }
  return out
}

const freezeOrNull = (p: LatLng | null | undefined): Readonly<LatLng> | null =>
  p ? Object.freeze(p) : null

const median = (values: number[]): number | null => {
  if (values.length === 0) return null
  const sorted = [...values].sort((a, b) => a - b)
  const mid = Math.floor(sorted.length / 2)
  return sorted.length % 2 === 1 ? sorted[mid]! : (sorted[mid - 1]! + sorted[mid]!) / 2
}

export const medianInterval = (times: ReadonlyArray<number>, fallback: number): number => {
  const diffs: number[] = []
  for (let i = 1; i < times.length; i++) {
    const dt = times[i]! - times[i - 1]!
    if (dt > 0) diffs.push(dt)
  }
  return median(diffs) ?? fallback
}

const pickAxis = (bases: number[][], axis: CanonicalAxis): number[] => {
  if (axis === 'union') {
    const all = new Set<number>()
    for (const b of bases) for (const t of b) all.add(t)
    return [...all].sort((a, b) => a - b)
  }
  // densest: the first basis with the most samples
  return bases.reduce<number[]>((best, b) => (b.length > best.length ? b : best), [])
}

/**
 * Puts every raw series onto one time axis. Series that are absent or shorter than the
 * axis read as `null` there, never zero.
 */
export const alignStreams = (
  raw: RawActivityStreams,
  meta: ActivityMeta,
  options: AlignOptions,
): ActivityStream => {
  const defaultTime = raw.time
    ? normalizePairs(raw.time.map((time): Pair<never> => ({ time, value: null }))).map((p) => p.time)
    : undefined

  const scalarPairs = new Map<StreamField, Pair<number>[]>()
  for (const field of SCALAR_FIELDS) {
    const series = raw[field]
    if (!series) continue
    scalarPairs.set(field, toPairs(series, raw.time, options.defaultIntervalSec, cleanNumber))
  }
  const positionPairs = raw.position
    ? toPairs(raw.position, raw.time, options.defaultIntervalSec, cleanLatLng)
    : null

  const bases: number[][] = []
  if (defaultTime) bases.push(defaultTime)
  for (const pairs of scalarPairs.values()) bases.push(pairs.map((p) => p.time))
  if (positionPairs) bases.push(positionPairs.map((p) => p.time))

  const axis = pickAxis(bases, options.axis)
  if (axis.length < options.minSamples) {
    throw new InsufficientDataError(axis.length, options.minSamples)
  }

  const aligned = new Map<StreamField, Array<number | null>>()
  for (const [field, pairs] of scalarPairs) {
    aligned.set(field, resample(pairs, axis, options.maxInterpolationGapSec, lerp))
  }
  const positions = positionPairs
    ? resample(positionPairs, axis, options.maxInterpolationGapSec, lerpLatLng)
    : []

  const at = (field: StreamField, i: number): number | null => aligned.get(field)?.[i] ?? null

  const samples: Readonly<StreamSample>[] = axis.map((time, i) =>
    Object.freeze({
      time,
      distance: at('distance', i),
      heartRate: at('heartRate', i),
      power: at('power', i),
      cadence: at('cadence', i),
      altitude: at('altitude', i),
      speed: at('speed', i),
      grade: at('grade', i),
      position: freezeOrNull(positions[i]),
    }),
  )

  const has = (field: ScalarField) => samples.some((s) => s[field] !== null)
  const available: Record<StreamField, boolean> = {
    distance: has('distance'),
    heartRate: has('heartRate'),
    power: has('power'),
    cadence: has('cadence'),
    altitude: has('altitude'),
    speed: has('speed'),
    grade: has('grade'),
    position: samples.some((s) => s.position !== null),
  }

  return Object.freeze({
    meta: Object.freeze({ ...meta }),
    samples: Object.freeze(samples),
    sampleIntervalSec: medianInterval(axis, options.defaultIntervalSec),
    available: Object.freeze(available),
  })
}
