import { z } from 'zod'
import type { ActivityMeta, LatLng, RawActivityStreams, RawSeries } from '../types/stream.types'

const numericStream = z.object({ data: z.array(z.number().nullable()) })

/** Stream set keyed by type, as returned by the provider's streams endpoint. */
export const providerStreamSetSchema = z.object({
  time: numericStream.optional(),
  distance: numericStream.optional(),
  heartrate: numericStream.optional(),
  watts: numericStream.optional(),
  cadence: numericStream.optional(),
  altitude: numericStream.optional(),
  velocity_smooth: numericStream.optional(),
  grade_smooth: numericStream.optional(),
  latlng: z.object({ data: z.array(z.tuple([z.number(), z.number()]).nullable()) }).optional(),
})

export const providerActivitySchema = z.object({
  id: z.union([z.string(), z.number()]),
  start_date: z.string(),
  start_date_local: z.string().optional(),
  type: z.string().optional(),
  sport_type: z.string().optional(),
  name: z.string().nullable().optional(),
})

export type ProviderStreamSet = z.infer<typeof providerStreamSetSchema>
export type ProviderActivity = z.infer<typeof providerActivitySchema>

const series = (stream: { data: Array<number | null> } | undefined): RawSeries<number> | undefined =>
  stream ? { values: stream.data } : undefined

export const mapProviderActivity = (raw: ProviderActivity): ActivityMeta => ({
  id: String(raw.id),
  startTimeIso: raw.start_date,
  startTimeLocalIso: raw.start_date_local ?? null,
  type: raw.sport_type ?? raw.type ?? 'Ride',
  name: raw.name ?? null,
})

// every provider stream shares the `time` stream as its basis; a null time drops that index
export const mapProviderStreams = (raw: ProviderStreamSet): RawActivityStreams => {
  const position: RawSeries<LatLng> | undefined = raw.latlng
    ? { values: raw.latlng.data.map((p) => (p ? { lat: p[0], lng: p[1] } : null)) }
    : undefined

  return {
    time: raw.time?.data.map((t) => t ?? Number.NaN),
    distance: series(raw.distance),
    heartRate: series(raw.heartrate),
    power: series(raw.watts),
    cadence: series(raw.cadence),
    altitude: series(raw.altitude),
    speed: series(raw.velocity_smooth),
    grade: series(raw.grade_smooth),
    position,
  }
}
