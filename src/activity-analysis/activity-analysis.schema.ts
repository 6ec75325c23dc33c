import { z } from 'zod'

const timeSchema = z.array(z.number())

const seriesSchema = z.object({
  values: z.array(z.number().nullable()),
  time: timeSchema.optional(),
})

const latLngSchema = z.object({
  lat: z.number(),
  lng: z.number(),
})

export const rawStreamsSchema = z.object({
  time: timeSchema.optional(),
  distance: seriesSchema.optional(),
  heartRate: seriesSchema.optional(),
  power: seriesSchema.optional(),
  cadence: seriesSchema.optional(),
  altitude: seriesSchema.optional(),
  speed: seriesSchema.optional(),
  grade: seriesSchema.optional(),
  position: z
    .object({
      values: z.array(latLngSchema.nullable()),
      time: timeSchema.optional(),
    })
    .optional(),
})

export const activityMetaSchema = z.object({
  id: z.string().min(1),
  startTimeIso: z.string().refine((s) => Number.isFinite(Date.parse(s)), 'must be an ISO timestamp'),
  startTimeLocalIso: z
    .string()
    .refine((s) => Number.isFinite(Date.parse(s)), 'must be an ISO timestamp')
    .nullable()
    .optional(),
  type: z.string().min(1).default('Ride'),
  name: z.string().nullable().optional(),
})

export const activityInputSchema = z.object({
  activity: activityMetaSchema,
  streams: rawStreamsSchema,
})

export const zoneSchema = z.object({
  name: z.string(),
  min: z.number(),
  max: z.number(),
})

export const zoneConfigInputSchema = z.object({
  heartRate: z.array(zoneSchema).nullable().optional(),
  power: z.array(zoneSchema).nullable().optional(),
})

const zoneResultSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('available'),
    kind: z.enum(['heartRate', 'power']),
    zones: z.array(
      zoneSchema.extend({
        seconds: z.number().nonnegative(),
        percentage: z.number().min(0).max(100.0001),
      }),
    ),
    totalSec: z.number().nonnegative(),
    unclassifiedSec: z.number().nonnegative(),
  }),
  z.object({
    status: z.literal('unavailable'),
    kind: z.enum(['heartRate', 'power']),
    reason: z.enum(['metric-absent', 'no-zone-definition']),
  }),
])

const segmentSchema = z.object({
  kind: z.enum(['climb', 'effort']),
  startIndex: z.number().int().nonnegative(),
  endIndex: z.number().int().nonnegative(),
  durationSec: z.number().nonnegative(),
})

/** Structural check on a computed summary before it leaves the service. */
export const activitySummarySchema = z.object({
  distanceM: z.number().nonnegative().nullable(),
  elapsedSec: z.number().nonnegative(),
  movingTimeSec: z.number().nonnegative(),
  elevation: z
    .object({
      gainM: z.number().nonnegative(),
      lossM: z.number().nonnegative(),
    })
    .nullable(),
  trainingLoad: z.number().nonnegative().nullable(),
  zones: z.object({
    heartRate: zoneResultSchema,
    power: zoneResultSchema,
  }),
  segments: z.array(segmentSchema),
})
