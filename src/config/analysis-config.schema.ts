import { z } from 'zod'

const scalarFieldSchema = z.enum(['distance', 'heartRate', 'power', 'cadence', 'altitude', 'speed', 'grade'])

const positive = z.number().finite().positive()

export const alignConfigSchema = z.object({
  axis: z.enum(['densest', 'union']).default('densest'),
  minSamples: z.number().int().min(2).default(30),
  maxInterpolationGapSec: z.number().finite().nonnegative().default(5),
  defaultIntervalSec: positive.default(1),
})

export const segmentConfigSchema = z.object({
  smoothingWindow: z.number().int().min(1).default(15),
  gradeThresholdPct: z.number().finite().default(4),
  effortThresholds: z
    .object({
      power: z.number().finite().default(250),
      heartRate: z.number().finite().default(160),
    })
    .default({}),
  minSegmentDurationSec: z.number().finite().nonnegative().default(60),
  mergeGapSec: z.number().finite().nonnegative().default(5),
})

export const analysisConfigSchema = z.object({
  align: alignConfigSchema.default({}),
  segments: segmentConfigSchema.default({}),
  totals: z
    .object({
      minMovingSpeedMps: z.number().finite().nonnegative().default(0.5),
    })
    .default({}),
  dashboard: z
    .object({
      maxPoints: z.number().int().min(2).optional(),
      routeColorMetric: scalarFieldSchema.default('altitude'),
    })
    .default({}),
  athlete: z
    .object({
      maxHeartRate: positive.nullable().default(null),
      ftpWatts: positive.nullable().default(null),
    })
    .default({}),
})

export type AnalysisConfig = z.infer<typeof analysisConfigSchema>

export type AnalysisConfigInput = z.input<typeof analysisConfigSchema>

const optionalNumber = z.number().finite().optional()

/** Per-request overrides; absent keys keep the process defaults, so nothing here has a default. */
export const analysisConfigOverridesSchema = z
  .object({
    align: z
      .object({
        axis: z.enum(['densest', 'union']).optional(),
        minSamples: optionalNumber,
        maxInterpolationGapSec: optionalNumber,
        defaultIntervalSec: optionalNumber,
      })
      .optional(),
    segments: z
      .object({
        smoothingWindow: optionalNumber,
        gradeThresholdPct: optionalNumber,
        effortThresholds: z.object({ power: optionalNumber, heartRate: optionalNumber }).optional(),
        minSegmentDurationSec: optionalNumber,
        mergeGapSec: optionalNumber,
      })
      .optional(),
    totals: z.object({ minMovingSpeedMps: optionalNumber }).optional(),
    dashboard: z
      .object({
        maxPoints: optionalNumber,
        routeColorMetric: scalarFieldSchema.optional(),
      })
      .optional(),
  })
  .strict()

export type AnalysisConfigOverrides = z.infer<typeof analysisConfigOverridesSchema>
