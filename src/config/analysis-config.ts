import { BadRequestException } from '@nestjs/common'
import { ZodError } from 'zod'
import { analysisConfigSchema, type AnalysisConfig, type AnalysisConfigInput } from './analysis-config.schema'

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = analysisConfigSchema.parse({})

type Env = Record<string, string | undefined>

const readNumber = (env: Env, key: string): number | undefined => {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return undefined
  const parsed = Number(raw)
  return Number.isFinite(parsed) ? parsed : undefined
}

/** Picks the ANALYSIS_* and ATHLETE_* variables that are set; unset or non-numeric ones keep the defaults. */
export const configInputFromEnv = (env: Env): AnalysisConfigInput => {
  const axis = env.ANALYSIS_AXIS
  return {
    align: {
      axis: axis === 'union' || axis === 'densest' ? axis : undefined,
      minSamples: readNumber(env, 'ANALYSIS_MIN_SAMPLES'),
      maxInterpolationGapSec: readNumber(env, 'ANALYSIS_MAX_INTERPOLATION_GAP_SEC'),
    },
    segments: {
      smoothingWindow: readNumber(env, 'ANALYSIS_SMOOTHING_WINDOW'),
      gradeThresholdPct: readNumber(env, 'ANALYSIS_GRADE_THRESHOLD_PCT'),
      effortThresholds: {
        power: readNumber(env, 'ANALYSIS_EFFORT_POWER_W'),
        heartRate: readNumber(env, 'ANALYSIS_EFFORT_HR_BPM'),
      },
      minSegmentDurationSec: readNumber(env, 'ANALYSIS_MIN_SEGMENT_SEC'),
      mergeGapSec: readNumber(env, 'ANALYSIS_MERGE_GAP_SEC'),
    },
    totals: {
      minMovingSpeedMps: readNumber(env, 'ANALYSIS_MIN_MOVING_SPEED_MPS'),
    },
    dashboard: {
      maxPoints: readNumber(env, 'ANALYSIS_DASHBOARD_MAX_POINTS'),
    },
    athlete: {
      maxHeartRate: readNumber(env, 'ATHLETE_MAX_HR') ?? null,
      ftpWatts: readNumber(env, 'ATHLETE_FTP_W') ?? null,
    },
  }
}

/** Layers `overrides` over `base` and validates the result; a bad value is a 400. */
export const resolveAnalysisConfig = (
  base: AnalysisConfig,
  overrides: AnalysisConfigInput = {},
): AnalysisConfig => {
  const { align, segments, totals, dashboard, athlete } = overrides
  const candidate: AnalysisConfigInput = {
    align: {
      axis: align?.axis ?? base.align.axis,
      minSamples: align?.minSamples ?? base.align.minSamples,
      maxInterpolationGapSec: align?.maxInterpolationGapSec ?? base.align.maxInterpolationGapSec,
      defaultIntervalSec: align?.defaultIntervalSec ?? base.align.defaultIntervalSec,
    },
    segments: {
      smoothingWindow: segments?.smoothingWindow ?? base.segments.smoothingWindow,
      gradeThresholdPct: segments?.gradeThresholdPct ?? base.segments.gradeThresholdPct,
      effortThresholds: {
        power: segments?.effortThresholds?.power ?? base.segments.effortThresholds.power,
        heartRate: segments?.effortThresholds?.heartRate ?? base.segments.effortThresholds.heartRate,
      },
      minSegmentDurationSec: segments?.minSegmentDurationSec ?? base.segments.minSegmentDurationSec,
      mergeGapSec: segments?.mergeGapSec ?? base.segments.mergeGapSec,
    },
    totals: {
      minMovingSpeedMps: totals?.minMovingSpeedMps ?? base.totals.minMovingSpeedMps,
    },
    dashboard: {
      maxPoints: dashboard?.maxPoints ?? base.dashboard.maxPoints,
      routeColorMetric: dashboard?.routeColorMetric ?? base.dashboard.routeColorMetric,
    },
    athlete: {
      maxHeartRate: athlete?.maxHeartRate ?? base.athlete.maxHeartRate,
      ftpWatts: athlete?.ftpWatts ?? base.athlete.ftpWatts,
    },
  }

  try {
    return analysisConfigSchema.parse(candidate)
  } catch (err) {
    if (err instanceof ZodError) {
      throw new BadRequestException(`Invalid analysis config: ${JSON.stringify(err.format())}`)
    }
    throw err
  }
}
