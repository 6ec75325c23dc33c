import type { ActivitySummary, SummaryRecord } from '../activity-metrics/activity-metrics.types'
import type { DashboardBundle } from '../dashboard/dashboard.types'
import type { ActivityMeta, RawActivityStreams } from '../types/stream.types'

export type ActivityInput = {
  activity: ActivityMeta
  streams: RawActivityStreams
}

export type ActivityAnalysis = {
  summary: ActivitySummary
  record: SummaryRecord
  dashboard: DashboardBundle
}

export type SkipCode = 'INSUFFICIENT_DATA' | 'MISSING_METRIC' | 'INVALID_ZONE_CONFIG' | 'INVALID_INPUT' | 'INTERNAL_ERROR'

export type BatchItemResult =
  | { activityId: string; status: 'succeeded'; analysis: ActivityAnalysis }
  | { activityId: string; status: 'skipped'; code: SkipCode; reason: string }

export type BatchReport = {
  generatedAtIso: string
  total: number
  succeeded: number
  skipped: number
  results: BatchItemResult[]
}

export type SkippedItem = Extract<BatchItemResult, { status: 'skipped' }>

export type RollupReport<T> = {
  generatedAtIso: string
  rollup: T
  skipped: SkippedItem[]
}
