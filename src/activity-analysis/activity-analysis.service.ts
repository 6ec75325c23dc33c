import { Inject, Injectable, InternalServerErrorException, Logger } from '@nestjs/common'
import type { ActivitySummary, PeriodRollup, PeriodWindow, RollupFilter } from '../activity-metrics/activity-metrics.types'
import { buildActivitySummary, toSummaryRecord } from '../activity-metrics/activity-summary'
import { rollupByWeek, rollupSummaries } from '../activity-metrics/period-rollup'
import { CLOCK, type Clock } from '../clock/clock'
import type { AnalysisConfig, AnalysisConfigInput } from '../config/analysis-config.schema'
import { AnalysisConfigService } from '../config/analysis-config.service'
import { assembleDashboard } from '../dashboard/dashboard-assembler'
import { isAnalysisError } from '../errors/analysis.errors'
import { detectSegments } from '../segments/segment-detector'
import { alignStreams } from '../stream-aligner/stream-aligner'
import { zoneDistributionsFor } from '../zones/zone-classifier'
import type { ZoneConfig } from '../zones/zones.types'
import { activityInputSchema, activitySummarySchema } from './activity-analysis.schema'
import type {
  ActivityAnalysis,
  ActivityInput,
  BatchItemResult,
  BatchReport,
  RollupReport,
} from './activity-analysis.types'

export type AnalyzeOptions = {
  zones?: ZoneConfig
  config?: AnalysisConfigInput
}

export type RollupOptions = AnalyzeOptions & RollupFilter

const itemId = (raw: unknown, index: number): string => {
  if (typeof raw === 'object' && raw !== null && 'activity' in raw) {
    const activity = raw.activity
    if (typeof activity === 'object' && activity !== null && 'id' in activity && typeof activity.id === 'string') {
      return activity.id
    }
  }
  return `#${index}`
}

@Injectable()
export class ActivityAnalysisService {
  private readonly logger = new Logger(ActivityAnalysisService.name)

  constructor(
    private readonly config: AnalysisConfigService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  analyzeActivity(input: ActivityInput, options: AnalyzeOptions = {}): ActivityAnalysis {
    return this.analyze(input, this.config.resolve(options.config), this.zonesFor(options))
  }

  /**
   * Analyzes each item on its own. A failing item is reported as skipped with its
   * error code and never stops the rest of the batch.
   */
  analyzeBatch(items: ReadonlyArray<unknown>, options: AnalyzeOptions = {}): BatchReport {
    const config = this.config.resolve(options.config)
    const zones = this.zonesFor(options)

    const results = items.map((raw, index) => this.analyzeItem(raw, index, config, zones))
    const succeeded = results.filter((r) => r.status === 'succeeded').length

    this.logger.log(`Batch of ${items.length}: ${succeeded} analyzed, ${items.length - succeeded} skipped`)

    return {
      generatedAtIso: this.clock.nowIso(),
      total: items.length,
      succeeded,
      skipped: items.length - succeeded,
      results,
    }
  }

  rollup(
    items: ReadonlyArray<unknown>,
    window?: PeriodWindow,
    options: RollupOptions = {},
  ): RollupReport<PeriodRollup> {
    const { summaries, report } = this.summariesOf(items, options)
    return {
      generatedAtIso: report.generatedAtIso,
      rollup: rollupSummaries(summaries, window, { activityType: options.activityType }),
      skipped: report.results.flatMap((r) => (r.status === 'skipped' ? [r] : [])),
    }
  }

  rollupWeekly(items: ReadonlyArray<unknown>, options: RollupOptions = {}): RollupReport<Record<string, PeriodRollup>> {
    const { summaries, report } = this.summariesOf(items, options)
    return {
      generatedAtIso: report.generatedAtIso,
      rollup: rollupByWeek(summaries, { activityType: options.activityType }),
      skipped: report.results.flatMap((r) => (r.status === 'skipped' ? [r] : [])),
    }
  }

  // request zones replace the athlete defaults kind by kind
  private zonesFor(options: AnalyzeOptions): ZoneConfig {
    return options.zones ? { ...this.config.defaultZones(), ...options.zones } : this.config.defaultZones()
  }

  private summariesOf(items: ReadonlyArray<unknown>, options: AnalyzeOptions) {
    const report = this.analyzeBatch(items, options)
    const summaries: ActivitySummary[] = report.results.flatMap((r) =>
      r.status === 'succeeded' ? [r.analysis.summary] : [],
    )
    return { summaries, report }
  }

  private analyzeItem(raw: unknown, index: number, config: AnalysisConfig, zones: ZoneConfig): BatchItemResult {
    const activityId = itemId(raw, index)

    const parsed = activityInputSchema.safeParse(raw)
    if (!parsed.success) {
      this.logger.warn(`Skipping ${activityId}: invalid input`)
      return {
        activityId,
        status: 'skipped',
        code: 'INVALID_INPUT',
        reason: JSON.stringify(parsed.error.format()),
      }
    }

    try {
      return { activityId, status: 'succeeded', analysis: this.analyze(parsed.data, config, zones) }
    } catch (err) {
      if (isAnalysisError(err)) {
        this.logger.warn(`Skipping ${activityId}: ${err.code} ${err.message}`)
        return { activityId, status: 'skipped', code: err.code, reason: err.message }
      }
      const message = err instanceof Error ? err.message : String(err)
      this.logger.error(`Analysis of ${activityId} failed: ${message}`, err instanceof Error ? err.stack : undefined)
      return { activityId, status: 'skipped', code: 'INTERNAL_ERROR', reason: message }
    }
  }

  private analyze(input: ActivityInput, config: AnalysisConfig, zones: ZoneConfig): ActivityAnalysis {
    const stream = alignStreams(input.streams, input.activity, config.align)
    const zoneResults = zoneDistributionsFor(stream, zones)
    const detection = detectSegments(stream, config.segments)
    const summary = buildActivitySummary(stream, zoneResults, detection, config.totals)

    const parsed = activitySummarySchema.safeParse(summary)
    if (!parsed.success) {
      throw new InternalServerErrorException(
        `ActivitySummary validation failed: ${JSON.stringify(parsed.error.format())}`,
      )
    }

    this.logger.debug(
      `Analyzed ${stream.meta.id}: ${stream.samples.length} samples, ${detection.segments.length} segments`,
    )

    return {
      summary,
      record: toSummaryRecord(summary),
      dashboard: assembleDashboard(
        { summary, segments: detection.segments, zones: zoneResults, stream },
        { maxPoints: config.dashboard.maxPoints, routeColorMetric: config.dashboard.routeColorMetric },
      ),
    }
  }
}
