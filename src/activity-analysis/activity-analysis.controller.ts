import { BadRequestException, Body, Controller, HttpCode, Post, UsePipes, ValidationPipe } from '@nestjs/common'
import type { z } from 'zod'
import { analysisConfigOverridesSchema } from '../config/analysis-config.schema'
import {
  mapProviderActivity,
  mapProviderStreams,
  providerActivitySchema,
  providerStreamSetSchema,
} from '../stream-import/provider-streams.mapper'
import { parseTcxStreams } from '../stream-import/tcx-streams.parser'
import { createZoneConfig } from '../zones/zone-definition'
import { activityInputSchema, zoneConfigInputSchema } from './activity-analysis.schema'
import { ActivityAnalysisService, type AnalyzeOptions } from './activity-analysis.service'
import { AnalysisOptionsDto } from './dto/analysis-options.dto'
import { AnalyzeActivityDto } from './dto/analyze-activity.dto'
import { AnalyzeBatchDto, RollupDto, WindowedRollupDto } from './dto/analyze-batch.dto'
import { AnalyzeProviderStreamsDto, AnalyzeTcxDto } from './dto/import-activity.dto'

const parseOr400 = <S extends z.ZodTypeAny>(schema: S, value: unknown, label: string): z.infer<S> => {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    throw new BadRequestException(`Invalid ${label}: ${JSON.stringify(parsed.error.format())}`)
  }
  return parsed.data
}

@Controller('activities')
@UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
export class ActivityAnalysisController {
  constructor(private readonly analysis: ActivityAnalysisService) {}

  private options(dto: AnalysisOptionsDto): AnalyzeOptions {
    const zones = dto.zones ? createZoneConfig(parseOr400(zoneConfigInputSchema, dto.zones, 'zones')) : undefined
    const config = dto.config ? parseOr400(analysisConfigOverridesSchema, dto.config, 'config') : undefined
    return { zones, config }
  }

  @Post('analyze')
  @HttpCode(200)
  analyze(@Body() dto: AnalyzeActivityDto) {
    const input = parseOr400(activityInputSchema, { activity: dto.activity, streams: dto.streams }, 'activity')
    return this.analysis.analyzeActivity(input, this.options(dto))
  }

  @Post('analyze-batch')
  @HttpCode(200)
  analyzeBatch(@Body() dto: AnalyzeBatchDto) {
    return this.analysis.analyzeBatch(dto.activities, this.options(dto))
  }

  @Post('analyze-tcx')
  @HttpCode(200)
  analyzeTcx(@Body() dto: AnalyzeTcxDto) {
    const { startTimeIso, sport, streams } = parseTcxStreams(dto.tcxRaw)
    if (!startTimeIso) {
      throw new BadRequestException('TCX contains no trackpoints')
    }
    const activity = { id: dto.activityId, startTimeIso, type: dto.type ?? sport ?? 'Ride', name: dto.name ?? null }
    return this.analysis.analyzeActivity({ activity, streams }, this.options(dto))
  }

  @Post('analyze-provider')
  @HttpCode(200)
  analyzeProvider(@Body() dto: AnalyzeProviderStreamsDto) {
    const activity = mapProviderActivity(parseOr400(providerActivitySchema, dto.activity, 'activity'))
    const streams = mapProviderStreams(parseOr400(providerStreamSetSchema, dto.streams, 'streams'))
    return this.analysis.analyzeActivity({ activity, streams }, this.options(dto))
  }

  @Post('rollup')
  @HttpCode(200)
  rollup(@Body() dto: WindowedRollupDto) {
    if ((dto.fromIso === undefined) !== (dto.toIso === undefined)) {
      throw new BadRequestException('fromIso and toIso must be given together')
    }
    const window = dto.fromIso && dto.toIso ? { fromIso: dto.fromIso, toIso: dto.toIso } : undefined
    return this.analysis.rollup(dto.activities, window, { ...this.options(dto), activityType: dto.activityType })
  }

  @Post('rollup/weekly')
  @HttpCode(200)
  rollupWeekly(@Body() dto: RollupDto) {
    return this.analysis.rollupWeekly(dto.activities, { ...this.options(dto), activityType: dto.activityType })
  }
}
