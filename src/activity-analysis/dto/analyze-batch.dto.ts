import { IsArray, IsISO8601, IsNotEmpty, IsOptional, IsString } from 'class-validator'
import { AnalysisOptionsDto } from './analysis-options.dto'

export class AnalyzeBatchDto extends AnalysisOptionsDto {
  // items are validated one by one so a bad item only skips itself
  @IsArray()
  activities!: unknown[]
}

export class RollupDto extends AnalyzeBatchDto {
  @IsString()
  @IsNotEmpty()
  @IsOptional()
  activityType?: string
}

export class WindowedRollupDto extends RollupDto {
  @IsISO8601()
  @IsOptional()
  fromIso?: string

  @IsISO8601()
  @IsOptional()
  toIso?: string
}
