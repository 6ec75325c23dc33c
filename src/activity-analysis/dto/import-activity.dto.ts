import { IsNotEmpty, IsObject, IsOptional, IsString } from 'class-validator'
import { AnalysisOptionsDto } from './analysis-options.dto'

export class AnalyzeTcxDto extends AnalysisOptionsDto {
  @IsString()
  @IsNotEmpty()
  activityId!: string

  @IsString()
  @IsNotEmpty()
  tcxRaw!: string

  @IsString()
  @IsOptional()
  name?: string | null

  @IsString()
  @IsOptional()
  type?: string | null
}

export class AnalyzeProviderStreamsDto extends AnalysisOptionsDto {
  @IsObject()
  @IsNotEmpty()
  activity!: Record<string, unknown>

  @IsObject()
  @IsNotEmpty()
  streams!: Record<string, unknown>
}
