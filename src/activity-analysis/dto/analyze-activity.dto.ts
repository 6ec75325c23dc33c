import { IsNotEmpty, IsObject } from 'class-validator'
import { AnalysisOptionsDto } from './analysis-options.dto'

export class AnalyzeActivityDto extends AnalysisOptionsDto {
  @IsObject()
  @IsNotEmpty()
  activity!: Record<string, unknown>

  @IsObject()
  @IsNotEmpty()
  streams!: Record<string, unknown>
}
