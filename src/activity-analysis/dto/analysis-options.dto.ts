import { IsObject, IsOptional } from 'class-validator'

export class AnalysisOptionsDto {
  /** `{ heartRate?: Zone[], power?: Zone[] }`; the athlete defaults apply when omitted */
  @IsObject()
  @IsOptional()
  zones?: Record<string, unknown> | null

  @IsObject()
  @IsOptional()
  config?: Record<string, unknown> | null
}
