import { BadRequestException, UnprocessableEntityException } from '@nestjs/common'
import type { StreamField } from '../types/stream.types'

export type AnalysisErrorCode = 'INSUFFICIENT_DATA' | 'MISSING_METRIC' | 'INVALID_ZONE_CONFIG'

export class InsufficientDataError extends UnprocessableEntityException {
  readonly code: AnalysisErrorCode = 'INSUFFICIENT_DATA'

  constructor(
    readonly sampleCount: number,
    readonly minSamples: number,
  ) {
    super({
      statusCode: 422,
      code: 'INSUFFICIENT_DATA',
      message: `Stream has ${sampleCount} samples, at least ${minSamples} required`,
      sampleCount,
      minSamples,
    })
    this.name = 'InsufficientDataError'
  }
}

export class MissingMetricError extends UnprocessableEntityException {
  readonly code: AnalysisErrorCode = 'MISSING_METRIC'

  constructor(readonly metric: StreamField) {
    super({
      statusCode: 422,
      code: 'MISSING_METRIC',
      message: `Stream has no ${metric} data`,
      metric,
    })
    this.name = 'MissingMetricError'
  }
}

export class InvalidZoneConfigError extends BadRequestException {
  readonly code: AnalysisErrorCode = 'INVALID_ZONE_CONFIG'

  constructor(readonly problems: string[]) {
    super({
      statusCode: 400,
      code: 'INVALID_ZONE_CONFIG',
      message: `Invalid zone definition: ${problems.join('; ')}`,
      problems,
    })
    this.name = 'InvalidZoneConfigError'
  }
}

export type AnalysisError = InsufficientDataError | MissingMetricError | InvalidZoneConfigError

export const isAnalysisError = (err: unknown): err is AnalysisError =>
  err instanceof InsufficientDataError ||
  err instanceof MissingMetricError ||
  err instanceof InvalidZoneConfigError
