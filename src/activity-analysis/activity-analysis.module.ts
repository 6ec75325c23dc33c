import { Module } from '@nestjs/common'
import { AnalysisConfigService } from '../config/analysis-config.service'
import { ActivityAnalysisController } from './activity-analysis.controller'
import { ActivityAnalysisService } from './activity-analysis.service'

@Module({
  controllers: [ActivityAnalysisController],
  providers: [
    ActivityAnalysisService,
    {
      provide: AnalysisConfigService,
      useFactory: () => new AnalysisConfigService(process.env),
    },
  ],
  exports: [ActivityAnalysisService],
})
export class ActivityAnalysisModule {}
