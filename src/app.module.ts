import { Module } from '@nestjs/common'
import { ActivityAnalysisModule } from './activity-analysis/activity-analysis.module'
import { AppController } from './app.controller'
import { ClockModule } from './clock/clock.module'

@Module({
  imports: [ClockModule, ActivityAnalysisModule],
  controllers: [AppController],
})
export class AppModule {}
