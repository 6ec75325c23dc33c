import { Controller, Get, Inject } from '@nestjs/common'
import { CLOCK, type Clock } from './clock/clock'

@Controller()
export class AppController {
  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  @Get()
  getRoot() {
    return { status: 'ok', service: 'ride-analysis' }
  }

  @Get('health')
  health() {
    return { status: 'ok', time: this.clock.nowIso() }
  }
}
