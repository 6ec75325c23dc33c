import { Test } from '@nestjs/testing'
import { AppController } from './app.controller'
import { CLOCK, FixedClock } from './clock/clock'

describe('AppController', () => {
  it('reports health with the injected clock time', async () => {
    const mod = await Test.createTestingModule({
      controllers: [AppController],
      providers: [{ provide: CLOCK, useValue: new FixedClock('2024-06-01T12:00:00Z') }],
    }).compile()

    const controller = mod.get(AppController)

    expect(controller.health()).toEqual({ status: 'ok', time: '2024-06-01T12:00:00.000Z' })
    expect(controller.getRoot()).toEqual({ status: 'ok', service: 'ride-analysis' })
  })
})
