import { BadRequestException } from '@nestjs/common'
import { InvalidZoneConfigError } from '../errors/analysis.errors'
import { ActivityAnalysisController } from './activity-analysis.controller'
import type { ActivityAnalysisService } from './activity-analysis.service'

describe('ActivityAnalysisController', () => {
  let controller: ActivityAnalysisController
  let mockService: {
    analyzeActivity: jest.Mock
    analyzeBatch: jest.Mock
    rollup: jest.Mock
    rollupWeekly: jest.Mock
  }

  const activity = { id: 'r1', startTimeIso: '2024-05-06T08:00:00.000Z', type: 'Ride' }
  const streams = { time: [0, 1, 2], heartRate: { values: [120, 121, 122] } }

  beforeEach(() => {
    mockService = {
      analyzeActivity: jest.fn().mockReturnValue({ ok: true }),
      analyzeBatch: jest.fn().mockReturnValue({ total: 0 }),
      rollup: jest.fn().mockReturnValue({ rollup: null }),
      rollupWeekly: jest.fn().mockReturnValue({ rollup: {} }),
    }
    const service: Pick<ActivityAnalysisService, keyof typeof mockService> = mockService
    controller = new ActivityAnalysisController(service as ActivityAnalysisService)
  })

  it('validates the activity and passes parsed zones and overrides on', () => {
    controller.analyze({
      activity,
      streams,
      zones: { heartRate: [{ name: 'Z1', min: 0, max: 200 }] },
      config: { segments: { mergeGapSec: 3 } },
    })

    expect(mockService.analyzeActivity).toHaveBeenCalledTimes(1)
    const [input, options] = mockService.analyzeActivity.mock.calls[0] ?? []
    expect(input).toEqual({ activity: { ...activity, name: undefined }, streams })
    expect(options.config).toEqual({ segments: { mergeGapSec: 3 } })
    expect(options.zones.heartRate.zones).toEqual([{ name: 'Z1', min: 0, max: 200 }])
    expect(options.zones.power).toBeUndefined()
  })

  it('rejects a malformed activity with 400', () => {
    expect(() => controller.analyze({ activity: { id: 'r1' }, streams })).toThrow(BadRequestException)
    expect(mockService.analyzeActivity).not.toHaveBeenCalled()
  })

  it('rejects overlapping zones before analysis', () => {
    expect(() =>
      controller.analyze({
        activity,
        streams,
        zones: {
          power: [
            { name: 'A', min: 0, max: 200 },
            { name: 'B', min: 150, max: 300 },
          ],
        },
      }),
    ).toThrow(InvalidZoneConfigError)
    expect(mockService.analyzeActivity).not.toHaveBeenCalled()
  })

  it('rejects unknown config keys', () => {
    expect(() => controller.analyze({ activity, streams, config: { colour: 'red' } })).toThrow(BadRequestException)
  })

  it('hands batch items to the service unparsed', () => {
    const items = [{ anything: true }]
    controller.analyzeBatch({ activities: items })

    expect(mockService.analyzeBatch).toHaveBeenCalledWith(items, { zones: undefined, config: undefined })
  })

  it('requires both ends of a rollup window', () => {
    expect(() => controller.rollup({ activities: [], fromIso: '2024-05-01T00:00:00.000Z' })).toThrow(
      BadRequestException,
    )

    controller.rollup({ activities: [], fromIso: '2024-05-01T00:00:00.000Z', toIso: '2024-06-01T00:00:00.000Z' })
    expect(mockService.rollup).toHaveBeenCalledWith(
      [],
      { fromIso: '2024-05-01T00:00:00.000Z', toIso: '2024-06-01T00:00:00.000Z' },
      { zones: undefined, config: undefined },
    )
  })

  it('passes the activity type filter to rollups', () => {
    controller.rollupWeekly({ activities: [], activityType: 'Ride' })
    expect(mockService.rollupWeekly).toHaveBeenCalledWith([], { activityType: 'Ride' })

    controller.rollup({ activities: [], activityType: 'Run' })
    expect(mockService.rollup).toHaveBeenCalledWith([], undefined, { activityType: 'Run' })
  })

  it('turns a TCX upload into an activity', () => {
    const tcxRaw = `<TrainingCenterDatabase><Activities><Activity Sport="Biking"><Lap><Track>
      <Trackpoint><Time>2024-05-06T08:00:00Z</Time><HeartRateBpm><Value>120</Value></HeartRateBpm></Trackpoint>
      <Trackpoint><Time>2024-05-06T08:00:01Z</Time><HeartRateBpm><Value>122</Value></HeartRateBpm></Trackpoint>
    </Track></Lap></Activity></Activities></TrainingCenterDatabase>`

    controller.analyzeTcx({ activityId: 'tcx-1', tcxRaw })

    const [input] = mockService.analyzeActivity.mock.calls[0] ?? []
    expect(input.activity).toEqual({
      id: 'tcx-1',
      startTimeIso: '2024-05-06T08:00:00Z',
      type: 'Biking',
      name: null,
    })
    expect(input.streams.time).toEqual([0, 1])
    expect(input.streams.heartRate).toEqual({ values: [120, 122] })
  })

  it('rejects a TCX file without trackpoints', () => {
    expect(() => controller.analyzeTcx({ activityId: 'tcx-1', tcxRaw: '<TrainingCenterDatabase/>' })).toThrow(
      'TCX contains no trackpoints',
    )
  })

  it('maps provider stream sets', () => {
    controller.analyzeProvider({
      activity: { id: 42, start_date: '2024-05-06T08:00:00Z', type: 'Ride' },
      streams: { time: { data: [0, 1] }, watts: { data: [200, 210] } },
    })

    const [input] = mockService.analyzeActivity.mock.calls[0] ?? []
    expect(input.activity).toEqual({
      id: '42',
      startTimeIso: '2024-05-06T08:00:00Z',
      startTimeLocalIso: null,
      type: 'Ride',
      name: null,
    })
    expect(input.streams.power).toEqual({ values: [200, 210] })
  })
})
