import {
  mapProviderActivity,
  mapProviderStreams,
  providerActivitySchema,
  providerStreamSetSchema,
} from './provider-streams.mapper'

describe('provider streams mapper', () => {
  it('maps provider stream names onto stream fields', () => {
    const raw = providerStreamSetSchema.parse({
      time: { data: [0, 1, 2] },
      heartrate: { data: [120, 121, 122] },
      watts: { data: [200, null, 210] },
      velocity_smooth: { data: [5, 5.5, 6] },
      grade_smooth: { data: [1, 2, 3] },
      latlng: { data: [[50, 19], null, [50.001, 19.001]] },
    })

    expect(mapProviderStreams(raw)).toEqual({
      time: [0, 1, 2],
      distance: undefined,
      heartRate: { values: [120, 121, 122] },
      power: { values: [200, null, 210] },
      cadence: undefined,
      altitude: undefined,
      speed: { values: [5, 5.5, 6] },
      grade: { values: [1, 2, 3] },
      position: { values: [{ lat: 50, lng: 19 }, null, { lat: 50.001, lng: 19.001 }] },
    })
  })

  it('maps activity metadata with the sport type taking precedence', () => {
    const raw = providerActivitySchema.parse({
      id: 123456,
      start_date: '2024-05-06T08:00:00Z',
      type: 'Ride',
      sport_type: 'GravelRide',
      name: 'Gravel loop',
    })

    expect(mapProviderActivity(raw)).toEqual({
      id: '123456',
      startTimeIso: '2024-05-06T08:00:00Z',
      startTimeLocalIso: null,
      type: 'GravelRide',
      name: 'Gravel loop',
    })
  })

  it('carries the local start time when the provider sends one', () => {
    const raw = providerActivitySchema.parse({
      id: 'late-1',
      start_date: '2024-05-12T22:30:00Z',
      start_date_local: '2024-05-13T00:30:00Z',
    })

    expect(mapProviderActivity(raw)).toEqual({
      id: 'late-1',
      startTimeIso: '2024-05-12T22:30:00Z',
      startTimeLocalIso: '2024-05-13T00:30:00Z',
      type: 'Ride',
      name: null,
    })
  })

  it('rejects malformed stream sets', () => {
    expect(providerStreamSetSchema.safeParse({ watts: { data: ['high'] } }).success).toBe(false)
  })
})
