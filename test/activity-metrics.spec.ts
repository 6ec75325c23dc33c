import { buildActivitySummary, toSummaryRecord, zoneColumnName } from '../src/activity-metrics/activity-summary'
import { computeActivityTotals, computeTrainingLoad } from '../src/activity-metrics/activity-totals'
import { computePowerMetrics, estimateFtp, normalizedPower, powerCurve } from '../src/activity-metrics/power-metrics'
import { detectSegments } from '../src/segments/segment-detector'
import { createZoneConfig } from '../src/zones/zone-definition'
import { zoneDistributionsFor } from '../src/zones/zone-classifier'
import { DETECTOR, buildStream, fill, seconds } from './helpers/activity-fixtures'

const TOTALS = { minMovingSpeedMps: 0.5 }

const rideStream = () =>
  buildStream({
    time: seconds(10),
    distance: { values: fill(10, (i) => i * 6) },
    speed: { values: [0, 0, 5, 5, 5, 5, 5, 5, 5, 0] },
    altitude: { values: [100, 101, 102, 101, 103, 103, 103, 103, 103, 103] },
    heartRate: { values: fill(10, () => 120) },
    cadence: { values: [0, 0, 80, 90, 100, 90, 80, 90, 100, 0] },
  })

describe('computeActivityTotals', () => {
  it('computes times, distance, elevation and averages', () => {
    const totals = computeActivityTotals(rideStream(), TOTALS)

    expect(totals.elapsedSec).toBe(10)
    expect(totals.movingTimeSec).toBe(7)
    expect(totals.distanceM).toBe(54)
    expect(totals.elevation).toEqual({ gainM: 4, lossM: 1, minM: 100, maxM: 103 })
    expect(totals.avgSpeed).toBeCloseTo(54 / 7, 10)
    expect(totals.maxSpeed).toBe(5)
    expect(totals.avgHeartRate).toBe(120)
    expect(totals.avgCadence).toBe(90)
    expect(totals.maxCadence).toBe(100)
  })

  it('derives speed from distance when speed was not recorded', () => {
    const stream = buildStream({ time: seconds(10), distance: { values: fill(10, (i) => i * 5) } })
    const totals = computeActivityTotals(stream, TOTALS)

    expect(totals.movingTimeSec).toBe(9)
    expect(totals.avgSpeed).toBe(5)
  })

  it('takes distance from the first and last recorded values', () => {
    const stream = buildStream({ time: seconds(4), distance: { values: [null, 100, 250, 240] } })

    expect(computeActivityTotals(stream, TOTALS).distanceM).toBe(140)
  })

  it('counts the whole ride as moving without any speed signal', () => {
    const stream = buildStream({ time: seconds(10), heartRate: { values: fill(10, () => 130) } })
    const totals = computeActivityTotals(stream, TOTALS)

    expect(totals.movingTimeSec).toBe(10)
    expect(totals.distanceM).toBeNull()
    expect(totals.elevation).toBeNull()
  })
})

describe('computeTrainingLoad', () => {
  it('multiplies moving hours by average heart rate', () => {
    expect(computeTrainingLoad(3600, 140)).toBe(140)
    expect(computeTrainingLoad(1800, null)).toBeNull()
  })
})

describe('power metrics', () => {
  it('normalized power of a steady ride equals its average', () => {
    expect(normalizedPower(fill(60, () => 200).map((p) => p ?? 0), 1)).toBeCloseTo(200, 6)
    expect(normalizedPower([200, 200], 1)).toBeNull()
  })

  it('estimates FTP from the best 20 minutes', () => {
    const watts = [...Array.from({ length: 1200 }, () => 250), ...Array.from({ length: 60 }, () => 100)]

    expect(estimateFtp(watts, 1)).toBeCloseTo(237.5, 6)
    expect(estimateFtp(watts.slice(0, 600), 1)).toBeNull()
  })

  it('fills only the curve durations the ride covers', () => {
    const watts = [...Array.from({ length: 55 }, () => 200), ...Array.from({ length: 5 }, () => 500)]
    const curve = powerCurve(watts, 1)

    expect(Object.keys(curve)).toEqual(['5s', '10s', '30s', '60s'])
    expect(curve['5s']).toBe(500)
    expect(curve['10s']).toBe(350)
    expect(curve['60s']).toBe(225)
    expect(powerCurve(watts.slice(0, 30), 1)).toEqual({})
  })

  it('leaves zero watts out of the averages', () => {
    const stream = buildStream({
      time: seconds(8),
      power: { values: [0, 0, 100, 200, 300, 0, 200, 0] },
    })

    expect(computePowerMetrics(stream)).toMatchObject({ avgPower: 200, maxPower: 300, normalizedPower: null })
  })

  it('is null without pedalling samples', () => {
    const stream = buildStream({ time: seconds(3), power: { values: [0, 0, 0] } })

    expect(computePowerMetrics(stream)).toBeNull()
  })
})

describe('summary record', () => {
  it('slugs zone names into column names', () => {
    expect(zoneColumnName('hr', 'Z1')).toBe('hr_z1_pct')
    expect(zoneColumnName('power', 'Neuromuscular Power')).toBe('power_neuromuscular_power_pct')
  })

  it('flattens a summary into one row', () => {
    const stream = rideStream()
    const zones = zoneDistributionsFor(
      stream,
      createZoneConfig({
        heartRate: [
          { name: 'Z1', min: 0, max: 120 },
          { name: 'Z2', min: 120, max: 200 },
        ],
      }),
    )
    const summary = buildActivitySummary(stream, zones, detectSegments(stream, DETECTOR), TOTALS)

    expect(toSummaryRecord(summary)).toEqual({
      activity_id: 'ride-1',
      name: 'Morning Ride',
      type: 'Ride',
      start_time: '2024-05-06T08:00:00.000Z',
      distance_km: 0.05,
      moving_time_min: 0.12,
      elapsed_time_min: 0.17,
      elevation_gain_m: 4,
      avg_speed_kmh: 27.77,
      max_speed_kmh: 18,
      avg_heartrate: 120,
      max_heartrate: 120,
      avg_cadence: 90,
      avg_watts: null,
      max_watts: null,
      normalized_power: null,
      ftp_estimate: null,
      training_load: 0.2,
      climb_segments: 0,
      effort_segments: 0,
      hr_z1_pct: 100,
      hr_z2_pct: 0,
    })
  })
})
