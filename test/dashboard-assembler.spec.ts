import { buildActivitySummary } from '../src/activity-metrics/activity-summary'
import { assembleDashboard, downsampleIndices } from '../src/dashboard/dashboard-assembler'
import { detectSegments } from '../src/segments/segment-detector'
import { createZoneConfig } from '../src/zones/zone-definition'
import { zoneDistributionsFor } from '../src/zones/zone-classifier'
import { DETECTOR, buildStream, fill, seconds } from './helpers/activity-fixtures'

const assemble = (maxPoints?: number) => {
  const stream = buildStream({
    time: seconds(11),
    heartRate: { values: fill(11, (i) => 100 + i) },
    altitude: { values: fill(11, (i) => 200 + i * 2) },
    position: { values: Array.from({ length: 11 }, (_, i) => ({ lat: 50 + i / 1000, lng: 19 })) },
  })
  const zones = zoneDistributionsFor(stream, createZoneConfig({ power: [{ name: 'All', min: 0, max: 2000 }] }))
  const detection = detectSegments(stream, DETECTOR)
  const summary = buildActivitySummary(stream, zones, detection, { minMovingSpeedMps: 0.5 })
  const bundle = assembleDashboard({ summary, segments: detection.segments, zones, stream }, { maxPoints })
  return { stream, zones, summary, bundle }
}

describe('downsampleIndices', () => {
  it('keeps every index without a cap or when the data fits', () => {
    expect(downsampleIndices(5)).toEqual([0, 1, 2, 3, 4])
    expect(downsampleIndices(3, 5)).toEqual([0, 1, 2])
  })

  it('spreads capped indices evenly and keeps both ends', () => {
    expect(downsampleIndices(11, 3)).toEqual([0, 5, 10])
    expect(downsampleIndices(5, 2)).toEqual([0, 4])
  })

  it('rejects caps below two', () => {
    expect(() => downsampleIndices(10, 1)).toThrow(RangeError)
    expect(() => downsampleIndices(10, 2.5)).toThrow(RangeError)
  })
})

describe('assembleDashboard', () => {
  it('includes panels only for recorded metrics', () => {
    const { bundle } = assemble()

    expect(bundle.timeSeries.panels.map((p) => p.key)).toEqual(['heartRate', 'altitude'])
    expect(bundle.timeSeries.sourcePoints).toBe(11)
    expect(bundle.timeSeries.timeSec).toHaveLength(11)
  })

  it('caps time series and route points', () => {
    const { bundle } = assemble(3)

    expect(bundle.timeSeries.timeSec).toEqual([0, 5, 10])
    expect(bundle.timeSeries.panels[0]?.values).toEqual([100, 105, 110])
    expect(bundle.route).toEqual({
      colorMetric: 'altitude',
      points: [
        { lat: 50, lng: 19, value: 200 },
        { lat: 50.005, lng: 19, value: 210 },
        { lat: 50.01, lng: 19, value: 220 },
      ],
    })
  })

  it('marks zone panels without data', () => {
    const { bundle } = assemble()

    expect(bundle.zonePanels.heartRate).toEqual({
      status: 'unavailable',
      kind: 'heartRate',
      reason: 'no-zone-definition',
    })
    expect(bundle.zonePanels.power).toEqual({ status: 'unavailable', kind: 'power', reason: 'metric-absent' })
  })

  it('returns a frozen bundle without freezing its inputs', () => {
    const { bundle, summary, zones } = assemble()

    expect(Object.isFrozen(bundle)).toBe(true)
    expect(Object.isFrozen(bundle.timeSeries.panels[0])).toBe(true)
    expect(Object.isFrozen(bundle.summary.distributions)).toBe(true)
    expect(bundle.summary).toEqual(summary)
    expect(Object.isFrozen(summary)).toBe(false)
    expect(Object.isFrozen(zones.heartRate)).toBe(false)
  })
})
