import { InsufficientDataError } from '../src/errors/analysis.errors'
import { alignStreams, medianInterval } from '../src/stream-aligner/stream-aligner'
import { ALIGN, META, buildStream } from './helpers/activity-fixtures'

describe('alignStreams', () => {
  it('index-aligns series with the shared time stream and keeps recorded gaps as null', () => {
    const stream = buildStream({
      time: [0, 1, 2, 3],
      heartRate: { values: [100, 110, null, 130] },
    })

    expect(stream.samples.map((s) => s.time)).toEqual([0, 1, 2, 3])
    expect(stream.samples.map((s) => s.heartRate)).toEqual([100, 110, null, 130])
    expect(stream.available.heartRate).toBe(true)
  })

  it('marks absent metrics unavailable and never fills them with zero', () => {
    const stream = buildStream({ time: [0, 1, 2], heartRate: { values: [100, 101, 102] } })

    expect(stream.available.power).toBe(false)
    expect(stream.available.position).toBe(false)
    expect(stream.samples.map((s) => s.power)).toEqual([null, null, null])
  })

  it('pads a series shorter than the axis with null', () => {
    const stream = buildStream({ time: [0, 1, 2, 3], heartRate: { values: [100, 110] } })

    expect(stream.samples.map((s) => s.heartRate)).toEqual([100, 110, null, null])
  })

  it('interpolates a sparser series onto the axis', () => {
    const stream = buildStream({
      time: [0, 1, 2, 3, 4],
      power: { values: [100, 200, 300], time: [0, 2, 4] },
    })

    expect(stream.samples.map((s) => s.power)).toEqual([100, 150, 200, 250, 300])
  })

  it('does not bridge gaps longer than the interpolation limit', () => {
    const stream = buildStream({
      time: [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10],
      power: { values: [100, 200], time: [0, 10] },
    })

    expect(stream.samples[0]?.power).toBe(100)
    expect(stream.samples[5]?.power).toBeNull()
    expect(stream.samples[10]?.power).toBe(200)
  })

  it('builds a union axis from every series time basis', () => {
    const stream = alignStreams(
      {
        heartRate: { values: [100, 120, 140], time: [0, 2, 4] },
        power: { values: [200, 220], time: [1, 3] },
      },
      META,
      { ...ALIGN, axis: 'union' },
    )

    expect(stream.samples.map((s) => s.time)).toEqual([0, 1, 2, 3, 4])
    expect(stream.samples.map((s) => s.heartRate)).toEqual([100, 110, 120, 130, 140])
    expect(stream.samples.map((s) => s.power)).toEqual([null, 200, 210, 220, null])
  })

  it('sorts unordered times and keeps the first value for a repeated time', () => {
    const stream = buildStream({
      time: [0, 2, 1, 2],
      heartRate: { values: [100, 120, 110, 999] },
    })

    expect(stream.samples.map((s) => s.time)).toEqual([0, 1, 2])
    expect(stream.samples.map((s) => s.heartRate)).toEqual([100, 110, 120])
  })

  it('spaces series without any time basis by the default interval', () => {
    const stream = alignStreams({ heartRate: { values: [100, 101, 102] } }, META, {
      ...ALIGN,
      defaultIntervalSec: 2,
    })

    expect(stream.samples.map((s) => s.time)).toEqual([0, 2, 4])
    expect(stream.sampleIntervalSec).toBe(2)
  })

  it('carries positions and leaves unrecorded points empty', () => {
    const stream = buildStream({
      time: [0, 1, 2],
      position: { values: [{ lat: 50, lng: 19 }, null, { lat: 50.002, lng: 19.002 }] },
    })

    expect(stream.available.position).toBe(true)
    expect(stream.samples[0]?.position).toEqual({ lat: 50, lng: 19 })
    expect(stream.samples[1]?.position).toBeNull()
  })

  it('throws InsufficientDataError below the minimum sample count', () => {
    const run = () =>
      alignStreams({ time: [0, 1, 2], heartRate: { values: [100, 101, 102] } }, META, {
        ...ALIGN,
        minSamples: 30,
      })

    expect(run).toThrow(InsufficientDataError)
    try {
      run()
    } catch (err) {
      expect(err).toMatchObject({ code: 'INSUFFICIENT_DATA', sampleCount: 3, minSamples: 30 })
    }
  })

  it('returns a frozen stream', () => {
    const stream = buildStream({ time: [0, 1], heartRate: { values: [100, 101] } })

    expect(Object.isFrozen(stream)).toBe(true)
    expect(Object.isFrozen(stream.samples)).toBe(true)
    expect(Object.isFrozen(stream.samples[0])).toBe(true)
  })
})

describe('medianInterval', () => {
  it('takes the median positive spacing', () => {
    expect(medianInterval([0, 2, 4, 6, 16], 1)).toBe(2)
  })

  it('falls back when there is no spacing', () => {
    expect(medianInterval([5], 1)).toBe(1)
  })
})
