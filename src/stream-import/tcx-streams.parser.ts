import { XMLParser } from 'fast-xml-parser'
import type { ParsedTcx, TcxStreams, Trackpoint } from '../types/tcx.types'
import type { LatLng, RawSeries } from '../types/stream.types'

const toArray = (value: unknown): unknown[] => {
  if (value === undefined || value === null || value === '') return []
  return Array.isArray(value) ? value : [value]
}

const child = (node: unknown, key: string): unknown =>
  typeof node === 'object' && node !== null && key in node ? Reflect.get(node, key) : undefined

const path = (node: unknown, ...keys: string[]): unknown => keys.reduce(child, node)

const num = (value: unknown): number | undefined => {
  const n = typeof value === 'string' ? Number(value) : value
  return typeof n === 'number' && Number.isFinite(n) ? n : undefined
}

const parser = new XMLParser({
  ignoreAttributes: false,
  removeNSPrefix: true,
  parseTagValue: true,
  parseAttributeValue: true,
})

const toTrackpoint = (tp: unknown): Trackpoint | null => {
  const rawTime = child(tp, 'Time')
  const time = typeof rawTime === 'string' ? rawTime.trim() : null
  if (!time) return null

  const point: Trackpoint = { time }

  const distance = num(child(tp, 'DistanceMeters'))
  const altitude = num(child(tp, 'AltitudeMeters'))
  const hr = num(path(tp, 'HeartRateBpm', 'Value')) ?? num(child(tp, 'HeartRateBpm'))
  const cadence = num(child(tp, 'Cadence'))
  const speed = num(path(tp, 'Extensions', 'TPX', 'Speed'))
  const watts = num(path(tp, 'Extensions', 'TPX', 'Watts'))
  const lat = num(path(tp, 'Position', 'LatitudeDegrees'))
  const lng = num(path(tp, 'Position', 'LongitudeDegrees'))

  if (distance !== undefined) point.distanceMeters = distance
  if (altitude !== undefined) point.altitudeMeters = altitude
  if (hr !== undefined) point.heartRateBpm = Math.round(hr)
  if (cadence !== undefined) point.cadenceRpm = cadence
  if (speed !== undefined) point.speedMps = speed
  if (watts !== undefined) point.watts = watts
  if (lat !== undefined && lng !== undefined) point.position = { lat, lng }

  return point
}

export const parseTcx = (xml: string): ParsedTcx => {
  const result: unknown = parser.parse(xml)
  const activities = toArray(path(result, 'TrainingCenterDatabase', 'Activities', 'Activity'))

  const trackpoints: Trackpoint[] = []
  for (const activity of activities) {
    for (const lap of toArray(child(activity, 'Lap'))) {
      for (const track of toArray(child(lap, 'Track'))) {
        for (const tp of toArray(child(track, 'Trackpoint'))) {
          const point = toTrackpoint(tp)
          if (point) trackpoints.push(point)
        }
      }
    }
  }

  const sport = child(activities[0], '@_Sport')

  return {
    trackpoints,
    startTimeIso: trackpoints[0]?.time ?? null,
    sport: typeof sport === 'string' ? sport : null,
  }
}

/** Raw streams timed in seconds from the first trackpoint. Fields no trackpoint carries stay absent. */
export const tcxToStreams = (parsed: ParsedTcx): TcxStreams => {
  const origin = parsed.startTimeIso ? Date.parse(parsed.startTimeIso) : Number.NaN
  const time = parsed.trackpoints.map((tp) => (Date.parse(tp.time) - origin) / 1000)

  const series = (pick: (tp: Trackpoint) => number | undefined): RawSeries<number> | undefined => {
    const values = parsed.trackpoints.map((tp) => pick(tp) ?? null)
    return values.some((v) => v !== null) ? { values } : undefined
  }

  const positions = parsed.trackpoints.map((tp): LatLng | null => tp.position ?? null)

  return {
    startTimeIso: parsed.startTimeIso,
    sport: parsed.sport,
    streams: {
      time,
      distance: series((tp) => tp.distanceMeters),
      heartRate: series((tp) => tp.heartRateBpm),
      power: series((tp) => tp.watts),
      cadence: series((tp) => tp.cadenceRpm),
      altitude: series((tp) => tp.altitudeMeters),
      speed: series((tp) => tp.speedMps),
      position: positions.some((p) => p !== null) ? { values: positions } : undefined,
    },
  }
}

export const parseTcxStreams = (xml: string): TcxStreams => tcxToStreams(parseTcx(xml))
