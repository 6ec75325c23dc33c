import type { LatLng, RawActivityStreams } from './stream.types'

export type Trackpoint = {
  time: string
  distanceMeters?: number
  heartRateBpm?: number
  altitudeMeters?: number
  cadenceRpm?: number
  speedMps?: number
  watts?: number
  position?: LatLng
}

export type ParsedTcx = {
  trackpoints: Trackpoint[]
  startTimeIso: string | null
  sport: string | null
}

export type TcxStreams = {
  startTimeIso: string | null
  sport: string | null
  streams: RawActivityStreams
}
