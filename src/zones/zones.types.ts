export type ZoneKind = 'heartRate' | 'power'

export type Zone = {
  name: string
  /** inclusive */
  min: number
  /** inclusive; a value on a shared boundary belongs to this zone, not the next */
  max: number
}

export type ZoneDefinition = {
  readonly kind: ZoneKind
  readonly zones: ReadonlyArray<Readonly<Zone>>
}

export type ZoneConfig = {
  heartRate?: ZoneDefinition
  power?: ZoneDefinition
}

export type ZoneShare = Zone & {
  seconds: number
  percentage: number
}

export type ZoneDistribution = {
  status: 'available'
  kind: ZoneKind
  zones: ZoneShare[]
  /** time assigned to some zone; percentages are relative to it */
  totalSec: number
  /** time with a present value that fell outside every zone */
  unclassifiedSec: number
}

export type UnavailableReason = 'metric-absent' | 'no-zone-definition'

export type MetricUnavailable = {
  status: 'unavailable'
  kind: ZoneKind
  reason: UnavailableReason
}

export type ZoneResult = ZoneDistribution | MetricUnavailable

export type ZoneResults = Record<ZoneKind, ZoneResult>
