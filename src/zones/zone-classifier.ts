import { MissingMetricError } from '../errors/analysis.errors'
import type { ActivityStream, ScalarField } from '../types/stream.types'
import type {
  MetricUnavailable,
  ZoneConfig,
  ZoneDefinition,
  ZoneDistribution,
  ZoneKind,
  ZoneResult,
  ZoneResults,
  ZoneShare,
} from './zones.types'

/** Present values of a metric, index-aligned with the stream; throws when there are none. */
export const requireMetric = (stream: ActivityStream, field: ScalarField): Array<number | null> => {
  if (!stream.available[field]) throw new MissingMetricError(field)
  return stream.samples.map((s) => s[field])
}

const unavailable = (kind: ZoneKind, reason: MetricUnavailable['reason']): MetricUnavailable => ({
  status: 'unavailable',
  kind,
  reason,
})

export const classifyValues = (
  values: ReadonlyArray<number | null>,
  definition: ZoneDefinition,
  intervalSec: number,
): ZoneDistribution => {
  const counts = definition.zones.map(() => 0)
  let unclassified = 0

  for (const v of values) {
    if (v === null) continue
    // first zone wins, so a value on a shared boundary stays in the lower zone
    const idx = definition.zones.findIndex((z) => v >= z.min && v <= z.max)
    if (idx === -1) unclassified++
    else counts[idx] = (counts[idx] ?? 0) + 1
  }

  const classified = counts.reduce((s, c) => s + c, 0)
  const totalSec = classified * intervalSec

  const zones: ZoneShare[] = definition.zones.map((z, i) => {
    const seconds = counts[i]! * intervalSec
    return {
      name: z.name,
      min: z.min,
      max: z.max,
      seconds,
      percentage: totalSec > 0 ? (seconds / totalSec) * 100 : 0,
    }
  })

  return {
    status: 'available',
    kind: definition.kind,
    zones,
    totalSec,
    unclassifiedSec: unclassified * intervalSec,
  }
}

export const classifyZones = (stream: ActivityStream, definition: ZoneDefinition): ZoneResult => {
  try {
    const values = requireMetric(stream, definition.kind)
    return classifyValues(values, definition, stream.sampleIntervalSec)
  } catch (err) {
    if (err instanceof MissingMetricError) return unavailable(definition.kind, 'metric-absent')
    throw err
  }
}

export const zoneDistributionsFor = (stream: ActivityStream, config: ZoneConfig): ZoneResults => ({
  heartRate: config.heartRate
    ? classifyZones(stream, config.heartRate)
    : unavailable('heartRate', 'no-zone-definition'),
  power: config.power ? classifyZones(stream, config.power) : unavailable('power', 'no-zone-definition'),
})
