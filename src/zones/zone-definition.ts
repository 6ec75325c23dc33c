import { InvalidZoneConfigError } from '../errors/analysis.errors'
import type { Zone, ZoneConfig, ZoneDefinition, ZoneKind } from './zones.types'

export const findZoneProblems = (zones: ReadonlyArray<Zone>): string[] => {
  const problems: string[] = []
  if (zones.length === 0) {
    problems.push('at least one zone is required')
    return problems
  }

  const seen = new Set<string>()
  zones.forEach((zone, i) => {
    if (!zone.name.trim()) problems.push(`zone #${i + 1} has an empty name`)
    if (seen.has(zone.name)) problems.push(`duplicate zone name "${zone.name}"`)
    seen.add(zone.name)

    if (!Number.isFinite(zone.min) || !Number.isFinite(zone.max)) {
      problems.push(`zone "${zone.name}" has non-finite bounds`)
    } else if (zone.min > zone.max) {
      problems.push(`zone "${zone.name}" has min ${zone.min} above max ${zone.max}`)
    }

    const prev = zones[i - 1]
    if (prev && (zone.min < prev.max || zone.min <= prev.min)) {
      problems.push(
        `zone "${zone.name}" [${zone.min}, ${zone.max}] is unsorted or overlaps "${prev.name}" [${prev.min}, ${prev.max}]`,
      )
    }
  })

  return problems
}

/**
 * Validates a zone list once and freezes it. Zones must be ascending and may only touch
 * at a shared boundary; nothing is re-sorted or repaired.
 */
export const createZoneDefinition = (kind: ZoneKind, zones: ReadonlyArray<Zone>): ZoneDefinition => {
  const problems = findZoneProblems(zones)
  if (problems.length > 0) {
    throw new InvalidZoneConfigError(problems.map((p) => `${kind}: ${p}`))
  }
  return Object.freeze({
    kind,
    zones: Object.freeze(zones.map((z) => Object.freeze({ name: z.name, min: z.min, max: z.max }))),
  })
}

export const createZoneConfig = (input: {
  heartRate?: ReadonlyArray<Zone> | null
  power?: ReadonlyArray<Zone> | null
}): ZoneConfig => {
  const problems: string[] = []
  const config: ZoneConfig = {}

  for (const kind of ['heartRate', 'power'] as const) {
    const zones = input[kind]
    if (!zones) continue
    try {
      config[kind] = createZoneDefinition(kind, zones)
    } catch (err) {
      if (!(err instanceof InvalidZoneConfigError)) throw err
      problems.push(...err.problems)
    }
  }

  if (problems.length > 0) throw new InvalidZoneConfigError(problems)
  return Object.freeze(config)
}
