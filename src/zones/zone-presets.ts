import { createZoneDefinition } from './zone-definition'
import type { ZoneDefinition } from './zones.types'

type ZoneBand = { name: string; minPct: number; maxPct: number }

// % of max heart rate, Z5 open towards 110%
const HEART_RATE_BANDS: ZoneBand[] = [
  { name: 'Z1', minPct: 0, maxPct: 0.6 },
  { name: 'Z2', minPct: 0.6, maxPct: 0.7 },
  { name: 'Z3', minPct: 0.7, maxPct: 0.8 },
  { name: 'Z4', minPct: 0.8, maxPct: 0.9 },
  { name: 'Z5', minPct: 0.9, maxPct: 1.1 },
]

// % of FTP
const POWER_BANDS: ZoneBand[] = [
  { name: 'Active Recovery', minPct: 0, maxPct: 0.55 },
  { name: 'Endurance', minPct: 0.55, maxPct: 0.75 },
  { name: 'Tempo', minPct: 0.75, maxPct: 0.9 },
  { name: 'Threshold', minPct: 0.9, maxPct: 1.05 },
  { name: 'VO2max', minPct: 1.05, maxPct: 1.2 },
  { name: 'Neuromuscular Power', minPct: 1.2, maxPct: 2.0 },
]

export const heartRateZonesFromMax = (maxHr: number): ZoneDefinition =>
  createZoneDefinition(
    'heartRate',
    HEART_RATE_BANDS.map((b) => ({
      name: b.name,
      min: Math.trunc(maxHr * b.minPct),
      max: Math.trunc(maxHr * b.maxPct),
    })),
  )

export const powerZonesFromFtp = (ftp: number): ZoneDefinition =>
  createZoneDefinition(
    'power',
    POWER_BANDS.map((b) => ({
      name: b.name,
      min: Math.round(ftp * b.minPct),
      max: Math.round(ftp * b.maxPct),
    })),
  )
