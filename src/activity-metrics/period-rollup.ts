import type { ActivityMeta } from '../types/stream.types'
import type { ZoneKind, ZoneResult, ZoneShare } from '../zones/zones.types'
import type {
  ActivitySummary,
  DailyLoad,
  PeriodRollup,
  PeriodWindow,
  RollupAccumulator,
  RollupFilter,
  RollupZone,
  WeightedSum,
} from './activity-metrics.types'

const DAY_MS = 24 * 60 * 60 * 1000
const ROLLING_DAYS = 7

const WALL_CLOCK = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?/

/**
 * Start time for calendar bucketing: the recorded wall-clock time when there is one,
 * read as if it were UTC so the UTC getters return local calendar fields. Falls back to
 * the UTC start.
 */
export const calendarStartOf = (meta: ActivityMeta): Date => {
  const wallClock = meta.startTimeLocalIso ? WALL_CLOCK.exec(meta.startTimeLocalIso)?.[0] : undefined
  return new Date(wallClock ? `${wallClock}Z` : meta.startTimeIso)
}

const dayKey = (d: Date): string => d.toISOString().slice(0, 10)

const matches = (summary: ActivitySummary, filter?: RollupFilter): boolean =>
  filter?.activityType === undefined || summary.activity.type === filter.activityType

export const emptyRollup = (): RollupAccumulator => ({
  activityIds: [],
  firstStartIso: null,
  lastStartIso: null,
  distanceM: 0,
  elapsedSec: 0,
  movingTimeSec: 0,
  elevationGainM: 0,
  trainingLoad: 0,
  heartRate: { sum: 0, weight: 0 },
  power: { sum: 0, weight: 0 },
  maxHeartRate: null,
  maxPower: null,
  zones: { heartRate: {}, power: {} },
  dailyLoad: {},
})

const zonesOf = (result: ZoneResult): Record<string, RollupZone> => {
  const out: Record<string, RollupZone> = {}
  if (result.status !== 'available') return out
  for (const z of result.zones) out[z.name] = { min: z.min, max: z.max, seconds: z.seconds }
  return out
}

const weighted = (value: number | null, weight: number): WeightedSum =>
  value === null ? { sum: 0, weight: 0 } : { sum: value * weight, weight }

const dailyLoadOf = (summary: ActivitySummary): Record<string, number> => {
  const start = calendarStartOf(summary.activity)
  return Number.isFinite(start.getTime()) ? { [dayKey(start)]: summary.trainingLoad ?? 0 } : {}
}

export const summaryToRollup = (summary: ActivitySummary): RollupAccumulator => ({
  activityIds: [summary.activity.id],
  firstStartIso: summary.activity.startTimeIso,
  lastStartIso: summary.activity.startTimeIso,
  distanceM: summary.distanceM ?? 0,
  elapsedSec: summary.elapsedSec,
  movingTimeSec: summary.movingTimeSec,
  elevationGainM: summary.elevation?.gainM ?? 0,
  trainingLoad: summary.trainingLoad ?? 0,
  heartRate: weighted(summary.avgHeartRate, summary.movingTimeSec),
  power: weighted(summary.power?.avgPower ?? null, summary.movingTimeSec),
  maxHeartRate: summary.maxHeartRate,
  maxPower: summary.power?.maxPower ?? null,
  zones: {
    heartRate: zonesOf(summary.zones.heartRate),
    power: zonesOf(summary.zones.power),
  },
  dailyLoad: dailyLoadOf(summary),
})

const maxNullable = (a: number | null, b: number | null): number | null =>
  a === null ? b : b === null ? a : Math.max(a, b)

// by instant, then by text so that equal instants still pick the same string
const compareIso = (a: string, b: string): number =>
  Date.parse(a) - Date.parse(b) || (a < b ? -1 : a > b ? 1 : 0)

const earliestIso = (a: string | null, b: string | null): string | null =>
  a === null ? b : b === null ? a : compareIso(a, b) <= 0 ? a : b

const latestIso = (a: string | null, b: string | null): string | null =>
  a === null ? b : b === null ? a : compareIso(a, b) >= 0 ? a : b

const mergeZones = (
  a: Record<string, RollupZone>,
  b: Record<string, RollupZone>,
): Record<string, RollupZone> => {
  const out: Record<string, RollupZone> = { ...a }
  for (const [name, zone] of Object.entries(b)) {
    const prev = out[name]
    out[name] = prev
      ? {
          min: Math.min(prev.min, zone.min),
          max: Math.max(prev.max, zone.max),
          seconds: prev.seconds + zone.seconds,
        }
      : { ...zone }
  }
  return out
}

const mergeDailyLoad = (a: Record<string, number>, b: Record<string, number>): Record<string, number> => {
  const out: Record<string, number> = { ...a }
  for (const [day, load] of Object.entries(b)) out[day] = (out[day] ?? 0) + load
  return out
}

/** Commutative and associative; `emptyRollup()` is the identity. */
export const combineRollups = (a: RollupAccumulator, b: RollupAccumulator): RollupAccumulator => ({
  activityIds: [...a.activityIds, ...b.activityIds].sort(),
  firstStartIso: earliestIso(a.firstStartIso, b.firstStartIso),
  lastStartIso: latestIso(a.lastStartIso, b.lastStartIso),
  distanceM: a.distanceM + b.distanceM,
  elapsedSec: a.elapsedSec + b.elapsedSec,
  movingTimeSec: a.movingTimeSec + b.movingTimeSec,
  elevationGainM: a.elevationGainM + b.elevationGainM,
  trainingLoad: a.trainingLoad + b.trainingLoad,
  heartRate: { sum: a.heartRate.sum + b.heartRate.sum, weight: a.heartRate.weight + b.heartRate.weight },
  power: { sum: a.power.sum + b.power.sum, weight: a.power.weight + b.power.weight },
  maxHeartRate: maxNullable(a.maxHeartRate, b.maxHeartRate),
  maxPower: maxNullable(a.maxPower, b.maxPower),
  zones: {
    heartRate: mergeZones(a.zones.heartRate, b.zones.heartRate),
    power: mergeZones(a.zones.power, b.zones.power),
  },
  dailyLoad: mergeDailyLoad(a.dailyLoad, b.dailyLoad),
})

const finalizeZones = (kind: ZoneKind, zones: Record<string, RollupZone>): ZoneResult => {
  const entries = Object.entries(zones)
  if (entries.length === 0) return { status: 'unavailable', kind, reason: 'metric-absent' }

  entries.sort(([na, a], [nb, b]) => a.min - b.min || (na < nb ? -1 : na > nb ? 1 : 0))
  const totalSec = entries.reduce((s, [, z]) => s + z.seconds, 0)
  const shares: ZoneShare[] = entries.map(([name, z]) => ({
    name,
    min: z.min,
    max: z.max,
    seconds: z.seconds,
    percentage: totalSec > 0 ? (z.seconds / totalSec) * 100 : 0,
  }))

  return { status: 'available', kind, zones: shares, totalSec, unclassifiedSec: 0 }
}

/** Every day from the first to the last day with an activity; days without one load 0. */
export const dailyLoadSeries = (days: Record<string, number>): DailyLoad[] => {
  const keys = Object.keys(days).sort()
  const first = keys[0]
  const last = keys[keys.length - 1]
  if (first === undefined || last === undefined) return []

  const series: DailyLoad[] = []
  const loads: number[] = []
  const end = Date.parse(`${last}T00:00:00.000Z`)
  for (let t = Date.parse(`${first}T00:00:00.000Z`); t <= end; t += DAY_MS) {
    const date = dayKey(new Date(t))
    const load = days[date] ?? 0
    loads.push(load)
    const recent = loads.slice(-ROLLING_DAYS)
    series.push({
      date,
      load,
      rollingMean7: recent.length === ROLLING_DAYS ? recent.reduce((s, v) => s + v, 0) / ROLLING_DAYS : null,
    })
  }
  return series
}

const weightedMean = (w: WeightedSum): number | null => (w.weight > 0 ? w.sum / w.weight : null)

export const finalizeRollup = (acc: RollupAccumulator, window?: PeriodWindow): PeriodRollup => ({
  period: {
    from: window?.fromIso ?? acc.firstStartIso,
    to: window?.toIso ?? acc.lastStartIso,
  },
  activityIds: acc.activityIds,
  activityCount: acc.activityIds.length,
  distanceM: acc.distanceM,
  elapsedSec: acc.elapsedSec,
  movingTimeSec: acc.movingTimeSec,
  elevationGainM: acc.elevationGainM,
  trainingLoad: acc.trainingLoad,
  avgHeartRate: weightedMean(acc.heartRate),
  avgPower: weightedMean(acc.power),
  maxHeartRate: acc.maxHeartRate,
  maxPower: acc.maxPower,
  zones: {
    heartRate: finalizeZones('heartRate', acc.zones.heartRate),
    power: finalizeZones('power', acc.zones.power),
  },
  dailyLoad: dailyLoadSeries(acc.dailyLoad),
})

const fold = (summaries: ReadonlyArray<ActivitySummary>): RollupAccumulator =>
  summaries.map(summaryToRollup).reduce(combineRollups, emptyRollup())

/**
 * Folds the summaries that started inside `[from, to)`, or all of them without a window,
 * keeping only the activity type named by `filter`.
 */
export const rollupSummaries = (
  summaries: ReadonlyArray<ActivitySummary>,
  window?: PeriodWindow,
  filter?: RollupFilter,
): PeriodRollup => {
  const from = window ? Date.parse(window.fromIso) : Number.NEGATIVE_INFINITY
  const to = window ? Date.parse(window.toIso) : Number.POSITIVE_INFINITY

  const inside = summaries.filter((s) => {
    const t = Date.parse(s.activity.startTimeIso)
    return Number.isFinite(t) && t >= from && t < to && matches(s, filter)
  })

  return finalizeRollup(fold(inside), window)
}

export const isoWeekKey = (d: Date): string => {
  const date = new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()))
  const day = date.getUTCDay() || 7
  date.setUTCDate(date.getUTCDate() + 4 - day)
  const yearStart = new Date(Date.UTC(date.getUTCFullYear(), 0, 1))
  const weekNo = Math.ceil(((date.getTime() - yearStart.getTime()) / DAY_MS + 1) / 7)
  return `${date.getUTCFullYear()}-W${String(weekNo).padStart(2, '0')}`
}

/** Monday 00:00 UTC of the ISO week containing `d` */
export const isoWeekStart = (d: Date): Date => {
  const date = new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()))
  const day = date.getUTCDay() || 7
  date.setUTCDate(date.getUTCDate() - (day - 1))
  return date
}

/** Buckets by the ISO week of each activity's local start; week bounds are local wall-clock times. */
export const rollupByWeek = (
  summaries: ReadonlyArray<ActivitySummary>,
  filter?: RollupFilter,
): Record<string, PeriodRollup> => {
  const weeks = new Map<string, { start: Date; items: ActivitySummary[] }>()
  for (const s of summaries) {
    if (!matches(s, filter)) continue
    const startedAt = calendarStartOf(s.activity)
    if (!Number.isFinite(startedAt.getTime())) continue
    const key = isoWeekKey(startedAt)
    const bucket = weeks.get(key) ?? { start: isoWeekStart(startedAt), items: [] }
    bucket.items.push(s)
    weeks.set(key, bucket)
  }

  const out: Record<string, PeriodRollup> = {}
  const sorted = [...weeks.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  for (const [key, { start, items }] of sorted) {
    out[key] = finalizeRollup(fold(items), {
      fromIso: start.toISOString(),
      toIso: new Date(start.getTime() + 7 * DAY_MS).toISOString(),
    })
  }
  return out
}
