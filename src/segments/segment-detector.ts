import { Logger } from '@nestjs/common'
import type { ActivityStream } from '../types/stream.types'
import { mean } from '../utils/series'
import { computeSegmentMetrics } from './segment-metrics'
import { gradeSignal, intensitySignal, smoothCentered } from './segment-signals'
import type {
  ClassifiedRun,
  Segment,
  SegmentDetection,
  SegmentDetectorConfig,
  SegmentKind,
  TriggerRun,
} from './segments.types'

const logger = new Logger('SegmentDetector')

type Triggers = { climbing: boolean[]; effort: boolean[] }

export const evaluateTriggers = (
  grade: ReadonlyArray<number | null>,
  intensity: ReadonlyArray<number | null>,
  gradeThreshold: number,
  intensityThreshold: number,
): Triggers => ({
  climbing: grade.map((g) => g !== null && g > gradeThreshold),
  effort: intensity.map((x) => x !== null && x > intensityThreshold),
})

/** Maximal runs of consecutive samples where at least one trigger holds. */
export const collectRuns = ({ climbing, effort }: Triggers): TriggerRun[] => {
  const runs: TriggerRun[] = []
  let current: TriggerRun | null = null

  for (let i = 0; i < climbing.length; i++) {
    const c = climbing[i] === true
    const e = effort[i] === true
    if (!c && !e) {
      current = null
      continue
    }
    if (!current) {
      current = { start: i, end: i, climbCount: 0, effortCount: 0, bothCount: 0 }
      runs.push(current)
    }
    current.end = i
    if (c) current.climbCount++
    if (e) current.effortCount++
    if (c && e) current.bothCount++
  }

  return runs
}

const relativeMargin = (avg: number | null, threshold: number): number => {
  if (avg === null) return Number.NEGATIVE_INFINITY
  return threshold === 0 ? avg - threshold : (avg - threshold) / Math.abs(threshold)
}

/**
 * A run where both triggers hold for most samples goes to the signal that clears its
 * threshold by the larger relative margin (exact tie: climb). Otherwise the trigger with
 * more samples decides, and equal counts fall back to the margin rule.
 */
export const classifyRun = (
  run: TriggerRun,
  smoothedGrade: ReadonlyArray<number | null>,
  smoothedIntensity: ReadonlyArray<number | null>,
  gradeThreshold: number,
  intensityThreshold: number,
): SegmentKind => {
  const length = run.end - run.start + 1
  const byMargin = (): SegmentKind => {
    const gradeAvg = mean(smoothedGrade.slice(run.start, run.end + 1))
    const intensityAvg = mean(smoothedIntensity.slice(run.start, run.end + 1))
    const climbMargin = relativeMargin(gradeAvg, gradeThreshold)
    const effortMargin = relativeMargin(intensityAvg, intensityThreshold)
    return effortMargin > climbMargin ? 'effort' : 'climb'
  }

  if (run.bothCount * 2 > length) return byMargin()
  if (run.climbCount > run.effortCount) return 'climb'
  if (run.effortCount > run.climbCount) return 'effort'
  return byMargin()
}

/** Dip between two runs: from the first sample after `prev` to the first sample of `next`. */
export const dipSec = (prev: TriggerRun, next: TriggerRun, times: ReadonlyArray<number>): number =>
  times[next.start]! - times[prev.end + 1]!

// latest run of the same kind, looking back only past runs that will be discarded anyway
const mergeTarget = (
  merged: ReadonlyArray<ClassifiedRun>,
  run: ClassifiedRun,
  isDiscarded: (run: ClassifiedRun) => boolean,
): number => {
  for (let i = merged.length - 1; i >= 0; i--) {
    const candidate = merged[i]!
    if (candidate.kind === run.kind) return i
    if (!isDiscarded(candidate)) return -1
  }
  return -1
}

/**
 * Joins a run into the previous run of its kind when the dip between them is at most
 * `mergeGapSec`. Runs of the other kind inside the dip only block the merge when they
 * survive `isDiscarded`.
 */
export const mergeRuns = (
  runs: ReadonlyArray<ClassifiedRun>,
  times: ReadonlyArray<number>,
  mergeGapSec: number,
  isDiscarded: (run: ClassifiedRun) => boolean = () => false,
): ClassifiedRun[] => {
  const merged: ClassifiedRun[] = []
  for (const run of runs) {
    const target = mergeTarget(merged, run, isDiscarded)
    const prev = target >= 0 ? merged[target] : undefined
    if (prev && dipSec(prev, run, times) <= mergeGapSec) {
      merged[target] = {
        ...prev,
        end: run.end,
        climbCount: prev.climbCount + run.climbCount,
        effortCount: prev.effortCount + run.effortCount,
        bothCount: prev.bothCount + run.bothCount,
      }
    } else {
      merged.push({ ...run })
    }
  }
  return merged
}

export const runDurationSec = (
  run: Pick<TriggerRun, 'start' | 'end'>,
  times: ReadonlyArray<number>,
  intervalSec: number,
): number => times[run.end]! - times[run.start]! + intervalSec

/**
 * Drops (and logs) segments that break the detector's output contract: end before start,
 * shorter than the minimum, or overlapping the previous segment of the same kind.
 */
export const checkSegmentInvariants = (segments: ReadonlyArray<Segment>, minDurationSec: number): Segment[] => {
  const kept: Segment[] = []
  const lastEnd = new Map<SegmentKind, number>()

  for (const seg of [...segments].sort((a, b) => a.startIndex - b.startIndex)) {
    let problem: string | null = null
    if (seg.endIndex < seg.startIndex) {
      problem = `end ${seg.endIndex} before start ${seg.startIndex}`
    } else if (seg.durationSec < minDurationSec) {
      problem = `duration ${seg.durationSec}s under minimum ${minDurationSec}s`
    } else if ((lastEnd.get(seg.kind) ?? -1) >= seg.startIndex) {
      problem = `overlaps previous ${seg.kind} segment ending at ${lastEnd.get(seg.kind)}`
    }

    if (problem) {
      logger.error(`Dropping ${seg.kind} segment [${seg.startIndex}, ${seg.endIndex}]: ${problem}`)
      continue
    }
    lastEnd.set(seg.kind, seg.endIndex)
    kept.push(seg)
  }

  return kept
}

export const detectSegments = (stream: ActivityStream, config: SegmentDetectorConfig): SegmentDetection => {
  const grade = gradeSignal(stream)
  const intensity = intensitySignal(stream, config.effortThresholds)
  const times = stream.samples.map((s) => s.time)

  const smoothedGrade = smoothCentered(grade.values, config.smoothingWindow)
  const smoothedIntensity = smoothCentered(intensity.values, config.smoothingWindow)

  const triggers = evaluateTriggers(
    smoothedGrade,
    smoothedIntensity,
    config.gradeThresholdPct,
    intensity.threshold,
  )

  const classified: ClassifiedRun[] = collectRuns(triggers).map((run) => ({
    ...run,
    kind: classifyRun(run, smoothedGrade, smoothedIntensity, config.gradeThresholdPct, intensity.threshold),
  }))

  const tooShort = (run: ClassifiedRun) =>
    runDurationSec(run, times, stream.sampleIntervalSec) < config.minSegmentDurationSec
  const retained = mergeRuns(classified, times, config.mergeGapSec, tooShort).filter((run) => !tooShort(run))

  const segments = retained.map((run) => computeSegmentMetrics(stream, run, grade.values))

  return {
    segments: checkSegmentInvariants(segments, config.minSegmentDurationSec),
    gradeSource: grade.source,
    intensitySource: intensity.source,
  }
}
