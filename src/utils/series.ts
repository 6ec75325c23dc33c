export const present = (values: ReadonlyArray<number | null>): number[] =>
  values.filter((v): v is number => v !== null)

export const mean = (values: ReadonlyArray<number | null>): number | null => {
  const xs = present(values)
  return xs.length > 0 ? xs.reduce((s, v) => s + v, 0) / xs.length : null
}

export const maxOf = (values: ReadonlyArray<number | null>): number | null => {
  const xs = present(values)
  return xs.length > 0 ? xs.reduce((m, v) => (v > m ? v : m), xs[0]!) : null
}

export const minOf = (values: ReadonlyArray<number | null>): number | null => {
  const xs = present(values)
  return xs.length > 0 ? xs.reduce((m, v) => (v < m ? v : m), xs[0]!) : null
}

/** Sums rises and drops between consecutive present values; nulls are skipped over. */
export const deltaTotals = (values: ReadonlyArray<number | null>): { gain: number; loss: number } => {
  let gain = 0
  let loss = 0
  let prev: number | null = null
  for (const v of values) {
    if (v === null) continue
    if (prev !== null) {
      const d = v - prev
      if (d > 0) gain += d
      else loss -= d
    }
    prev = v
  }
  return { gain, loss }
}

/** Best mean over any `window` consecutive values, or null when there are fewer values. */
export const bestRollingMean = (values: ReadonlyArray<number>, window: number): number | null => {
  if (window < 1 || values.length < window) return null
  let sum = 0
  for (let i = 0; i < window; i++) sum += values[i]!
  let best = sum
  for (let i = window; i < values.length; i++) {
    sum += values[i]! - values[i - window]!
    if (sum > best) best = sum
  }
  return best / window
}

/** Means of every full window of consecutive values ("valid" convolution). */
export const rollingMeans = (values: ReadonlyArray<number>, window: number): number[] => {
  if (window < 1 || values.length < window) return []
  const out: number[] = []
  let sum = 0
  for (let i = 0; i < values.length; i++) {
    sum += values[i]!
    if (i >= window) sum -= values[i - window]!
    if (i >= window - 1) out.push(sum / window)
  }
  return out
}
