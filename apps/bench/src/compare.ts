/**
 * Benchmark: treap-backed rank filter vs re-sorting every window.
 *
 * Measures:
 * - wall time of both implementations over the same signal and options
 * - total absolute difference between their outputs (expected 0)
 */

import { rankFilter, referenceRankFilter } from '@order-filter/rank-filter'
import type { RankFilterOptions, Signal } from '@order-filter/rank-filter'

export interface CompareConfig {
  windowSize: number
  options: Omit<RankFilterOptions, 'output'>
  /** Runs per implementation; the fastest is kept. */
  repeats?: number
}

export interface TimingResult {
  referenceMs: number
  rankFilterMs: number
  /** referenceMs / rankFilterMs */
  speedup: number
}

export interface ResultComparison {
  totalAbsDiff: number
  /** Positions where the outputs differ. */
  mismatches: number
  length: number
}

function fastest(repeats: number, run: () => void): number {
  let best = Infinity
  for (let r = 0; r < repeats; r++) {
    const start = performance.now()
    run()
    best = Math.min(best, performance.now() - start)
  }
  return best
}

export function compareTimes(signal: Signal, config: CompareConfig): TimingResult {
  const repeats = config.repeats ?? 1
  const referenceMs = fastest(repeats, () => {
    referenceRankFilter(signal, config.windowSize, config.options)
  })
  const rankFilterMs = fastest(repeats, () => {
    rankFilter(signal, config.windowSize, config.options)
  })
  return {
    referenceMs,
    rankFilterMs,
    speedup: rankFilterMs > 0 ? referenceMs / rankFilterMs : Infinity,
  }
}

export function compareResults(signal: Signal, config: CompareConfig): ResultComparison {
  const expected = referenceRankFilter(signal, config.windowSize, config.options)
  const actual = rankFilter(signal, config.windowSize, config.options)

  let totalAbsDiff = 0
  let mismatches = 0
  for (let i = 0; i < actual.length; i++) {
    const diff = Math.abs(actual[i]! - expected[i]!)
    if (diff !== 0) {
      totalAbsDiff += diff
      mismatches++
    }
  }
  return { totalAbsDiff, mismatches, length: actual.length }
}
