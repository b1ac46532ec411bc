import { describe, it, expect } from 'vitest'
import { compareResults, compareTimes } from '../compare.js'
import { gaussianSignal } from '../signal.js'
import { runBenchmark } from '../run.js'
import { loadEnv } from '../lib/env.js'
import { createLogger } from '../lib/logger.js'

describe('gaussianSignal', () => {
  it('is reproducible from its seed', () => {
    expect(Array.from(gaussianSignal(16, 7))).toEqual(Array.from(gaussianSignal(16, 7)))
    expect(gaussianSignal(16, 7)).toHaveLength(16)
  })
})

describe('compareResults', () => {
  it('finds no difference from the reference', () => {
    const signal = gaussianSignal(200, 3)
    for (const edgeMode of ['constant', 'nearest', 'reflect', 'mirror', 'wrap'] as const) {
      const result = compareResults(signal, { windowSize: 17, options: { edgeMode, percent: 0.3 } })
      expect(result).toEqual({ totalAbsDiff: 0, mismatches: 0, length: 200 })
    }
  })

  it('reports the output length of the truncation mode', () => {
    const signal = gaussianSignal(50, 1)
    expect(compareResults(signal, { windowSize: 10, options: { truncateMode: 'full' } }).length).toBe(59)
  })
})

describe('compareTimes', () => {
  it('times both implementations', () => {
    const timing = compareTimes(gaussianSignal(256, 5), { windowSize: 32, options: {}, repeats: 2 })
    expect(timing.referenceMs).toBeGreaterThanOrEqual(0)
    expect(timing.rankFilterMs).toBeGreaterThanOrEqual(0)
    expect(Number.isNaN(timing.speedup)).toBe(false)
  })
})

describe('runBenchmark', () => {
  it('logs start, timing and results and reports agreement', () => {
    const lines: string[] = []
    const logger = createLogger('info', (_level, line) => void lines.push(line))
    const env = loadEnv({ BENCH_SIGNAL_LENGTH: '64', BENCH_WINDOW_SIZE: '8' })

    const report = runBenchmark(env, logger)

    expect(report.ok).toBe(true)
    expect(report.results.length).toBe(64)
    expect(lines.map(line => JSON.parse(line).msg)).toEqual([
      'benchmark.start',
      'benchmark.timing',
      'benchmark.results',
    ])
  })
})
