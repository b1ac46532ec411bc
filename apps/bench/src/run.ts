import type { BenchEnv } from './lib/env.js'
import type { Logger } from './lib/logger.js'
import { gaussianSignal } from './signal.js'
import { compareResults, compareTimes } from './compare.js'
import type { CompareConfig, ResultComparison, TimingResult } from './compare.js'

export interface BenchmarkReport {
  timing: TimingResult
  results: ResultComparison
  /** True when both implementations produced identical output. */
  ok: boolean
}

export function runBenchmark(env: BenchEnv, logger: Logger): BenchmarkReport {
  const signal = gaussianSignal(env.BENCH_SIGNAL_LENGTH, env.BENCH_SEED)
  const config: CompareConfig = {
    windowSize: env.BENCH_WINDOW_SIZE,
    repeats: env.BENCH_REPEATS,
    options: {
      percent: env.BENCH_PERCENT,
      edgeMode: env.BENCH_EDGE_MODE,
      truncateMode: env.BENCH_TRUNCATE_MODE,
      constantValue: env.BENCH_CONSTANT_VALUE,
    },
  }

  logger.info('benchmark.start', {
    signalLength: signal.length,
    windowSize: config.windowSize,
    ...config.options,
    repeats: env.BENCH_REPEATS,
  })

  const timing = compareTimes(signal, config)
  logger.info('benchmark.timing', {
    referenceMs: Number(timing.referenceMs.toFixed(1)),
    rankFilterMs: Number(timing.rankFilterMs.toFixed(1)),
    speedup: Number(timing.speedup.toFixed(2)),
  })

  const results = compareResults(signal, config)
  const ok = results.mismatches === 0
  if (ok) {
    logger.info('benchmark.results', { ...results })
  } else {
    logger.error('benchmark.results', { ...results })
  }
  logger.debug('benchmark.done', { ok })

  return { timing, results, ok }
}
