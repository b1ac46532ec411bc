import { RankFilterError } from '@order-filter/rank-filter'
import { loadEnv } from './lib/env.js'
import { createLogger } from './lib/logger.js'
import { runBenchmark } from './run.js'

const env = loadEnv()
const logger = createLogger(env.LOG_LEVEL)

try {
  const report = runBenchmark(env, logger)
  process.exitCode = report.ok ? 0 : 1
} catch (err) {
  logger.error('benchmark.failed', {
    error: err instanceof Error ? err.message : String(err),
    kind: err instanceof RankFilterError ? err.name : 'unexpected',
    stack: err instanceof RankFilterError || !(err instanceof Error) ? undefined : err.stack,
  })
  process.exitCode = 1
}
