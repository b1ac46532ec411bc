/**
 * Benchmark configuration from environment variables, fail-fast on startup.
 *
 * Every variable is optional; a value that does not parse throws immediately
 * with the variable name rather than running a meaningless benchmark.
 */

import { z } from 'zod'
import { EDGE_MODES, TRUNCATE_MODES } from '@order-filter/rank-filter'

type Source = Record<string, string | undefined>

function optional(source: Source, key: string, fallback: string): string {
  const val = source[key]
  return val === undefined || val === '' ? fallback : val
}

const envSchema = z.object({
  BENCH_SIGNAL_LENGTH: z.coerce.number().int().positive(),
  BENCH_WINDOW_SIZE: z.coerce.number().int().positive(),
  BENCH_PERCENT: z.coerce.number().min(0).max(1),
  BENCH_EDGE_MODE: z.enum(EDGE_MODES),
  BENCH_TRUNCATE_MODE: z.enum(TRUNCATE_MODES),
  BENCH_CONSTANT_VALUE: z.coerce.number(),
  BENCH_SEED: z.coerce.number().int(),
  BENCH_REPEATS: z.coerce.number().int().positive(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']),
})

export type BenchEnv = z.infer<typeof envSchema>

export function loadEnv(source: Source = process.env): BenchEnv {
  const result = envSchema.safeParse({
    BENCH_SIGNAL_LENGTH: optional(source, 'BENCH_SIGNAL_LENGTH', '4096'),
    BENCH_WINDOW_SIZE: optional(source, 'BENCH_WINDOW_SIZE', '4096'),
    BENCH_PERCENT: optional(source, 'BENCH_PERCENT', '0.5'),
    BENCH_EDGE_MODE: optional(source, 'BENCH_EDGE_MODE', 'wrap'),
    BENCH_TRUNCATE_MODE: optional(source, 'BENCH_TRUNCATE_MODE', 'same'),
    BENCH_CONSTANT_VALUE: optional(source, 'BENCH_CONSTANT_VALUE', '0'),
    BENCH_SEED: optional(source, 'BENCH_SEED', '1'),
    BENCH_REPEATS: optional(source, 'BENCH_REPEATS', '1'),
    LOG_LEVEL: optional(source, 'LOG_LEVEL', 'info'),
  })

  if (!result.success) {
    const issue = result.error.issues[0]
    const key = String(issue?.path[0] ?? 'environment')
    throw new Error(
      `Invalid environment variable: ${key} (${issue?.message ?? 'unparseable'}). ` +
      `Fix it in .env or the shell running the benchmark.`,
    )
  }

  const env = result.data
  // The window cannot outgrow the signal it slides over.
  return { ...env, BENCH_WINDOW_SIZE: Math.min(env.BENCH_WINDOW_SIZE, env.BENCH_SIGNAL_LENGTH) }
}
