import { createPRNG } from '@order-filter/rank-filter'
import type { PRNG } from '@order-filter/rank-filter'

/** Box-Muller Gaussian noise. */
function gaussianNoise(rng: PRNG): number {
  const u1 = Math.max(1e-10, rng())
  const u2 = rng()
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2)
}

/** `length` samples of N(0, 1) noise, reproducible from `seed`. */
export function gaussianSignal(length: number, seed: number): Float64Array {
  const rng = createPRNG(seed)
  const x = new Float64Array(length)
  for (let i = 0; i < length; i++) x[i] = gaussianNoise(rng)
  return x
}
