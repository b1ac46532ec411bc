// ---------------------------------------------------------------------------
// @order-filter/rank-filter: Shared Types
// ---------------------------------------------------------------------------

/** Seedable PRNG function returning values in [0, 1). */
export type PRNG = () => number;

/** Any read-only numeric sequence: `number[]`, `Float64Array`, etc. */
export type Signal = ArrayLike<number>;

// ---------------------------------------------------------------------------
// Modes
// ---------------------------------------------------------------------------

export const EDGE_MODES = ['constant', 'nearest', 'reflect', 'mirror', 'wrap'] as const;

/** How samples outside the signal are synthesised. */
export type EdgeMode = (typeof EDGE_MODES)[number];

export const TRUNCATE_MODES = ['valid', 'same', 'full'] as const;

/**
 * Output length policy:
 * - `valid`: n − w, no edge extension
 * - `same`:  n
 * - `full`:  n + w − 1, every window overlapping the signal
 */
export type TruncateMode = (typeof TRUNCATE_MODES)[number];

// ---------------------------------------------------------------------------
// Filter options
// ---------------------------------------------------------------------------

export interface RankFilterOptions {
  /** Rank inside the sorted window (0 = min, w−1 = max). Overrides `percent`. */
  index?: number;
  /** Fractional rank in [0, 1]. Default 0.5 (median). */
  percent?: number;
  /** Caller-owned result buffer; must match the output length exactly. */
  output?: Float64Array;
  edgeMode?: EdgeMode;
  truncateMode?: TruncateMode;
  /** Padding value for `edgeMode: 'constant'`. Default 0. */
  constantValue?: number;
  /** Seed for the store's treap priorities. */
  seed?: number;
}

/** Options after defaults are applied and `index` is folded into `percent`. */
export interface ResolvedFilterOptions {
  percent: number;
  /** Rank selected from each sorted window: `index` itself, or `floor(w × percent)`. */
  rank: number;
  edgeMode: EdgeMode;
  truncateMode: TruncateMode;
  constantValue: number;
  seed: number;
}

/** Padding block sizes on each side of the signal. */
export interface EdgePadding {
  front: number;
  back: number;
}

// ---------------------------------------------------------------------------
// PRNG (xorshift128+ variant)
// ---------------------------------------------------------------------------

/** Priorities for the store's treap nodes; a fixed seed gives a fixed tree shape. */
export function createPRNG(seed: number): PRNG {
  let s0 = seed | 0 || 1;
  let s1 = (seed >>> 16) ^ 0x5DEECE66D;
  if (s1 === 0) s1 = 0xDEADBEEF;
  return () => {
    let x = s0;
    const y = s1;
    s0 = y;
    x ^= x << 23;
    x ^= x >> 17;
    x ^= y;
    x ^= y >> 26;
    s1 = x;
    return ((s0 + s1) >>> 0) / 0x100000000;
  };
}
