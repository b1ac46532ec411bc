// ---------------------------------------------------------------------------
// Rank Filter: sliding-window order statistic
// ---------------------------------------------------------------------------
// Generalises the median filter to any rank: min (index 0), max (index w−1),
// median (percent 0.5) or any percentile. One left-to-right pass keeps the
// current window in an OrderStatisticStore, so each step costs O(log w)
// instead of re-sorting the window.

import type { RankFilterOptions, Signal } from './types.js';
import { LengthError, InvalidSignalError, WindowAccountingError } from './errors.js';
import { resolveOptions } from './options.js';
import { extendEdges, extendEdgesBy } from './edges/extend.js';
import { outputLength, prepareOutput } from './output.js';
import { OrderStatisticStore } from './store/order-statistic-store.js';

/** Throws when `signal` cannot be filtered with a window of `windowSize`. */
export function validateSignal(signal: Signal, windowSize: number): void {
  const n = signal.length;
  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new LengthError(n, windowSize, `Window size must be a positive integer, got ${windowSize}`);
  }
  if (n < windowSize) throw new LengthError(n, windowSize);
  for (let i = 0; i < n; i++) {
    if (Number.isNaN(signal[i])) throw new InvalidSignalError(i);
  }
}

/**
 * Slide a window of `windowSize` over `x`, writing into `out[j]` the value at
 * `rank` of sorted `x[j .. j + windowSize − 1]` for every `j < x.length − windowSize`.
 *
 * The newest sample is admitted only after selection, so the final sample
 * of `x` is never part of a selected window.
 */
export function slide(
  x: Signal,
  windowSize: number,
  rank: number,
  out: Float64Array,
  store: OrderStatisticStore = new OrderStatisticStore(),
): Float64Array {
  const m = x.length;
  for (let i = 0; i < m; i++) {
    if (i >= windowSize) {
      out[i - windowSize] = store.selectRank(rank);
      const leaving = x[i - windowSize]!;
      if (!store.remove(leaving)) throw new WindowAccountingError(leaving, i - windowSize);
    }
    store.add(x[i]!);
  }
  return out;
}

/**
 * Sliding-window order-statistic filter over a 1-D signal.
 *
 * Output length by `truncateMode`:
 * - `valid`: n − w, read from the signal alone
 * - `same`:  n, each output centred on its input sample
 * - `full`:  n + w − 1, one output per window overlapping the signal
 *
 * All parameters are checked before anything is written, so a failing call
 * leaves a caller-supplied `output` untouched.
 *
 * @example
 * rankFilter([1, 2, 3, 4, 5, 6], 4);                 // [1, 2, 3, 4, 5, 5]
 * rankFilter([5, 3, 8, 1, 9, 2], 3, { index: 1, truncateMode: 'valid' }); // [5, 3, 8]
 */
export function rankFilter(
  signal: Signal,
  windowSize: number,
  options?: RankFilterOptions,
): Float64Array {
  validateSignal(signal, windowSize);
  const { rank, output, edgeMode, truncateMode, constantValue, seed } =
    resolveOptions(options, windowSize);

  const n = signal.length;
  const out = prepareOutput(output, outputLength(n, windowSize, truncateMode));
  const store = new OrderStatisticStore(seed);

  switch (truncateMode) {
    case 'valid':
      return slide(signal, windowSize, rank, out, store);
    case 'same':
      return slide(extendEdges(signal, windowSize, edgeMode, constantValue), windowSize, rank, out, store);
    case 'full':
      return slide(
        extendEdgesBy(signal, windowSize - 1, windowSize, edgeMode, constantValue),
        windowSize,
        rank,
        out,
        store,
      );
  }
}

/** Median filter: `percent = 0.5`. */
export function medianFilter(
  signal: Signal,
  windowSize: number,
  options?: Omit<RankFilterOptions, 'index' | 'percent'>,
): Float64Array {
  return rankFilter(signal, windowSize, { ...options, percent: 0.5 });
}

/** Minimum filter: rank 0. */
export function minimumFilter(
  signal: Signal,
  windowSize: number,
  options?: Omit<RankFilterOptions, 'index' | 'percent'>,
): Float64Array {
  return rankFilter(signal, windowSize, { ...options, index: 0 });
}

/** Maximum filter: rank w − 1. */
export function maximumFilter(
  signal: Signal,
  windowSize: number,
  options?: Omit<RankFilterOptions, 'index' | 'percent'>,
): Float64Array {
  return rankFilter(signal, windowSize, { ...options, index: windowSize - 1 });
}

export function percentileFilter(
  signal: Signal,
  windowSize: number,
  percent: number,
  options?: Omit<RankFilterOptions, 'index' | 'percent'>,
): Float64Array {
  return rankFilter(signal, windowSize, { ...options, percent });
}
