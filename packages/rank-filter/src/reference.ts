// ---------------------------------------------------------------------------
// Reference Rank Filter
// ---------------------------------------------------------------------------
// Brute force: copy and sort every window. O(N·w log w).
// Same working buffers and rank rule as rankFilter, so the two must agree
// sample for sample; used as the oracle in tests and benchmarks.

import type { RankFilterOptions, Signal } from './types.js';
import { validateSignal } from './filter.js';
import { resolveOptions } from './options.js';
import { extendEdges, extendEdgesBy } from './edges/extend.js';
import { outputLength, prepareOutput } from './output.js';

export function referenceRankFilter(
  signal: Signal,
  windowSize: number,
  options?: RankFilterOptions,
): Float64Array {
  validateSignal(signal, windowSize);
  const { rank, output, edgeMode, truncateMode, constantValue } = resolveOptions(options, windowSize);

  const n = signal.length;
  const out = prepareOutput(output, outputLength(n, windowSize, truncateMode));
  const x =
    truncateMode === 'valid' ? Float64Array.from(signal)
    : truncateMode === 'same' ? extendEdges(signal, windowSize, edgeMode, constantValue)
    : extendEdgesBy(signal, windowSize - 1, windowSize, edgeMode, constantValue);

  for (let j = 0; j < out.length; j++) {
    const sorted = x.slice(j, j + windowSize).sort();
    out[j] = sorted[rank]!;
  }
  return out;
}
