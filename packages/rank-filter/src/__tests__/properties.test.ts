/**
 * Property-based tests: the sliding pass against brute-force sorting.
 */

import { describe, test, expect } from 'vitest';
import fc from 'fast-check';
import { rankFilter } from '../filter.js';
import { referenceRankFilter } from '../reference.js';
import { outputLength } from '../output.js';
import { EDGE_MODES, TRUNCATE_MODES } from '../types.js';

// ─── Arbitrary Generators ──────────────────────────────────────────────────

/** Small integers so windows hold plenty of duplicates. */
const arbitrarySignal = fc.array(fc.integer({ min: -20, max: 20 }), { minLength: 1, maxLength: 40 });

/** A signal together with a window size that fits it. */
const arbitrarySignalAndWindow = arbitrarySignal.chain(signal =>
  fc.tuple(fc.constant(signal), fc.integer({ min: 1, max: signal.length })),
);

const arbitraryOptions = fc.record({
  percent: fc.double({ min: 0, max: 1, noNaN: true }),
  edgeMode: fc.constantFrom(...EDGE_MODES),
  truncateMode: fc.constantFrom(...TRUNCATE_MODES),
  constantValue: fc.integer({ min: -5, max: 5 }),
});

// ─── Property Tests ────────────────────────────────────────────────────────

describe('Property: agrees with the reference filter', () => {
  test('every mode and percentile', () => {
    fc.assert(
      fc.property(arbitrarySignalAndWindow, arbitraryOptions, ([signal, w], options) => {
        const fast = rankFilter(signal, w, options);
        const slow = referenceRankFilter(signal, w, options);
        expect(Array.from(fast)).toEqual(Array.from(slow));
      }),
    );
  });

  test('every integer rank', () => {
    fc.assert(
      fc.property(arbitrarySignalAndWindow, fc.nat(), ([signal, w], k) => {
        const index = k % (w + 1);
        const fast = rankFilter(signal, w, { index, edgeMode: 'reflect' });
        const slow = referenceRankFilter(signal, w, { index, edgeMode: 'reflect' });
        expect(Array.from(fast)).toEqual(Array.from(slow));
      }),
    );
  });
});

describe('Property: output length', () => {
  test('matches the truncation formula', () => {
    fc.assert(
      fc.property(arbitrarySignalAndWindow, arbitraryOptions, ([signal, w], options) => {
        const y = rankFilter(signal, w, options);
        const n = signal.length;
        const expected =
          options.truncateMode === 'valid' ? n - w
          : options.truncateMode === 'same' ? n
          : n + w - 1;
        expect(y.length).toBe(expected);
        expect(outputLength(n, w, options.truncateMode)).toBe(expected);
      }),
    );
  });
});

describe('Property: extreme ranks', () => {
  test('rank 0 is the window minimum and rank w − 1 the maximum', () => {
    fc.assert(
      fc.property(arbitrarySignalAndWindow, ([signal, w]) => {
        const lo = rankFilter(signal, w, { index: 0, truncateMode: 'valid' });
        const hi = rankFilter(signal, w, { index: w - 1, truncateMode: 'valid' });
        for (let j = 0; j < lo.length; j++) {
          const window = signal.slice(j, j + w);
          expect(lo[j]).toBe(Math.min(...window));
          expect(hi[j]).toBe(Math.max(...window));
        }
      }),
    );
  });
});
