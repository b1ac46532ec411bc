// ---------------------------------------------------------------------------
// Output Container
// ---------------------------------------------------------------------------

import type { TruncateMode } from './types.js';
import { OutputLengthMismatchError } from './errors.js';

/**
 * Output length for a signal of length `n`:
 * `valid` → n − w, `same` → n, `full` → n + w − 1.
 */
export function outputLength(n: number, windowSize: number, truncateMode: TruncateMode): number {
  switch (truncateMode) {
    case 'valid':
      return n - windowSize;
    case 'same':
      return n;
    case 'full':
      return n + windowSize - 1;
  }
}

/**
 * Use the caller's buffer when given (its length must match exactly),
 * otherwise allocate a zero-filled one.
 */
export function prepareOutput(output: Float64Array | undefined, requiredLength: number): Float64Array {
  if (output !== undefined) {
    if (output.length !== requiredLength) {
      throw new OutputLengthMismatchError(requiredLength, output.length);
    }
    return output;
  }
  return new Float64Array(requiredLength);
}
