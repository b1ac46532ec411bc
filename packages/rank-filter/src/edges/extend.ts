// ---------------------------------------------------------------------------
// Edge Extension
// ---------------------------------------------------------------------------
// Pads a signal on both sides so every window placement reads real memory.
// Each mode is an index mapping from padded coordinates back into the signal:
//
//   reflect   d c b a | a b c d | d c b a
//   mirror    d c b   | a b c d |   c b a
//   wrap      b c d   | a b c d | a b c
//   nearest   a a a   | a b c d | d d d
//   constant  k k k   | a b c d | k k k

import type { EdgeMode, EdgePadding, Signal } from '../types.js';
import { EDGE_MODES } from '../types.js';
import { InvalidModeError, LengthError } from '../errors.js';

export function isEdgeMode(mode: unknown): mode is EdgeMode {
  return EDGE_MODES.some(m => m === mode);
}

/**
 * Padding for a centred window of `windowSize`: `floor(w/2)` in front and
 * the remaining `w − floor(w/2)` behind, so the padded length is always n + w.
 */
export function edgePadding(windowSize: number): EdgePadding {
  const front = Math.floor(windowSize / 2);
  return { front, back: windowSize - front };
}

function clamp(idx: number, n: number): number {
  return Math.max(0, Math.min(n - 1, idx));
}

/** Boundary sample repeated on the way back in. */
function reflectIndex(idx: number, n: number): number {
  if (idx < 0) idx = -idx - 1;
  if (idx >= n) idx = 2 * n - 1 - idx;
  return clamp(idx, n);
}

/** Boundary sample is the axis; not repeated. */
function mirrorIndex(idx: number, n: number): number {
  if (idx < 0) idx = -idx;
  if (idx >= n) idx = 2 * (n - 1) - idx;
  return clamp(idx, n);
}

function wrapIndex(idx: number, n: number): number {
  return ((idx % n) + n) % n;
}

/**
 * Copy `signal` into a new buffer with `front` synthetic samples before it
 * and `back` after it. Only `constant` mode can pad an empty signal.
 */
export function extendEdgesBy(
  signal: Signal,
  front: number,
  back: number,
  mode: EdgeMode,
  constantValue: number = 0,
): Float64Array {
  if (!isEdgeMode(mode)) throw new InvalidModeError('edge', mode);

  const n = signal.length;
  if (n === 0 && mode !== 'constant') {
    throw new LengthError(0, front + back, `Cannot extend an empty signal in ${mode} mode`);
  }
  const result = new Float64Array(front + n + back);
  for (let i = 0; i < n; i++) result[front + i] = signal[i]!;

  if (mode === 'constant') {
    result.fill(constantValue, 0, front);
    result.fill(constantValue, front + n);
    return result;
  }

  const mapIndex =
    mode === 'nearest' ? clamp
    : mode === 'reflect' ? reflectIndex
    : mode === 'mirror' ? mirrorIndex
    : wrapIndex;

  for (let k = -front; k < 0; k++) {
    result[front + k] = signal[mapIndex(k, n)]!;
  }
  for (let k = n; k < n + back; k++) {
    result[front + k] = signal[mapIndex(k, n)]!;
  }
  return result;
}

/**
 * Pad `signal` to length n + windowSize for a centred sliding pass.
 */
export function extendEdges(
  signal: Signal,
  windowSize: number,
  mode: EdgeMode = 'constant',
  constantValue: number = 0,
): Float64Array {
  const { front, back } = edgePadding(windowSize);
  return extendEdgesBy(signal, front, back, mode, constantValue);
}
