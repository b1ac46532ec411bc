// ---------------------------------------------------------------------------
// Error taxonomy
// ---------------------------------------------------------------------------
// Every failure is a usage or configuration mistake; nothing is retried.

/** Base class for every error thrown by the rank filter. */
export class RankFilterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RankFilterError';
  }
}

/** Window size is not a positive integer, or the signal is shorter than it. */
export class LengthError extends RankFilterError {
  constructor(
    public readonly signalLength: number,
    public readonly windowSize: number,
    message: string = `Input length ${signalLength} cannot be smaller than the window size ${windowSize}`,
  ) {
    super(message);
    this.name = 'LengthError';
  }
}

/** Unrecognised edge-handling or truncation mode. */
export class InvalidModeError extends RankFilterError {
  constructor(
    public readonly kind: 'edge' | 'truncate',
    public readonly mode: unknown,
  ) {
    super(`Got invalid ${kind === 'edge' ? 'edge-handling' : 'truncation'} mode: ${String(mode)}`);
    this.name = 'InvalidModeError';
  }
}

/** Effective percentile outside [0, 1]. */
export class SelectionRangeError extends RankFilterError {
  constructor(
    public readonly percent: number,
    message: string = `Selection percent ${percent} must lie in [0, 1]`,
  ) {
    super(message);
    this.name = 'SelectionRangeError';
  }
}

/** Caller-supplied output buffer has the wrong length. */
export class OutputLengthMismatchError extends RankFilterError {
  constructor(
    public readonly expectedLength: number,
    public readonly actualLength: number,
  ) {
    super(`Given output array has length ${actualLength}, expected ${expectedLength}`);
    this.name = 'OutputLengthMismatchError';
  }
}

/** A sample cannot be ordered (NaN). `position` is null outside a signal. */
export class InvalidSignalError extends RankFilterError {
  constructor(public readonly position: number | null = null) {
    super(position === null ? 'Cannot order a NaN value' : `Signal sample at position ${position} is NaN`);
    this.name = 'InvalidSignalError';
  }
}

export class EmptyStoreError extends RankFilterError {
  constructor() {
    super('Cannot select from an empty store');
    this.name = 'EmptyStoreError';
  }
}

/** A value leaving the window was not present in the store. */
export class WindowAccountingError extends RankFilterError {
  constructor(
    public readonly value: number,
    public readonly position: number,
  ) {
    super(`Value ${value} leaving the window at position ${position} was not in the store`);
    this.name = 'WindowAccountingError';
  }
}
