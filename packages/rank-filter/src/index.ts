// ---------------------------------------------------------------------------
// @order-filter/rank-filter: Barrel Export
// ---------------------------------------------------------------------------
// Sliding-window order-statistic (percentile / median / min / max) filtering
// for 1-D signals. Pure TypeScript.

export type {
  PRNG,
  Signal,
  EdgeMode,
  TruncateMode,
  RankFilterOptions,
  ResolvedFilterOptions,
  EdgePadding,
} from './types.js';

export { EDGE_MODES, TRUNCATE_MODES, createPRNG } from './types.js';

export {
  RankFilterError,
  LengthError,
  InvalidModeError,
  SelectionRangeError,
  OutputLengthMismatchError,
  InvalidSignalError,
  EmptyStoreError,
  WindowAccountingError,
} from './errors.js';

export { optionSchemas, resolveOptions } from './options.js';

export { OrderStatisticStore, selectionRank } from './store/index.js';

export * from './edges/index.js';

export { outputLength, prepareOutput } from './output.js';

export {
  rankFilter,
  medianFilter,
  minimumFilter,
  maximumFilter,
  percentileFilter,
  slide,
  validateSignal,
} from './filter.js';

export { referenceRankFilter } from './reference.js';
