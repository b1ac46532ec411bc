// ---------------------------------------------------------------------------
// Filter Options: schemas & resolution
// ---------------------------------------------------------------------------
// Fields are checked one at a time, in a fixed order, so a call with several
// bad options always reports the same error.

import { z } from 'zod';
import { EDGE_MODES, TRUNCATE_MODES } from './types.js';
import type { RankFilterOptions, ResolvedFilterOptions } from './types.js';
import {
  InvalidModeError,
  InvalidSignalError,
  RankFilterError,
  SelectionRangeError,
} from './errors.js';
import { selectionRank } from './store/order-statistic-store.js';

export const optionSchemas = {
  edgeMode: z.enum(EDGE_MODES).default('constant'),
  index: z.number().int().optional(),
  percent: z.number().default(0.5),
  truncateMode: z.enum(TRUNCATE_MODES).default('same'),
  constantValue: z.number().default(0),
  output: z.instanceof(Float64Array).optional(),
  seed: z.number().int().default(1),
};

function field(raw: unknown, key: keyof RankFilterOptions): unknown {
  if (typeof raw !== 'object' || raw === null) return undefined;
  return Reflect.get(raw, key);
}

function fail(key: string, error: z.ZodError): RankFilterError {
  return new RankFilterError(`Invalid option "${key}": ${error.issues[0]?.message ?? error.message}`);
}

/**
 * Apply defaults and fold `index` into `percent` (`index / windowSize`).
 * `rank` keeps the integer index as given, clamped to the last rank, so it
 * never goes through the floating-point percent.
 * Throws the matching {@link RankFilterError} subclass for the first bad field.
 */
export function resolveOptions(
  raw: unknown,
  windowSize: number,
): ResolvedFilterOptions & { output: Float64Array | undefined } {
  const edgeMode = optionSchemas.edgeMode.safeParse(field(raw, 'edgeMode'));
  if (!edgeMode.success) throw new InvalidModeError('edge', field(raw, 'edgeMode'));

  const index = optionSchemas.index.safeParse(field(raw, 'index'));
  if (!index.success) {
    const value = field(raw, 'index');
    throw new SelectionRangeError(
      Number(value),
      `Selection index ${String(value)} must be an integer rank inside the window`,
    );
  }

  let percent: number;
  let rank: number;
  if (index.data !== undefined) {
    percent = index.data / windowSize;
    if (percent < 0 || percent > 1) {
      throw new SelectionRangeError(
        percent,
        `Selection index ${index.data} cannot be negative or greater than the window size ${windowSize}`,
      );
    }
    rank = Math.min(index.data, windowSize - 1);
  } else {
    const parsed = optionSchemas.percent.safeParse(field(raw, 'percent'));
    percent = parsed.success ? parsed.data : Number.NaN;
    if (!(percent >= 0 && percent <= 1)) throw new SelectionRangeError(percent);
    rank = selectionRank(windowSize, percent);
  }

  const truncateMode = optionSchemas.truncateMode.safeParse(field(raw, 'truncateMode'));
  if (!truncateMode.success) throw new InvalidModeError('truncate', field(raw, 'truncateMode'));

  const constantValue = optionSchemas.constantValue.safeParse(field(raw, 'constantValue'));
  if (!constantValue.success) {
    if (typeof field(raw, 'constantValue') === 'number') throw new InvalidSignalError();
    throw fail('constantValue', constantValue.error);
  }

  const output = optionSchemas.output.safeParse(field(raw, 'output'));
  if (!output.success) throw fail('output', output.error);

  const seed = optionSchemas.seed.safeParse(field(raw, 'seed'));
  if (!seed.success) throw fail('seed', seed.error);

  return {
    percent,
    rank,
    output: output.data,
    edgeMode: edgeMode.data,
    truncateMode: truncateMode.data,
    constantValue: constantValue.data,
    seed: seed.data,
  };
}
