// ---------------------------------------------------------------------------
// Edge Extension Tests
// ---------------------------------------------------------------------------
import { describe, it, expect } from 'vitest';
import { edgePadding, extendEdges, extendEdgesBy, isEdgeMode } from '../edges/index.js';
import { LengthError } from '../errors.js';

const signal = [1, 2, 3, 4, 5];

describe('edgePadding', () => {
  it('splits an even window evenly', () => {
    expect(edgePadding(4)).toEqual({ front: 2, back: 2 });
  });

  it('puts the extra sample of an odd window at the back', () => {
    expect(edgePadding(5)).toEqual({ front: 2, back: 3 });
    expect(edgePadding(1)).toEqual({ front: 0, back: 1 });
  });
});

describe('extendEdges', () => {
  it('constant pads with the given value', () => {
    expect(Array.from(extendEdges(signal, 4, 'constant', 9))).toEqual([9, 9, 1, 2, 3, 4, 5, 9, 9]);
  });

  it('constant defaults to zero', () => {
    expect(Array.from(extendEdges(signal, 2))).toEqual([0, 1, 2, 3, 4, 5, 0]);
  });

  it('nearest repeats the boundary samples', () => {
    expect(Array.from(extendEdges(signal, 4, 'nearest'))).toEqual([1, 1, 1, 2, 3, 4, 5, 5, 5]);
  });

  it('reflect reverses the edge blocks including the boundary', () => {
    expect(Array.from(extendEdges(signal, 4, 'reflect'))).toEqual([2, 1, 1, 2, 3, 4, 5, 5, 4]);
  });

  it('mirror reverses the edge blocks about the boundary', () => {
    expect(Array.from(extendEdges(signal, 4, 'mirror'))).toEqual([3, 2, 1, 2, 3, 4, 5, 4, 3]);
  });

  it('wrap takes the opposite end of the signal', () => {
    const x = [1, 2, 3, 4, 5, 6];
    const ext = extendEdges(x, 4, 'wrap');
    expect(Array.from(ext.subarray(0, 2))).toEqual([5, 6]);
    expect(Array.from(ext.subarray(8))).toEqual([1, 2]);
  });

  it('always returns n + windowSize samples', () => {
    for (let w = 1; w <= signal.length; w++) {
      expect(extendEdges(signal, w, 'reflect').length).toBe(signal.length + w);
    }
  });

  it('odd windows get one more sample behind', () => {
    expect(Array.from(extendEdges(signal, 3, 'wrap'))).toEqual([5, 1, 2, 3, 4, 5, 1, 2]);
  });

  it('does not modify the input', () => {
    const x = new Float64Array([1, 2, 3]);
    extendEdges(x, 2, 'nearest');
    expect(Array.from(x)).toEqual([1, 2, 3]);
  });
});

describe('extendEdgesBy', () => {
  it('pads each side independently', () => {
    expect(Array.from(extendEdgesBy([1, 2, 3], 2, 3, 'reflect'))).toEqual([2, 1, 1, 2, 3, 3, 2, 1]);
  });

  it('clamps mirror on a single sample', () => {
    expect(Array.from(extendEdgesBy([7], 2, 2, 'mirror'))).toEqual([7, 7, 7, 7, 7]);
  });

  it('rejects an empty signal unless padding is constant', () => {
    for (const mode of ['nearest', 'reflect', 'mirror', 'wrap'] as const) {
      expect(() => extendEdgesBy([], 1, 1, mode)).toThrow(LengthError);
    }
    expect(Array.from(extendEdgesBy([], 1, 1, 'constant', 4))).toEqual([4, 4]);
  });
});

describe('isEdgeMode', () => {
  it('recognises the five modes only', () => {
    for (const mode of ['constant', 'nearest', 'reflect', 'mirror', 'wrap']) {
      expect(isEdgeMode(mode)).toBe(true);
    }
    expect(isEdgeMode('bogus')).toBe(false);
    expect(isEdgeMode(3)).toBe(false);
  });
});
