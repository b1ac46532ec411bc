// ---------------------------------------------------------------------------
// Order-Statistic Store: Counted Treap
// ---------------------------------------------------------------------------
// Sorted multiset of numbers: binary search tree on value, max-heap on a
// random priority. Equal values share one node with a multiplicity count,
// and every node caches the number of occurrences in its subtree, so
// insertion, removal and rank selection are all O(log w) expected.

import { createPRNG } from '../types.js';
import type { PRNG } from '../types.js';
import {
  EmptyStoreError,
  InvalidSignalError,
  RankFilterError,
  SelectionRangeError,
} from '../errors.js';

interface TreapNode {
  value: number;
  /** Occurrences of `value` held by this node. */
  count: number;
  /** Occurrences in this subtree, including `count`. */
  size: number;
  priority: number;
  left: TreapNode | null;
  right: TreapNode | null;
}

function sizeOf(node: TreapNode | null): number {
  return node === null ? 0 : node.size;
}

function update(node: TreapNode): void {
  node.size = node.count + sizeOf(node.left) + sizeOf(node.right);
}

function rotateRight(node: TreapNode, left: TreapNode): TreapNode {
  node.left = left.right;
  update(node);
  left.right = node;
  update(left);
  return left;
}

function rotateLeft(node: TreapNode, right: TreapNode): TreapNode {
  node.right = right.left;
  update(node);
  right.left = node;
  update(right);
  return right;
}

/** Join two treaps where every value in `a` is below every value in `b`. */
function merge(a: TreapNode | null, b: TreapNode | null): TreapNode | null {
  if (a === null) return b;
  if (b === null) return a;
  if (a.priority > b.priority) {
    a.right = merge(a.right, b);
    update(a);
    return a;
  }
  b.left = merge(a, b.left);
  update(b);
  return b;
}

function erase(node: TreapNode | null, value: number): TreapNode | null {
  if (node === null) return null;
  if (value < node.value) {
    node.left = erase(node.left, value);
  } else if (value > node.value) {
    node.right = erase(node.right, value);
  } else if (node.count > 1) {
    node.count--;
  } else {
    return merge(node.left, node.right);
  }
  update(node);
  return node;
}

/**
 * Rank selected by `percent` among `size` sorted values: `floor(size × percent)`
 * clamped to `size − 1`.
 */
export function selectionRank(size: number, percent: number): number {
  return Math.max(0, Math.min(Math.floor(size * percent), size - 1));
}

/**
 * Multiset kept in sorted order with percentile selection.
 *
 * Duplicates are fungible: `remove(v)` drops one occurrence equal to `v`.
 */
export class OrderStatisticStore {
  private root: TreapNode | null = null;
  private readonly random: PRNG;

  constructor(seed: number = 1) {
    this.random = createPRNG(seed);
  }

  /** Number of occurrences currently held. */
  get size(): number {
    return sizeOf(this.root);
  }

  add(value: number): void {
    if (Number.isNaN(value)) throw new InvalidSignalError();
    this.root = this.insert(this.root, value);
  }

  /**
   * Remove one occurrence of `value`. Leaves the store untouched and returns
   * false when no occurrence is present.
   */
  remove(value: number): boolean {
    if (Number.isNaN(value)) return false;
    const before = this.size;
    this.root = erase(this.root, value);
    return this.size !== before;
  }

  /**
   * Value at rank `floor(size × percent)`, clamped to the largest element.
   * `select(0)` is the minimum, `select(1)` the maximum.
   */
  select(percent: number = 0.5): number {
    if (!(percent >= 0 && percent <= 1)) throw new SelectionRangeError(percent);
    const size = this.size;
    if (size === 0) throw new EmptyStoreError();
    return this.selectRank(selectionRank(size, percent));
  }

  /** Value at integer `rank` of the sorted content, 0 being the minimum. */
  selectRank(rank: number): number {
    const size = this.size;
    if (size === 0) throw new EmptyStoreError();
    if (!Number.isInteger(rank) || rank < 0 || rank >= size) {
      throw new SelectionRangeError(rank / size, `Rank ${rank} is outside a store of size ${size}`);
    }

    let node = this.root;
    while (node !== null) {
      const leftSize = sizeOf(node.left);
      if (rank < leftSize) {
        node = node.left;
      } else if (rank < leftSize + node.count) {
        return node.value;
      } else {
        rank -= leftSize + node.count;
        node = node.right;
      }
    }
    throw new RankFilterError(`Subtree sizes are inconsistent with store size ${size}`);
  }

  /** Sorted content, duplicates expanded. */
  toArray(): Float64Array {
    const result = new Float64Array(this.size);
    const stack: TreapNode[] = [];
    let node = this.root;
    let k = 0;
    while (node !== null || stack.length > 0) {
      while (node !== null) {
        stack.push(node);
        node = node.left;
      }
      const top = stack.pop();
      if (top === undefined) break;
      for (let c = 0; c < top.count; c++) result[k++] = top.value;
      node = top.right;
    }
    return result;
  }

  clear(): void {
    this.root = null;
  }

  toString(): string {
    return `OrderStatisticStore[${Array.from(this.toArray()).join(', ')}]`;
  }

  private insert(node: TreapNode | null, value: number): TreapNode {
    if (node === null) {
      return { value, count: 1, size: 1, priority: this.random(), left: null, right: null };
    }
    if (value < node.value) {
      const left = this.insert(node.left, value);
      node.left = left;
      if (left.priority > node.priority) return rotateRight(node, left);
    } else if (value > node.value) {
      const right = this.insert(node.right, value);
      node.right = right;
      if (right.priority > node.priority) return rotateLeft(node, right);
    } else {
      node.count++;
    }
    update(node);
    return node;
  }
}
