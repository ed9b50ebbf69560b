/**
 * MoveLedger - the unspent movement quanta of the side on turn.
 *
 * A distance is payable by one quantum or by the sum of any 2, 3 or 4 of
 * them. The remaining multiset is at most four values, so every query is a
 * brute-force subset search over the current contents.
 */

import { MAX_QUANTA } from './types';

/** All index tuples of size `size` over `length` items, lexicographic order. */
function indexCombinations(length: number, size: number): number[][] {
  const out: number[][] = [];
  const walk = (start: number, picked: number[]): void => {
    if (picked.length === size) {
      out.push(picked.slice());
      return;
    }
    for (let i = start; i < length; i++) {
      picked.push(i);
      walk(i + 1, picked);
      picked.pop();
    }
  };
  walk(0, []);
  return out;
}

/**
 * Indices of the quanta that pay `distance`, or null. Smaller subsets win;
 * among equal sizes the lexicographically smallest index tuple wins.
 */
export function findPayment(quanta: readonly number[], distance: number): number[] | null {
  if (!Number.isInteger(distance) || distance <= 0) return null;
  const maxSize = Math.min(quanta.length, MAX_QUANTA);
  for (let size = 1; size <= maxSize; size++) {
    for (const combo of indexCombinations(quanta.length, size)) {
      const sum = combo.reduce((acc, i) => acc + quanta[i], 0);
      if (sum === distance) return combo;
    }
  }
  return null;
}

/** Every distinct distance some non-empty subset of `quanta` pays, ascending. */
export function payableDistances(quanta: readonly number[]): number[] {
  const sums = new Set<number>();
  const maxSize = Math.min(quanta.length, MAX_QUANTA);
  for (let size = 1; size <= maxSize; size++) {
    for (const combo of indexCombinations(quanta.length, size)) {
      sums.add(combo.reduce((acc, i) => acc + quanta[i], 0));
    }
  }
  return [...sums].sort((a, b) => a - b);
}

export class MoveLedger {
  private quanta: number[] = [];

  /** Replace the contents with a fresh turn's quanta. */
  seed(quanta: readonly number[]): void {
    this.quanta = quanta.slice();
  }

  clear(): void {
    this.quanta = [];
  }

  remaining(): number {
    return this.quanta.length;
  }

  values(): number[] {
    return this.quanta.slice();
  }

  isEmpty(): boolean {
    return this.quanta.length === 0;
  }

  canPay(distance: number): boolean {
    return findPayment(this.quanta, distance) !== null;
  }

  /** Remove the quanta that pay `distance`. No-op returning false when unpayable. */
  pay(distance: number): boolean {
    return this.consume(distance) !== null;
  }

  /** Like pay(), but returns the consumed values. */
  consume(distance: number): number[] | null {
    const indices = findPayment(this.quanta, distance);
    if (indices === null) return null;
    return this.removeIndices(indices);
  }

  holds(value: number): boolean {
    return this.quanta.includes(value);
  }

  /** Spend exactly one quantum of `value`. */
  payQuantum(value: number): boolean {
    const index = this.quanta.indexOf(value);
    if (index === -1) return false;
    this.removeIndices([index]);
    return true;
  }

  smallestQuantumAbove(distance: number): number | null {
    let best: number | null = null;
    for (const q of this.quanta) {
      if (q > distance && (best === null || q < best)) best = q;
    }
    return best;
  }

  payableDistances(): number[] {
    return payableDistances(this.quanta);
  }

  private removeIndices(indices: readonly number[]): number[] {
    const taken = new Set(indices);
    const consumed = indices.map((i) => this.quanta[i]);
    this.quanta = this.quanta.filter((_, i) => !taken.has(i));
    return consumed;
  }
}
