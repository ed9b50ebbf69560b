/**
 * Test Fixtures and Utilities
 * Scripted dice, sparse board layouts and engines parked at a known turn.
 */

import type { RandomSource } from '../../src/shared/utils/rng';
import { TurnEngine, type TurnEngineOptions } from '../../src/shared/engine/TurnEngine';
import {
  CHECKERS_PER_SIDE,
  type BoardLayout,
  type PerSide,
  type Side,
} from '../../src/shared/engine/types';

/**
 * RandomSource that replays a fixed list of values and fails loudly when a
 * test draws more than it scripted.
 */
export class ScriptedRandom implements RandomSource {
  private readonly values: number[];
  private cursor = 0;

  constructor(values: number[]) {
    this.values = values.slice();
  }

  nextInt(_min: number, _max: number): number {
    if (this.cursor >= this.values.length) {
      throw new Error(`ScriptedRandom exhausted after ${this.values.length} draws`);
    }
    return this.values[this.cursor++];
  }

  push(...values: number[]): void {
    this.values.push(...values);
  }

  get drawn(): number {
    return this.cursor;
  }
}

export interface SparseLayout {
  white?: Record<number, number>;
  black?: Record<number, number>;
  bar?: Partial<PerSide<number>>;
  /**
   * Borne-off counts. When omitted, every checker of a side not placed on a
   * point or the bar is treated as borne off.
   */
  borneOff?: Partial<PerSide<number>>;
}

/**
 * Build a BoardLayout from `{ white: { point: count }, black: {...} }`,
 * topping each side up to 15 through its borne-off count.
 */
export function layout(sparse: SparseLayout): BoardLayout {
  const points: Array<{ point: number; side: Side; count: number }> = [];
  const borneOff: PerSide<number> = { white: 0, black: 0 };

  for (const side of ['white', 'black'] as const) {
    let placed = sparse.bar?.[side] ?? 0;
    for (const [point, count] of Object.entries(sparse[side] ?? {})) {
      points.push({ point: Number(point), side, count });
      placed += count;
    }
    borneOff[side] = sparse.borneOff?.[side] ?? CHECKERS_PER_SIDE - placed;
  }

  return { points, bar: sparse.bar, borneOff };
}

/** Faces for the initial roll that hand the first turn to `side`. */
export function initialRollFor(side: Side): number[] {
  return side === 'white' ? [2, 1] : [1, 2];
}

/**
 * Engine initialized on `boardLayout` with `first` to move; `rolls` are the
 * turn rolls that follow, in order.
 */
export function engineAt(
  boardLayout: BoardLayout | undefined,
  first: Side,
  rolls: Array<[number, number]> = [],
  options: Omit<TurnEngineOptions, 'random'> = {}
): { engine: TurnEngine; random: ScriptedRandom } {
  const random = new ScriptedRandom([...initialRollFor(first), ...rolls.flat()]);
  const engine = new TurnEngine({ ...options, random });
  engine.initialize(boardLayout);
  engine.rollForFirst();
  return { engine, random };
}

/** Run `fn` and return what it threw; fails the test when nothing was thrown. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}
