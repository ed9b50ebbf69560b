/**
 * Fixed per-side geometry: travel direction, home range, re-entry range and
 * the distances charged for entering and bearing off.
 */

import { EngineErrorCode, PreconditionViolation } from './errors';
import { HOME_SIZE, POINT_COUNT, SIDES, type Side } from './types';

export type Direction = 1 | -1;

/** Inclusive [low, high] index range. */
export type PointRange = readonly [number, number];

const WHITE_HOME: PointRange = [POINT_COUNT - HOME_SIZE, POINT_COUNT - 1];
const BLACK_HOME: PointRange = [0, HOME_SIZE - 1];

export function isSide(value: unknown): value is Side {
  return typeof value === 'string' && (SIDES as readonly string[]).includes(value);
}

/**
 * Guard for public entry points. A side outside the two known values can
 * only come from a programming error.
 */
export function assertSide(value: unknown): asserts value is Side {
  if (!isSide(value)) {
    throw new PreconditionViolation(
      EngineErrorCode.PRECONDITION_UNKNOWN_SIDE,
      `Unknown side: ${String(value)}`,
      { side: value }
    );
  }
}

export function opponentOf(side: Side): Side {
  return side === 'white' ? 'black' : 'white';
}

export function directionOf(side: Side): Direction {
  return side === 'white' ? 1 : -1;
}

export function isOnBoard(point: number): boolean {
  return Number.isInteger(point) && point >= 0 && point < POINT_COUNT;
}

export function homeRange(side: Side): PointRange {
  return side === 'white' ? WHITE_HOME : BLACK_HOME;
}

/** A side re-enters inside the opponent's home board. */
export function entryRange(side: Side): PointRange {
  return homeRange(opponentOf(side));
}

export function inRange(point: number, [low, high]: PointRange): boolean {
  return Number.isInteger(point) && point >= low && point <= high;
}

export function isInHomeBoard(side: Side, point: number): boolean {
  return inRange(point, homeRange(side));
}

export function isInEntryRange(side: Side, point: number): boolean {
  return inRange(point, entryRange(side));
}

/** Points of a range from low to high index. */
export function pointsIn([low, high]: PointRange): number[] {
  const points: number[] = [];
  for (let p = low; p <= high; p++) {
    points.push(p);
  }
  return points;
}

/**
 * Signed travel from `from` to `to` measured in the side's direction.
 * Positive means forward; zero or negative is never a legal move.
 */
export function travelDistance(side: Side, from: number, to: number): number {
  return (to - from) * directionOf(side);
}

/** Quantum needed to enter on `point` from the bar. */
export function entryDistance(side: Side, point: number): number {
  return side === 'white' ? point + 1 : POINT_COUNT - point;
}

/** Exact quantum needed to carry a checker on `point` past the off-edge. */
export function bearOffDistance(side: Side, point: number): number {
  return side === 'white' ? POINT_COUNT - point : point + 1;
}

/**
 * Points strictly between `point` and the side's off-edge, nearest first.
 */
export function pointsAhead(side: Side, point: number): number[] {
  const ahead: number[] = [];
  for (let p = point + directionOf(side); isOnBoard(p); p += directionOf(side)) {
    ahead.push(p);
  }
  return ahead;
}
