/**
 * Move planning and legal-move enumeration.
 *
 * Planning is pure: it combines the board's structural checks with the
 * ledger's payability and returns either a MovePlan or a rejection. The
 * TurnEngine only ever applies plans produced here, and enumeration is
 * built from the same planners, so a listed move is always accepted and an
 * accepted move is always listed.
 */

import type { BoardState } from './BoardState';
import type { MoveLedger } from './MoveLedger';
import {
  bearOffDistance,
  directionOf,
  entryDistance,
  entryRange,
  isInEntryRange,
  isOnBoard,
  pointsIn,
  travelDistance,
} from './sideGeometry';
import {
  BAR,
  OFF,
  type BarSentinel,
  type LegalMove,
  type MovePlan,
  type MoveRejectionCode,
  type OffSentinel,
  type Side,
  type ValidationOutcome,
} from './types';

type PlanOutcome = ValidationOutcome<MovePlan>;

function reject(code: MoveRejectionCode, reason: string): PlanOutcome {
  return { valid: false, code, reason };
}

function accept(plan: MovePlan): PlanOutcome {
  return { valid: true, data: plan };
}

/**
 * Validate a regular point-to-point move. Checks run in a fixed order:
 * range, bar precedence, ownership, direction, dice, blocking.
 */
export function planMove(
  board: BoardState,
  side: Side,
  ledger: MoveLedger,
  from: number,
  to: number
): PlanOutcome {
  if (!isOnBoard(from) || !isOnBoard(to)) {
    return reject('POINT_OUT_OF_RANGE', `Points must be between 0-23 (got ${from}->${to})`);
  }
  if (board.capturedCount(side) > 0) {
    return reject('BAR_ENTRY_REQUIRED', 'Checkers on the bar must re-enter first');
  }
  const source = board.pointAt(from);
  if (source.owner !== side) {
    return reject('NOT_YOUR_CHECKER', `No ${side} checker on point ${from}`);
  }
  const distance = travelDistance(side, from, to);
  if (distance <= 0) {
    return reject('WRONG_DIRECTION', `${side} cannot move from ${from} to ${to}`);
  }
  if (!ledger.canPay(distance)) {
    return reject(
      'DICE_MISMATCH',
      `Distance ${distance} cannot be paid with [${ledger.values().join(', ')}]`
    );
  }
  const check = board.checkMove(side, from, to);
  if (!check.valid) {
    return reject(check.code, check.reason);
  }
  return accept({ kind: 'move', side, from, to, distance, substituted: false });
}

/** Validate re-entry onto `point`. Entry is always paid by a single quantum. */
export function planEntry(
  board: BoardState,
  side: Side,
  ledger: MoveLedger,
  point: number
): PlanOutcome {
  if (board.capturedCount(side) === 0) {
    return reject('NO_CHECKERS_ON_BAR', `${side} has no checkers on the bar`);
  }
  if (!isOnBoard(point)) {
    return reject('POINT_OUT_OF_RANGE', `Invalid point: ${point}`);
  }
  if (!isInEntryRange(side, point)) {
    return reject('NOT_IN_ENTRY_RANGE', `${side} cannot enter on point ${point}`);
  }
  const distance = entryDistance(side, point);
  if (!ledger.holds(distance)) {
    return reject(
      'DICE_MISMATCH',
      `Entering on ${point} needs a ${distance}, remaining [${ledger.values().join(', ')}]`
    );
  }
  const check = board.checkEntry(side, point);
  if (!check.valid) {
    return reject(check.code, check.reason);
  }
  return accept({ kind: 'enter', side, from: BAR, to: point, distance, substituted: false });
}

/**
 * Validate bearing off from `from`. The exact distance may be paid by any
 * combination; otherwise the smallest larger single quantum substitutes,
 * provided no own checker remains between `from` and the off-edge.
 */
export function planBearOff(
  board: BoardState,
  side: Side,
  ledger: MoveLedger,
  from: number
): PlanOutcome {
  const check = board.checkBearOff(side, from);
  if (!check.valid) {
    return reject(check.code, check.reason);
  }
  const exact = bearOffDistance(side, from);
  if (ledger.canPay(exact)) {
    return accept({ kind: 'bear_off', side, from, to: OFF, distance: exact, substituted: false });
  }
  const larger = ledger.smallestQuantumAbove(exact);
  if (larger === null) {
    return reject(
      'DICE_MISMATCH',
      `Bearing off from ${from} needs ${exact}, remaining [${ledger.values().join(', ')}]`
    );
  }
  if (board.hasCheckerAhead(side, from)) {
    return reject(
      'BEAR_OFF_NOT_FURTHEST',
      `A ${larger} can only bear off from ${from} when no checker lies beyond it`
    );
  }
  return accept({ kind: 'bear_off', side, from, to: OFF, distance: larger, substituted: true });
}

function toLegalMove(plan: MovePlan): LegalMove {
  return { kind: plan.kind, from: plan.from, to: plan.to, distance: plan.distance };
}

/**
 * Every action the side can take with its remaining quanta. While checkers
 * sit on the bar only entries are listed.
 */
export function enumerateLegalMoves(
  board: BoardState,
  side: Side,
  ledger: MoveLedger
): LegalMove[] {
  const moves: LegalMove[] = [];
  if (ledger.isEmpty()) return moves;

  if (board.capturedCount(side) > 0) {
    for (const point of pointsIn(entryRange(side))) {
      const plan = planEntry(board, side, ledger, point);
      if (plan.valid) moves.push(toLegalMove(plan.data));
    }
    return moves;
  }

  const distances = ledger.payableDistances();
  for (const from of board.occupiedBy(side)) {
    for (const distance of distances) {
      const to = from + distance * directionOf(side);
      if (!isOnBoard(to)) continue;
      const plan = planMove(board, side, ledger, from, to);
      if (plan.valid) moves.push(toLegalMove(plan.data));
    }
    const bearOff = planBearOff(board, side, ledger, from);
    if (bearOff.valid) moves.push(toLegalMove(bearOff.data));
  }
  return moves;
}

export function hasAnyLegalMove(board: BoardState, side: Side, ledger: MoveLedger): boolean {
  return enumerateLegalMoves(board, side, ledger).length > 0;
}

/** Where a checker at `from` (a point or the bar) may go this turn. */
export function destinationsFrom(
  board: BoardState,
  side: Side,
  ledger: MoveLedger,
  from: number | BarSentinel
): Array<number | OffSentinel> {
  return enumerateLegalMoves(board, side, ledger)
    .filter((move) => move.from === from)
    .map((move) => move.to);
}
