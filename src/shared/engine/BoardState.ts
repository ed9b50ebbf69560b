/**
 * BoardState - sole owner of positional truth.
 *
 * Holds the 24 points, each side's bar (captured checkers awaiting
 * re-entry) and each side's borne-off count. Every mutation validates first
 * and leaves the board untouched when the rules refuse it; refusals come
 * back as values, never as exceptions.
 */

import {
  BoardConstraintViolation,
  EngineErrorCode,
  InvalidState,
  invariant,
} from './errors';
import {
  assertSide,
  bearOffDistance,
  isInEntryRange,
  isInHomeBoard,
  isOnBoard,
  opponentOf,
  pointsAhead,
  travelDistance,
} from './sideGeometry';
import {
  CHECKERS_PER_SIDE,
  POINT_COUNT,
  SIDES,
  type BoardEvent,
  type BoardLayout,
  type BoardSnapshot,
  type MoveRejectionCode,
  type PerSide,
  type PointState,
  type Side,
  type ValidationResult,
} from './types';

interface MutablePoint {
  owner: Side | null;
  count: number;
}

const NOT_MOVED: BoardEvent = { moved: false, hit: false, hitSide: null, bornOff: false };

/** Standard opening position: 2/5/3/5 per side, mirrored by direction. */
export const STANDARD_LAYOUT: BoardLayout = {
  points: [
    { point: 0, side: 'white', count: 2 },
    { point: 11, side: 'white', count: 5 },
    { point: 16, side: 'white', count: 3 },
    { point: 18, side: 'white', count: 5 },
    { point: 23, side: 'black', count: 2 },
    { point: 12, side: 'black', count: 5 },
    { point: 7, side: 'black', count: 3 },
    { point: 5, side: 'black', count: 5 },
  ],
};

/** Every checker already home; handy for practising the end game. */
export const BEAR_OFF_PRACTICE_LAYOUT: BoardLayout = {
  points: [
    { point: 18, side: 'white', count: 2 },
    { point: 19, side: 'white', count: 2 },
    { point: 20, side: 'white', count: 3 },
    { point: 21, side: 'white', count: 2 },
    { point: 22, side: 'white', count: 3 },
    { point: 23, side: 'white', count: 3 },
    { point: 0, side: 'black', count: 3 },
    { point: 1, side: 'black', count: 3 },
    { point: 2, side: 'black', count: 2 },
    { point: 3, side: 'black', count: 3 },
    { point: 4, side: 'black', count: 2 },
    { point: 5, side: 'black', count: 2 },
  ],
};

function emptyPoints(): MutablePoint[] {
  return Array.from({ length: POINT_COUNT }, () => ({ owner: null, count: 0 }));
}

function rejected(code: MoveRejectionCode, reason: string): ValidationResult {
  return { valid: false, code, reason };
}

export class BoardState {
  private readonly points_: MutablePoint[];
  private readonly bar: PerSide<number>;
  private readonly borneOff: PerSide<number>;

  private constructor(points: MutablePoint[], bar: PerSide<number>, borneOff: PerSide<number>) {
    this.points_ = points;
    this.bar = bar;
    this.borneOff = borneOff;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // CONSTRUCTION
  // ═══════════════════════════════════════════════════════════════════════

  static standard(): BoardState {
    return BoardState.fromLayout(STANDARD_LAYOUT);
  }

  /**
   * Build a board from a sparse layout. The result must satisfy every board
   * invariant, including 15 checkers per side.
   */
  static fromLayout(layout: BoardLayout): BoardState {
    const points = emptyPoints();
    for (const entry of layout.points) {
      assertSide(entry.side);
      if (!isOnBoard(entry.point)) {
        throw new BoardConstraintViolation(
          EngineErrorCode.BOARD_INVALID_POINT,
          `Layout point ${entry.point} is off the board`,
          { point: entry.point }
        );
      }
      const target = points[entry.point];
      if (target.owner !== null && target.owner !== entry.side) {
        throw new InvalidState(
          EngineErrorCode.STATE_INVALID_OCCUPANCY,
          `Layout places both sides on point ${entry.point}`,
          { point: entry.point }
        );
      }
      if (entry.count > 0) {
        target.owner = entry.side;
        target.count += entry.count;
      }
    }
    const board = new BoardState(
      points,
      { white: layout.bar?.white ?? 0, black: layout.bar?.black ?? 0 },
      { white: layout.borneOff?.white ?? 0, black: layout.borneOff?.black ?? 0 }
    );
    board.assertInvariants();
    return board;
  }

  static fromSnapshot(snapshot: BoardSnapshot): BoardState {
    if (snapshot.points.length !== POINT_COUNT) {
      throw new InvalidState(
        EngineErrorCode.STATE_INVALID_SNAPSHOT,
        `Snapshot must hold ${POINT_COUNT} points, got ${snapshot.points.length}`
      );
    }
    const board = new BoardState(
      snapshot.points.map(([owner, count]) => ({ owner, count })),
      { ...snapshot.bar },
      { ...snapshot.borneOff }
    );
    board.assertInvariants();
    return board;
  }

  clone(): BoardState {
    return new BoardState(
      this.points_.map((p) => ({ ...p })),
      { ...this.bar },
      { ...this.borneOff }
    );
  }

  snapshot(): BoardSnapshot {
    return {
      points: this.points_.map((p): [Side | null, number] => [p.owner, p.count]),
      bar: { ...this.bar },
      borneOff: { ...this.borneOff },
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // QUERIES
  // ═══════════════════════════════════════════════════════════════════════

  pointAt(index: number): PointState {
    if (!isOnBoard(index)) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_POINT,
        `Invalid point: ${index}. Points must be between 0-23.`,
        { point: index }
      );
    }
    const { owner, count } = this.points_[index];
    return { owner, count };
  }

  points(): PointState[] {
    return this.points_.map(({ owner, count }) => ({ owner, count }));
  }

  capturedCount(side: Side): number {
    assertSide(side);
    return this.bar[side];
  }

  borneOffCount(side: Side): number {
    assertSide(side);
    return this.borneOff[side];
  }

  onBoardCount(side: Side): number {
    assertSide(side);
    return this.points_.reduce((sum, p) => (p.owner === side ? sum + p.count : sum), 0);
  }

  /** Points holding at least one of the side's checkers, in index order. */
  occupiedBy(side: Side): number[] {
    assertSide(side);
    const occupied: number[] = [];
    this.points_.forEach((p, index) => {
      if (p.owner === side && p.count > 0) occupied.push(index);
    });
    return occupied;
  }

  /**
   * Total distance the side still has to travel to bear everything off;
   * a checker on the bar counts 25.
   */
  pipCount(side: Side): number {
    assertSide(side);
    let total = this.bar[side] * (POINT_COUNT + 1);
    this.points_.forEach((p, index) => {
      if (p.owner === side) total += p.count * bearOffDistance(side, index);
    });
    return total;
  }

  /** Blocked means two or more opposing checkers. */
  isBlockedFor(side: Side, point: number): boolean {
    const target = this.points_[point];
    return target.owner === opponentOf(side) && target.count >= 2;
  }

  /**
   * Every on-board checker of the side lies in its home range. Checkers on
   * the bar are not on the board and are not looked at here.
   */
  allInHomeBoard(side: Side): boolean {
    assertSide(side);
    return this.points_.every(
      (p, index) => p.owner !== side || p.count === 0 || isInHomeBoard(side, index)
    );
  }

  /** Whether the side owns a checker strictly between `point` and its off-edge. */
  hasCheckerAhead(side: Side, point: number): boolean {
    assertSide(side);
    return pointsAhead(side, point).some((p) => this.points_[p].owner === side);
  }

  checkWinner(): Side | null {
    for (const side of SIDES) {
      if (this.borneOff[side] === CHECKERS_PER_SIDE) return side;
    }
    return null;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // VALIDATION
  // ═══════════════════════════════════════════════════════════════════════

  checkMove(side: Side, from: number, to: number): ValidationResult {
    assertSide(side);
    if (!isOnBoard(from) || !isOnBoard(to)) {
      return rejected('POINT_OUT_OF_RANGE', `Points must be between 0-23 (got ${from}->${to})`);
    }
    if (this.bar[side] > 0) {
      return rejected('BAR_ENTRY_REQUIRED', 'Checkers on the bar must re-enter first');
    }
    const source = this.points_[from];
    if (source.owner !== side || source.count === 0) {
      return rejected('NOT_YOUR_CHECKER', `No ${side} checker on point ${from}`);
    }
    if (travelDistance(side, from, to) <= 0) {
      return rejected('WRONG_DIRECTION', `${side} cannot move from ${from} to ${to}`);
    }
    if (this.isBlockedFor(side, to)) {
      return rejected('POINT_BLOCKED', `Point ${to} is blocked`);
    }
    return { valid: true };
  }

  isLegalMove(side: Side, from: number, to: number): boolean {
    return this.checkMove(side, from, to).valid;
  }

  checkEntry(side: Side, point: number): ValidationResult {
    assertSide(side);
    if (this.bar[side] === 0) {
      return rejected('NO_CHECKERS_ON_BAR', `${side} has no checkers on the bar`);
    }
    if (!isInEntryRange(side, point)) {
      return rejected('NOT_IN_ENTRY_RANGE', `${side} cannot enter on point ${point}`);
    }
    if (this.isBlockedFor(side, point)) {
      return rejected('POINT_BLOCKED', `Point ${point} is blocked`);
    }
    return { valid: true };
  }

  checkBearOff(side: Side, point: number): ValidationResult {
    assertSide(side);
    if (!isOnBoard(point)) {
      return rejected('POINT_OUT_OF_RANGE', `Invalid point: ${point}`);
    }
    if (this.bar[side] > 0) {
      return rejected('BAR_ENTRY_REQUIRED', 'Checkers on the bar must re-enter first');
    }
    const source = this.points_[point];
    if (source.owner !== side || source.count === 0) {
      return rejected('NOT_YOUR_CHECKER', `No ${side} checker on point ${point}`);
    }
    if (!this.allInHomeBoard(side)) {
      return rejected('NOT_ALL_HOME', `Not all ${side} checkers are in the home board`);
    }
    return { valid: true };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // MUTATIONS
  // ═══════════════════════════════════════════════════════════════════════

  moveChecker(side: Side, from: number, to: number): BoardEvent {
    if (!this.checkMove(side, from, to).valid) {
      return { ...NOT_MOVED };
    }
    this.takeFrom(from);
    const hitSide = this.landOn(side, to);
    return { moved: true, hit: hitSide !== null, hitSide, bornOff: false };
  }

  enterFromBar(side: Side, point: number): BoardEvent {
    if (!this.checkEntry(side, point).valid) {
      return { ...NOT_MOVED };
    }
    this.bar[side] -= 1;
    const hitSide = this.landOn(side, point);
    return { moved: true, hit: hitSide !== null, hitSide, bornOff: false };
  }

  bearOff(side: Side, point: number): BoardEvent {
    if (!this.checkBearOff(side, point).valid) {
      return { ...NOT_MOVED };
    }
    this.takeFrom(point);
    this.borneOff[side] += 1;
    return { moved: true, hit: false, hitSide: null, bornOff: true };
  }

  private takeFrom(point: number): void {
    const source = this.points_[point];
    source.count -= 1;
    if (source.count === 0) {
      source.owner = null;
    }
  }

  /** Place one checker, capturing a lone opposing checker. Returns the hit side. */
  private landOn(side: Side, point: number): Side | null {
    const target = this.points_[point];
    let hitSide: Side | null = null;
    if (target.owner !== null && target.owner !== side) {
      invariant(target.count === 1, 'Landing on a blocked point', { point, side });
      hitSide = target.owner;
      this.bar[hitSide] += 1;
      target.count = 0;
    }
    target.owner = side;
    target.count += 1;
    return hitSide;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // INVARIANTS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Throws InvalidState when the board breaks occupancy or checker
   * conservation (on-board + bar + borne-off == 15 per side).
   */
  assertInvariants(): void {
    this.points_.forEach((p, index) => {
      const consistent =
        Number.isInteger(p.count) &&
        p.count >= 0 &&
        (p.count === 0) === (p.owner === null);
      if (!consistent) {
        throw new InvalidState(
          EngineErrorCode.STATE_INVALID_OCCUPANCY,
          `Point ${index} has owner ${String(p.owner)} with count ${p.count}`,
          { point: index, owner: p.owner, count: p.count }
        );
      }
    });

    for (const side of SIDES) {
      const onBoard = this.onBoardCount(side);
      const total = onBoard + this.bar[side] + this.borneOff[side];
      if (this.bar[side] < 0 || this.borneOff[side] < 0 || total !== CHECKERS_PER_SIDE) {
        throw new InvalidState(
          EngineErrorCode.STATE_CONSERVATION_VIOLATED,
          `${side} accounts for ${total} checkers instead of ${CHECKERS_PER_SIDE}`,
          { side, onBoard, bar: this.bar[side], borneOff: this.borneOff[side] }
        );
      }
    }
  }
}
