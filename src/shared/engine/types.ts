/**
 * Core types for the backgammon rules engine.
 *
 * Points are indexed 0..23. White (side A) travels from low to high indices
 * and bears off past point 23; black (side B) travels from high to low and
 * bears off past point 0.
 */

// ═══════════════════════════════════════════════════════════════════════════
// SIDES & CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export type Side = 'white' | 'black';

export const SIDES: readonly Side[] = ['white', 'black'];

export const POINT_COUNT = 24;
export const CHECKERS_PER_SIDE = 15;
export const HOME_SIZE = 6;
export const DIE_FACES = 6;
export const MAX_QUANTA = 4;

/** Version stamped on persisted game records. */
export const SNAPSHOT_FORMAT_VERSION = 1;

/** Sentinel used as the `from` of a move that re-enters from the bar. */
export const BAR = 'bar' as const;
export type BarSentinel = typeof BAR;

/** Destination marker for a bear-off in hints and legal-move lists. */
export const OFF = 'off' as const;
export type OffSentinel = typeof OFF;

// ═══════════════════════════════════════════════════════════════════════════
// BOARD
// ═══════════════════════════════════════════════════════════════════════════

export interface PointState {
  readonly owner: Side | null;
  readonly count: number;
}

export type PerSide<T> = Record<Side, T>;

/**
 * Sparse description of a position, used for setup and tests.
 * Omitted points are empty; omitted bar/borne-off counts are zero.
 */
export interface BoardLayout {
  points: ReadonlyArray<{ point: number; side: Side; count: number }>;
  bar?: Partial<PerSide<number>>;
  borneOff?: Partial<PerSide<number>>;
}

/** Dense, JSON-safe copy of the board. */
export interface BoardSnapshot {
  points: Array<[Side | null, number]>;
  bar: PerSide<number>;
  borneOff: PerSide<number>;
}

/**
 * What a board mutation did. `moved` is false when the call was rejected;
 * nothing else changed in that case.
 */
export interface BoardEvent {
  moved: boolean;
  hit: boolean;
  hitSide: Side | null;
  bornOff: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════
// DICE
// ═══════════════════════════════════════════════════════════════════════════

export interface DiceRoll {
  readonly die1: number;
  readonly die2: number;
}

/** One die per side, used only to decide who starts. */
export interface InitialRoll {
  readonly white: number;
  readonly black: number;
}

export type InitialRollOutcome = Side | 'tie';

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Reasons a move, entry or bear-off can be refused by the rules. These are
 * ordinary input failures: the caller re-prompts and nothing changes.
 */
export type MoveRejectionCode =
  | 'POINT_OUT_OF_RANGE'
  | 'BAR_ENTRY_REQUIRED'
  | 'NO_CHECKERS_ON_BAR'
  | 'NOT_YOUR_CHECKER'
  | 'WRONG_DIRECTION'
  | 'DICE_MISMATCH'
  | 'POINT_BLOCKED'
  | 'NOT_IN_ENTRY_RANGE'
  | 'NOT_ALL_HOME'
  | 'BEAR_OFF_NOT_FURTHEST';

export type ValidationResult =
  | { valid: true }
  | { valid: false; code: MoveRejectionCode; reason: string };

export type ValidationOutcome<T> =
  | { valid: true; data: T }
  | { valid: false; code: MoveRejectionCode; reason: string };

// ═══════════════════════════════════════════════════════════════════════════
// MOVES
// ═══════════════════════════════════════════════════════════════════════════

export type MoveKind = 'move' | 'enter' | 'bear_off';

/**
 * A validated, not yet applied, action. `distance` is what the ledger is
 * charged; for a substituted bear-off it is the larger quantum used.
 */
export interface MovePlan {
  kind: MoveKind;
  side: Side;
  from: number | BarSentinel;
  to: number | OffSentinel;
  distance: number;
  substituted: boolean;
}

export interface LegalMove {
  kind: MoveKind;
  from: number | BarSentinel;
  to: number | OffSentinel;
  distance: number;
}

export type MoveOutcome =
  | {
      ok: true;
      kind: MoveKind;
      side: Side;
      from: number | BarSentinel;
      to: number | OffSentinel;
      distance: number;
      quantaUsed: number[];
      hit: boolean;
      hitSide: Side | null;
      bornOff: boolean;
      turnEnded: boolean;
      nextSide: Side | null;
      winner: Side | null;
    }
  | { ok: false; code: MoveRejectionCode; reason: string };

// ═══════════════════════════════════════════════════════════════════════════
// PROJECTION
// ═══════════════════════════════════════════════════════════════════════════

export type CheckerStatus = 'on_board' | 'on_bar' | 'borne_off';

/** Read-only per-piece view derived from the board for renderers. */
export interface CheckerView {
  readonly id: string;
  readonly side: Side;
  readonly status: CheckerStatus;
  readonly point: number | null;
}

// ═══════════════════════════════════════════════════════════════════════════
// LOGGING
// ═══════════════════════════════════════════════════════════════════════════

export type LogMeta = Record<string, unknown>;

/**
 * Minimal logger the engine writes traces to. The engine never picks an
 * implementation itself; hosts pass one in.
 */
export interface EngineLogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}
