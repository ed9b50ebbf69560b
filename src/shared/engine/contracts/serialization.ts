/**
 * ═══════════════════════════════════════════════════════════════════════════
 * Serialization Utilities for Engine Contracts
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * The persisted form of a game is one flat, JSON-safe record. The engine
 * produces it with `TurnEngine.snapshot()` and rebuilds from it with
 * `TurnEngine.restore()`; this module owns the record's shape and the
 * JSON text round trip.
 */

import type { RngState } from '../../utils/rng';
import { EngineErrorCode, InvalidState } from '../errors';
import type { DiceRoll, InitialRoll, PerSide, Side, SNAPSHOT_FORMAT_VERSION } from '../types';
import { validateSerializedGame } from './validators';

// ═══════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Phases a record can be taken in. An engine has no board before
 * `initialize()`, and `turn_end` is transient inside a command, so neither
 * is ever persisted.
 */
export type PersistedPhase =
  | 'awaiting_initial_roll'
  | 'turn_start'
  | 'awaiting_move_input'
  | 'game_over';

export interface SerializedGame {
  version: typeof SNAPSHOT_FORMAT_VERSION;
  phase: PersistedPhase;
  activeSide: Side | null;
  /** 24 `[owner, count]` tuples indexed by point. */
  points: Array<[Side | null, number]>;
  bar: PerSide<number>;
  borneOff: PerSide<number>;
  ledgers: PerSide<number[]>;
  lastRoll: DiceRoll | null;
  lastInitialRoll: InitialRoll | null;
  winner: Side | null;
  /** Position of the default dice generator; null for an injected source. */
  rng: RngState | null;
}

// ═══════════════════════════════════════════════════════════════════════════
// Serialization Functions
// ═══════════════════════════════════════════════════════════════════════════

export function serializeGameToJson(record: SerializedGame, pretty = false): string {
  return JSON.stringify(record, null, pretty ? 2 : undefined);
}

/**
 * Parse and structurally validate a JSON record. Malformed text or a record
 * of the wrong shape is an InvalidState.
 */
export function deserializeGameFromJson(json: string): SerializedGame {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new InvalidState(
      EngineErrorCode.STATE_INVALID_SNAPSHOT,
      `Snapshot is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      {},
      'Serialization'
    );
  }
  return parseSnapshotRecord(raw);
}

export function parseSnapshotRecord(raw: unknown): SerializedGame {
  const result = validateSerializedGame(raw);
  if (!result.success) {
    throw new InvalidState(
      EngineErrorCode.STATE_INVALID_SNAPSHOT,
      `Invalid snapshot: ${result.error}`,
      {},
      'Serialization'
    );
  }
  return result.data;
}
