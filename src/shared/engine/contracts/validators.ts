/**
 * ═══════════════════════════════════════════════════════════════════════════
 * Runtime Validators for Engine Contracts
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Zod-based validation for data that crosses the engine boundary: persisted
 * snapshots and move commands coming from a host.
 *
 * Each schema has two validation functions:
 * - validate*: Returns { success: true, data } | { success: false, error }
 * - parse*: Throws on invalid data, returns typed data on success
 */

import { z } from 'zod';
import {
  CHECKERS_PER_SIDE,
  DIE_FACES,
  MAX_QUANTA,
  POINT_COUNT,
  SNAPSHOT_FORMAT_VERSION,
} from '../types';
import type { SerializedGame } from './serialization';

// ═══════════════════════════════════════════════════════════════════════════
// Primitive Schemas
// ═══════════════════════════════════════════════════════════════════════════

export const ZodSideSchema = z.enum(['white', 'black']);

const ZodCountSchema = z.number().int().min(0).max(CHECKERS_PER_SIDE);

const ZodFaceSchema = z.number().int().min(1).max(DIE_FACES);

export const ZodDiceRollSchema = z.object({
  die1: ZodFaceSchema,
  die2: ZodFaceSchema,
});

export const ZodInitialRollSchema = z.object({
  white: ZodFaceSchema,
  black: ZodFaceSchema,
});

const ZodPerSideCountSchema = z.object({
  white: ZodCountSchema,
  black: ZodCountSchema,
});

// ═══════════════════════════════════════════════════════════════════════════
// Snapshot Schema & Validators
// ═══════════════════════════════════════════════════════════════════════════

export const ZodPersistedPhaseSchema = z.enum([
  'awaiting_initial_roll',
  'turn_start',
  'awaiting_move_input',
  'game_over',
]);

export const ZodSerializedGameSchema: z.ZodType<SerializedGame> = z.object({
  version: z.literal(SNAPSHOT_FORMAT_VERSION),
  phase: ZodPersistedPhaseSchema,
  activeSide: ZodSideSchema.nullable(),
  points: z.array(z.tuple([ZodSideSchema.nullable(), ZodCountSchema])).length(POINT_COUNT),
  bar: ZodPerSideCountSchema,
  borneOff: ZodPerSideCountSchema,
  ledgers: z.object({
    white: z.array(ZodFaceSchema).max(MAX_QUANTA),
    black: z.array(ZodFaceSchema).max(MAX_QUANTA),
  }),
  lastRoll: ZodDiceRollSchema.nullable(),
  lastInitialRoll: ZodInitialRollSchema.nullable(),
  winner: ZodSideSchema.nullable(),
  rng: z
    .object({
      seed: z.union([z.string(), z.number().finite()]),
      index: z.number().int().min(0),
    })
    .nullable(),
});

export function validateSerializedGame(
  data: unknown
): { success: true; data: SerializedGame } | { success: false; error: string } {
  const result = ZodSerializedGameSchema.safeParse(data);
  if (!result.success) {
    return { success: false, error: formatZodError(result.error) };
  }
  return { success: true, data: result.data };
}

export function parseSerializedGame(data: unknown): SerializedGame {
  return ZodSerializedGameSchema.parse(data);
}

// ═══════════════════════════════════════════════════════════════════════════
// Move Command Schema & Validators
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A command as a host receives it. `from` is a point index or the bar
 * sentinel; `to` is a point index or 'off'.
 */
export const ZodMoveCommandSchema = z.object({
  from: z.union([z.number().int(), z.literal('bar')]),
  to: z.union([z.number().int(), z.literal('off')]),
});

export type ZodMoveCommand = z.infer<typeof ZodMoveCommandSchema>;

export function validateMoveCommand(
  data: unknown
): { success: true; data: ZodMoveCommand } | { success: false; error: string } {
  const result = ZodMoveCommandSchema.safeParse(data);
  if (!result.success) {
    return { success: false, error: formatZodError(result.error) };
  }
  return { success: true, data: result.data };
}

export function parseMoveCommand(data: unknown): ZodMoveCommand {
  return ZodMoveCommandSchema.parse(data);
}

// ═══════════════════════════════════════════════════════════════════════════
// Error Formatting
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Flatten a ZodError into one line: `path: message; path: message`.
 */
export function formatZodError(error: z.ZodError): string {
  if (error.issues.length === 0) {
    return error.message || 'Invalid data';
  }
  return error.issues
    .map((issue) => {
      const path = issue.path.map((seg) => String(seg)).join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
