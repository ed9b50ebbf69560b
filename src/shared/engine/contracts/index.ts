/**
 * Contracts Module - persisted record shape and boundary validation
 */

export {
  serializeGameToJson,
  deserializeGameFromJson,
  parseSnapshotRecord,
  type SerializedGame,
  type PersistedPhase,
} from './serialization';

export {
  ZodSideSchema,
  ZodDiceRollSchema,
  ZodInitialRollSchema,
  ZodPersistedPhaseSchema,
  ZodSerializedGameSchema,
  ZodMoveCommandSchema,
  validateSerializedGame,
  parseSerializedGame,
  validateMoveCommand,
  parseMoveCommand,
  formatZodError,
  type ZodMoveCommand,
} from './validators';
