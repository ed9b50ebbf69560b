import type winston from 'winston';
import { config } from '../config';
import { createEngineLogger, logger } from '../utils/logger';
import { FileSnapshotStore, type GameSnapshotStore } from './snapshotStore';
import type { RandomSource } from '../../shared/utils/rng';
import {
  TurnEngine,
  type EngineView,
  type FirstRollResult,
  type TurnEngineOptions,
  type TurnRollResult,
} from '../../shared/engine/TurnEngine';
import { validateMoveCommand } from '../../shared/engine/contracts';
import { isEngineError, wrapEngineError } from '../../shared/engine/errors';
import type {
  BarSentinel,
  BoardLayout,
  EngineLogger,
  LegalMove,
  MoveOutcome,
  OffSentinel,
} from '../../shared/engine/types';

export interface GameSessionOptions {
  /** Defaults to a FileSnapshotStore under SNAPSHOT_DIR. */
  store?: GameSnapshotStore;
  random?: RandomSource;
  /** Defaults to GAME_SEED when set. */
  seed?: number | string;
  maxInitialRollAttempts?: number;
  /** Base winston logger; entries are tagged with the game id. */
  baseLogger?: winston.Logger;
}

/**
 * Rejection returned for a host command that does not even have the shape
 * of a move. Carries the same fields as an engine rejection.
 */
export interface MalformedCommand {
  ok: false;
  code: 'MALFORMED_COMMAND';
  reason: string;
}

/**
 * GameSession hosts a single game:
 * - owns one TurnEngine and forwards commands to it
 * - tags every engine trace with the game id
 * - saves and restores the game through a snapshot store
 *
 * Rule rejections come back as values. Precondition and invariant errors
 * are logged with their structured context, then re-thrown.
 */
export class GameSession {
  public readonly gameId: string;
  private readonly engine: TurnEngine;
  private readonly store: GameSnapshotStore;
  private readonly log: EngineLogger;

  private constructor(
    gameId: string,
    engine: TurnEngine,
    store: GameSnapshotStore,
    log: EngineLogger
  ) {
    this.gameId = gameId;
    this.engine = engine;
    this.store = store;
    this.log = log;
  }

  static create(gameId: string, options: GameSessionOptions = {}): GameSession {
    const { log, engineOptions, store } = GameSession.resolve(gameId, options);
    const session = new GameSession(gameId, new TurnEngine(engineOptions), store, log);
    log.info('GameSession created');
    return session;
  }

  /**
   * Restore a saved game. Resolves to null when the store has no record for
   * `gameId`; a record that fails validation rejects with InvalidState.
   */
  static async load(
    gameId: string,
    store: GameSnapshotStore,
    options: Omit<GameSessionOptions, 'store'> = {}
  ): Promise<GameSession | null> {
    const { log, engineOptions } = GameSession.resolve(gameId, { ...options, store });
    const record = await store.load(gameId);
    if (record === null) {
      log.warn('No saved game found');
      return null;
    }
    const engine = GameSession.guarded(log, 'load', () => TurnEngine.restore(record, engineOptions));
    log.info('GameSession restored', { phase: engine.phase });
    return new GameSession(gameId, engine, store, log);
  }

  private static resolve(gameId: string, options: GameSessionOptions) {
    const log = createEngineLogger({ gameId }, options.baseLogger ?? logger);
    const engineOptions: TurnEngineOptions = {
      random: options.random,
      seed: options.seed ?? config.game.seed,
      maxInitialRollAttempts:
        options.maxInitialRollAttempts ?? config.game.maxInitialRollAttempts,
      logger: log,
    };
    const store = options.store ?? new FileSnapshotStore(config.snapshots.dir);
    return { log, engineOptions, store };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // COMMANDS
  // ═══════════════════════════════════════════════════════════════════════

  /** Lay out the board and decide who moves first. */
  start(layout?: BoardLayout): FirstRollResult {
    return this.run('start', () => {
      this.engine.initialize(layout);
      return this.engine.rollForFirst();
    });
  }

  roll(): TurnRollResult {
    return this.run('roll', () => this.engine.rollForTurn());
  }

  move(from: number | BarSentinel, to: number | OffSentinel): MoveOutcome {
    return this.run('move', () => this.engine.attemptMove(from, to));
  }

  bearOff(from: number): MoveOutcome {
    return this.run('bearOff', () => this.engine.attemptBearOff(from));
  }

  /**
   * Apply an untyped command, e.g. a parsed request body. Anything that is
   * not `{ from, to }` with the right member types is refused before it
   * reaches the engine.
   */
  submit(command: unknown): MoveOutcome | MalformedCommand {
    const parsed = validateMoveCommand(command);
    if (!parsed.success) {
      this.log.warn('Malformed move command', { error: parsed.error });
      return { ok: false, code: 'MALFORMED_COMMAND', reason: parsed.error };
    }
    return this.move(parsed.data.from, parsed.data.to);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // QUERIES
  // ═══════════════════════════════════════════════════════════════════════

  /** Every legal move, or just the destinations from one source. */
  hints(): LegalMove[];
  hints(from: number | BarSentinel): Array<number | OffSentinel>;
  hints(from?: number | BarSentinel): LegalMove[] | Array<number | OffSentinel> {
    return from === undefined ? this.engine.legalMoves() : this.engine.destinationsFrom(from);
  }

  view(): EngineView {
    return this.run('view', () => this.engine.view());
  }

  subscribe(...args: Parameters<TurnEngine['subscribe']>): () => void {
    return this.engine.subscribe(...args);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PERSISTENCE
  // ═══════════════════════════════════════════════════════════════════════

  async save(): Promise<void> {
    const record = this.run('save', () => this.engine.snapshot());
    await this.store.save(this.gameId, record);
    this.log.info('GameSession saved', { phase: record.phase });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // ERROR HANDLING
  // ═══════════════════════════════════════════════════════════════════════

  private run<T>(operation: string, fn: () => T): T {
    return GameSession.guarded(this.log, operation, fn);
  }

  private static guarded<T>(log: EngineLogger, operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      const error = isEngineError(err) ? err : wrapEngineError(err, 'GameSession');
      log.error(`${operation} failed`, { error: error.toJSON() });
      throw err;
    }
  }
}
