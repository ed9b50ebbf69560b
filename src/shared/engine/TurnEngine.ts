/**
 * TurnEngine - sequences a game from setup to victory.
 *
 * Owns the board, the dice, both sides' ledgers and the turn FSM. Commands
 * either apply fully or return a rejection with no state change; misuse of
 * the API (wrong phase, game already over) throws.
 *
 * Typical host loop:
 * ```typescript
 * const engine = new TurnEngine({ seed: 42 });
 * engine.initialize();
 * engine.rollForFirst();
 * while (!engine.isGameOver()) {
 *   engine.rollForTurn();
 *   while (engine.phase === 'awaiting_move_input') {
 *     const [move] = engine.legalMoves();
 *     engine.attemptMove(move.from, move.to);
 *   }
 * }
 * ```
 */

import { SeededRNG, generateGameSeed, type RandomSource } from '../utils/rng';
import { BoardState, STANDARD_LAYOUT } from './BoardState';
import { projectCheckers } from './checkerProjection';
import { parseSnapshotRecord, type PersistedPhase, type SerializedGame } from './contracts';
import { DiceSource, higherInitialRoller, isDoublesRoll, quantaFor } from './DiceSource';
import { EngineErrorCode, InvalidState, PreconditionViolation, invariant } from './errors';
import {
  TurnStateMachine,
  type Action,
  type TurnEvent,
  type TurnPhase,
  type TurnState,
} from './fsm';
import {
  destinationsFrom,
  enumerateLegalMoves,
  planBearOff,
  planEntry,
  planMove,
} from './legalMoves';
import { MoveLedger } from './MoveLedger';
import { assertSide } from './sideGeometry';
import {
  BAR,
  OFF,
  SIDES,
  SNAPSHOT_FORMAT_VERSION,
  type BarSentinel,
  type BoardEvent,
  type BoardLayout,
  type BoardSnapshot,
  type CheckerView,
  type DiceRoll,
  type EngineLogger,
  type InitialRoll,
  type LegalMove,
  type MoveOutcome,
  type MovePlan,
  type OffSentinel,
  type PerSide,
  type PointState,
  type Side,
} from './types';

export const DEFAULT_MAX_INITIAL_ROLL_ATTEMPTS = 1000;

const NOOP_LOGGER: EngineLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface TurnEngineOptions {
  /** Dice randomness. Defaults to a SeededRNG over `seed`. */
  random?: RandomSource;
  /** Seed for the default generator; a fresh one is drawn when omitted. */
  seed?: number | string;
  logger?: EngineLogger;
  /** Cap on initial-roll re-rolls after ties. */
  maxInitialRollAttempts?: number;
}

export interface FirstRollResult {
  side: Side;
  roll: InitialRoll;
  attempts: number;
}

export interface TurnRollResult {
  side: Side;
  roll: DiceRoll;
  quanta: number[];
  doubles: boolean;
  canMove: boolean;
  /** True when no legal move existed and the turn passed immediately. */
  turnEnded: boolean;
  nextSide: Side | null;
}

type AppliedMove = Extract<MoveOutcome, { ok: true }>;

export type EngineEvent =
  | { type: 'initialized' }
  | { type: 'first_side_decided'; side: Side; roll: InitialRoll; attempts: number }
  | { type: 'dice_rolled'; side: Side; roll: DiceRoll; quanta: number[]; canMove: boolean }
  | {
      type: 'move_applied';
      side: Side;
      kind: AppliedMove['kind'];
      from: AppliedMove['from'];
      to: AppliedMove['to'];
      hit: boolean;
      quantaUsed: number[];
    }
  | { type: 'turn_ended'; side: Side; nextSide: Side }
  | { type: 'game_over'; winner: Side };

export type EngineListener = (event: EngineEvent, engine: TurnEngine) => void;

/** Everything a renderer needs in one read. */
export interface EngineView {
  phase: TurnPhase;
  activeSide: Side | null;
  winner: Side | null;
  lastRoll: DiceRoll | null;
  remainingQuanta: number[];
  board: BoardSnapshot;
  pipCounts: PerSide<number>;
  checkers: CheckerView[];
  legalMoves: LegalMove[];
}

// ═══════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════

export class TurnEngine {
  private board: BoardState | null = null;
  private fsm = new TurnStateMachine();
  private readonly dice: DiceSource;
  private readonly ledgers: PerSide<MoveLedger> = {
    white: new MoveLedger(),
    black: new MoveLedger(),
  };
  private initialRoll: InitialRoll | null = null;
  private readonly listeners = new Set<EngineListener>();
  /** Events raised by the command in flight; delivered once it settles. */
  private pending: EngineEvent[] = [];
  private readonly seeded: SeededRNG | null;
  private readonly logger: EngineLogger;
  private readonly maxInitialRollAttempts: number;

  constructor(options: TurnEngineOptions = {}) {
    const random = options.random ?? new SeededRNG(options.seed ?? generateGameSeed());
    this.dice = new DiceSource(random);
    this.seeded = random instanceof SeededRNG ? random : null;
    this.logger = options.logger ?? NOOP_LOGGER;
    this.maxInitialRollAttempts =
      options.maxInitialRollAttempts ?? DEFAULT_MAX_INITIAL_ROLL_ATTEMPTS;
    if (!Number.isInteger(this.maxInitialRollAttempts) || this.maxInitialRollAttempts < 1) {
      throw new PreconditionViolation(
        EngineErrorCode.PRECONDITION_INVALID_OPTION,
        `maxInitialRollAttempts must be a positive integer, got ${this.maxInitialRollAttempts}`,
        { maxInitialRollAttempts: this.maxInitialRollAttempts },
        'TurnEngine'
      );
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // COMMANDS
  // ═══════════════════════════════════════════════════════════════════════

  /** Lay out the board (standard opening unless a layout is given). */
  initialize(layout: BoardLayout = STANDARD_LAYOUT): void {
    this.requirePhase('not_started', 'initialize');
    this.board = BoardState.fromLayout(layout);
    for (const side of SIDES) this.ledgers[side].clear();
    this.send({ type: 'INITIALIZE' });
    this.logger.info('Game initialized');
    this.emit({ type: 'initialized' });
    this.flush();
  }

  /**
   * Each side rolls one die; the higher roll moves first. Ties are re-rolled
   * up to the configured cap.
   */
  rollForFirst(): FirstRollResult {
    this.requirePhase('awaiting_initial_roll', 'rollForFirst');
    for (let attempts = 1; attempts <= this.maxInitialRollAttempts; attempts++) {
      const roll = this.dice.initialRoll();
      const outcome = higherInitialRoller(roll);
      if (outcome === 'tie') {
        this.logger.debug('Initial roll tied, re-rolling', { roll, attempts });
        continue;
      }
      this.initialRoll = roll;
      this.send({ type: 'FIRST_SIDE_DECIDED', side: outcome });
      this.logger.info('First side decided', { side: outcome, roll, attempts });
      this.emit({ type: 'first_side_decided', side: outcome, roll, attempts });
      this.flush();
      return { side: outcome, roll, attempts };
    }
    throw new InvalidState(
      EngineErrorCode.INTERNAL_INITIAL_ROLL_UNRESOLVED,
      `Initial roll still tied after ${this.maxInitialRollAttempts} attempts`,
      { attempts: this.maxInitialRollAttempts },
      'TurnEngine'
    );
  }

  /**
   * Roll for the side on turn and seed its ledger. When no legal move exists
   * the turn passes at once and nothing is consumed.
   */
  rollForTurn(): TurnRollResult {
    const state = this.requirePhase('turn_start', 'rollForTurn');
    const side = state.side;
    const board = this.requireBoard();
    const roll = this.dice.roll();
    const quanta = quantaFor(roll);
    const ledger = this.ledgers[side];
    ledger.seed(quanta);
    const canMove = enumerateLegalMoves(board, side, ledger).length > 0;

    this.send({ type: 'DICE_ROLLED', remaining: ledger.remaining(), canMove });
    this.logger.debug('Dice rolled', { side, roll, quanta, canMove });
    this.emit({ type: 'dice_rolled', side, roll, quanta, canMove });

    if (!canMove) {
      this.logger.info('No legal move, turn passes', { side, roll });
      this.endTurn(null);
    }
    this.flush();

    return {
      side,
      roll,
      quanta,
      doubles: isDoublesRoll(roll),
      canMove,
      turnEnded: !canMove,
      nextSide: canMove ? null : this.activeSide,
    };
  }

  /**
   * Move a checker. `from` is a point or `BAR` to re-enter; `to` is a point,
   * or `OFF` to bear off.
   */
  attemptMove(from: number | BarSentinel, to: number | OffSentinel): MoveOutcome {
    const state = this.requirePhase('awaiting_move_input', 'attemptMove');
    const board = this.requireBoard();
    const ledger = this.ledgers[state.side];

    if (to === OFF) {
      if (from === BAR) {
        return { ok: false, code: 'POINT_OUT_OF_RANGE', reason: 'Cannot bear off from the bar' };
      }
      return this.attemptBearOff(from);
    }

    const plan =
      from === BAR
        ? planEntry(board, state.side, ledger, to)
        : planMove(board, state.side, ledger, from, to);
    if (!plan.valid) {
      this.logger.debug('Move rejected', { side: state.side, from, to, code: plan.code });
      return { ok: false, code: plan.code, reason: plan.reason };
    }
    return this.applyPlan(plan.data);
  }

  attemptBearOff(from: number): MoveOutcome {
    const state = this.requirePhase('awaiting_move_input', 'attemptBearOff');
    const board = this.requireBoard();
    const plan = planBearOff(board, state.side, this.ledgers[state.side], from);
    if (!plan.valid) {
      this.logger.debug('Bear-off rejected', { side: state.side, from, code: plan.code });
      return { ok: false, code: plan.code, reason: plan.reason };
    }
    return this.applyPlan(plan.data);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // QUERIES
  // ═══════════════════════════════════════════════════════════════════════

  get phase(): TurnPhase {
    return this.fsm.phase;
  }

  get activeSide(): Side | null {
    return this.fsm.currentSide;
  }

  get lastRoll(): DiceRoll | null {
    return this.dice.current;
  }

  get lastInitialRoll(): InitialRoll | null {
    return this.initialRoll;
  }

  get winner(): Side | null {
    const state = this.fsm.state;
    return state.phase === 'game_over' ? state.winner : null;
  }

  isGameOver(): boolean {
    return this.fsm.phase === 'game_over';
  }

  pointAt(index: number): PointState {
    return this.requireBoard().pointAt(index);
  }

  points(): PointState[] {
    return this.requireBoard().points();
  }

  capturedCount(side: Side): number {
    return this.requireBoard().capturedCount(side);
  }

  borneOffCount(side: Side): number {
    return this.requireBoard().borneOffCount(side);
  }

  pipCount(side: Side): number {
    return this.requireBoard().pipCount(side);
  }

  /** Quanta left for `side` (the active side by default). */
  remainingQuanta(side?: Side): number[] {
    const target = side ?? this.activeSide;
    if (target === null) return [];
    assertSide(target);
    return this.ledgers[target].values();
  }

  legalMoves(): LegalMove[] {
    const state = this.fsm.state;
    if (state.phase !== 'awaiting_move_input') return [];
    return enumerateLegalMoves(this.requireBoard(), state.side, this.ledgers[state.side]);
  }

  hasLegalMove(): boolean {
    return this.legalMoves().length > 0;
  }

  destinationsFrom(from: number | BarSentinel): Array<number | OffSentinel> {
    const state = this.fsm.state;
    if (state.phase !== 'awaiting_move_input') return [];
    return destinationsFrom(this.requireBoard(), state.side, this.ledgers[state.side], from);
  }

  /** Derived per-checker view; recomputed on every call. */
  checkers(): CheckerView[] {
    return projectCheckers(this.requireBoard());
  }

  view(): EngineView {
    const board = this.requireBoard();
    return {
      phase: this.phase,
      activeSide: this.activeSide,
      winner: this.winner,
      lastRoll: this.lastRoll,
      remainingQuanta: this.remainingQuanta(),
      board: board.snapshot(),
      pipCounts: { white: board.pipCount('white'), black: board.pipCount('black') },
      checkers: projectCheckers(board),
      legalMoves: this.legalMoves(),
    };
  }

  /** Register an observer; returns the unsubscribe function. */
  subscribe(listener: EngineListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PERSISTENCE
  // ═══════════════════════════════════════════════════════════════════════

  snapshot(): SerializedGame {
    const board = this.requireBoard().snapshot();
    return {
      version: SNAPSHOT_FORMAT_VERSION,
      phase: this.persistedPhase(),
      activeSide: this.activeSide,
      points: board.points,
      bar: board.bar,
      borneOff: board.borneOff,
      ledgers: { white: this.ledgers.white.values(), black: this.ledgers.black.values() },
      lastRoll: this.dice.current,
      lastInitialRoll: this.initialRoll,
      winner: this.winner,
      rng: this.seeded === null ? null : this.seeded.state,
    };
  }

  /**
   * Rebuild an engine from a persisted record. The record is validated
   * structurally and against the board and turn invariants; anything that
   * does not describe a reachable position throws InvalidState.
   *
   * A recorded generator position resumes the dice stream unless
   * `options.random` is given.
   */
  static restore(record: unknown, options: TurnEngineOptions = {}): TurnEngine {
    const data = parseSnapshotRecord(record);
    const board = BoardState.fromSnapshot({
      points: data.points,
      bar: data.bar,
      borneOff: data.borneOff,
    });

    const fail = (message: string): never => {
      throw new InvalidState(EngineErrorCode.STATE_INVALID_SNAPSHOT, message, {
        phase: data.phase,
      });
    };

    if (board.checkWinner() !== data.winner) {
      fail(`Recorded winner ${String(data.winner)} does not match the board`);
    }
    if ((data.phase === 'game_over') !== (data.winner !== null)) {
      fail('Only a finished game may record a winner');
    }

    const resumed = data.rng === null ? undefined : new SeededRNG(data.rng.seed, data.rng.index);
    const engine = new TurnEngine({ ...options, random: options.random ?? resumed });
    engine.board = board;
    engine.dice.restore(data.lastRoll);
    engine.initialRoll = data.lastInitialRoll;
    engine.fsm = new TurnStateMachine(restoredState(data, board, engine.ledgers, fail));
    engine.logger.info('Game restored', { phase: data.phase, activeSide: data.activeSide });
    return engine;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════════════

  private applyPlan(plan: MovePlan): MoveOutcome {
    const board = this.requireBoard();
    const ledger = this.ledgers[plan.side];
    const borneOffBefore = board.borneOffCount(plan.side);

    const event = applyToBoard(board, plan);
    invariant(event !== null && event.moved, 'Validated plan was refused by the board', {
      plan: { ...plan },
    });

    let quantaUsed: number[] | null;
    if (plan.kind === 'enter' || plan.substituted) {
      quantaUsed = ledger.payQuantum(plan.distance) ? [plan.distance] : null;
    } else {
      quantaUsed = ledger.consume(plan.distance);
    }
    invariant(quantaUsed !== null, 'Validated plan could not be paid', { plan: { ...plan } });

    board.assertInvariants();
    if (board.borneOffCount(plan.side) < borneOffBefore) {
      throw new InvalidState(
        EngineErrorCode.STATE_BORNE_OFF_DECREASED,
        `${plan.side} borne-off count went from ${borneOffBefore} to ${board.borneOffCount(plan.side)}`,
        { side: plan.side }
      );
    }

    const winner = board.checkWinner();
    const remaining = ledger.remaining();
    const canMove =
      winner === null && remaining > 0 && enumerateLegalMoves(board, plan.side, ledger).length > 0;

    this.send({ type: 'MOVE_APPLIED', remaining, canMove });
    this.logger.debug('Move applied', {
      side: plan.side,
      kind: plan.kind,
      from: plan.from,
      to: plan.to,
      quantaUsed,
      hit: event.hit,
    });
    this.emit({
      type: 'move_applied',
      side: plan.side,
      kind: plan.kind,
      from: plan.from,
      to: plan.to,
      hit: event.hit,
      quantaUsed,
    });

    const turnEnded = !canMove;
    if (turnEnded) {
      this.endTurn(winner);
    }
    this.flush();

    return {
      ok: true,
      kind: plan.kind,
      side: plan.side,
      from: plan.from,
      to: plan.to,
      distance: plan.distance,
      quantaUsed,
      hit: event.hit,
      hitSide: event.hitSide,
      bornOff: event.bornOff,
      turnEnded,
      nextSide: turnEnded && winner === null ? this.activeSide : null,
      winner,
    };
  }

  /** Close the current turn and step into the next one (or game over). */
  private endTurn(winner: Side | null): void {
    this.send({ type: 'END_TURN', winner });
    this.send({ type: 'ADVANCE' });
  }

  private send(event: TurnEvent): void {
    const actions = this.fsm.send(event);
    for (const action of actions) {
      this.applyAction(action);
    }
  }

  private applyAction(action: Action): void {
    switch (action.type) {
      case 'CLEAR_LEDGER':
        this.ledgers[action.side].clear();
        break;
      case 'SWITCH_SIDE':
        this.logger.debug('Turn passes', { from: action.from, to: action.to });
        this.emit({ type: 'turn_ended', side: action.from, nextSide: action.to });
        break;
      case 'DECLARE_WINNER':
        this.logger.info('Game over', { winner: action.winner });
        this.emit({ type: 'game_over', winner: action.winner });
        break;
    }
  }

  private emit(event: EngineEvent): void {
    this.pending.push(event);
  }

  /**
   * Deliver queued events. Runs only after every FSM transition of the
   * command, so a throwing listener cannot leave a turn half-closed.
   */
  private flush(): void {
    const events = this.pending;
    this.pending = [];
    for (const event of events) {
      for (const listener of this.listeners) {
        listener(event, this);
      }
    }
  }

  private requireBoard(): BoardState {
    if (this.board === null) {
      throw new PreconditionViolation(
        EngineErrorCode.PRECONDITION_NOT_INITIALIZED,
        'Engine has not been initialized',
        {},
        'TurnEngine'
      );
    }
    return this.board;
  }

  private requirePhase<P extends TurnPhase>(
    expected: P,
    operation: string
  ): Extract<TurnState, { phase: P }> {
    const state = this.fsm.state;
    if (isPhase(state, expected)) {
      return state;
    }
    const context = { operation, phase: state.phase, expected };
    if (state.phase === 'game_over') {
      throw new PreconditionViolation(
        EngineErrorCode.PRECONDITION_GAME_OVER,
        `Cannot ${operation}: the game is over`,
        context,
        'TurnEngine'
      );
    }
    if (state.phase === 'not_started') {
      throw new PreconditionViolation(
        EngineErrorCode.PRECONDITION_NOT_INITIALIZED,
        `Cannot ${operation}: engine has not been initialized`,
        context,
        'TurnEngine'
      );
    }
    throw new PreconditionViolation(
      EngineErrorCode.PRECONDITION_WRONG_PHASE,
      `Cannot ${operation} during ${state.phase}`,
      context,
      'TurnEngine'
    );
  }

  private persistedPhase(): PersistedPhase {
    const phase = this.fsm.phase;
    invariant(
      phase !== 'turn_end' && phase !== 'not_started',
      `Phase ${phase} cannot be persisted`
    );
    return phase;
  }
}

function applyToBoard(board: BoardState, plan: MovePlan): BoardEvent | null {
  const { side, from, to } = plan;
  switch (plan.kind) {
    case 'enter':
      return typeof to === 'number' ? board.enterFromBar(side, to) : null;
    case 'move':
      return typeof from === 'number' && typeof to === 'number'
        ? board.moveChecker(side, from, to)
        : null;
    case 'bear_off':
      return typeof from === 'number' ? board.bearOff(side, from) : null;
  }
}

function isPhase<P extends TurnPhase>(
  state: TurnState,
  phase: P
): state is Extract<TurnState, { phase: P }> {
  return state.phase === phase;
}

/**
 * Turn state implied by a record, seeding the ledgers on the way. Fails on
 * combinations a running engine can never be left in between commands.
 */
function restoredState(
  data: SerializedGame,
  board: BoardState,
  ledgers: PerSide<MoveLedger>,
  fail: (message: string) => never
): TurnState {
  const active = data.activeSide;
  for (const side of SIDES) {
    const quanta = data.ledgers[side];
    if (quanta.length > 0 && (data.phase !== 'awaiting_move_input' || side !== active)) {
      fail(`${side} ledger must be empty in ${data.phase}`);
    }
    ledgers[side].seed(quanta);
  }

  switch (data.phase) {
    case 'awaiting_initial_roll':
      if (active !== null) fail('No side is active before the initial roll');
      return { phase: 'awaiting_initial_roll' };
    case 'turn_start':
      if (active === null) return fail('turn_start requires an active side');
      return { phase: 'turn_start', side: active };
    case 'awaiting_move_input': {
      if (active === null) return fail('awaiting_move_input requires an active side');
      if (data.lastRoll === null) fail('awaiting_move_input requires a last roll');
      if (data.lastRoll !== null && !isSubMultiset(data.ledgers[active], quantaFor(data.lastRoll))) {
        fail(`Ledger [${data.ledgers[active].join(', ')}] cannot come from the last roll`);
      }
      const ledger = ledgers[active];
      const canMove = enumerateLegalMoves(board, active, ledger).length > 0;
      if (ledger.isEmpty() || !canMove) {
        fail('A turn awaiting input must have a playable quantum');
      }
      return { phase: 'awaiting_move_input', side: active, remaining: ledger.remaining(), canMove };
    }
    case 'game_over':
      if (data.winner === null) return fail('game_over requires a winner');
      return { phase: 'game_over', winner: data.winner };
  }
}

/** Whether every value of `part` can be matched to a distinct value of `whole`. */
function isSubMultiset(part: readonly number[], whole: readonly number[]): boolean {
  const left = [...whole];
  for (const value of part) {
    const at = left.indexOf(value);
    if (at < 0) return false;
    left.splice(at, 1);
  }
  return true;
}
