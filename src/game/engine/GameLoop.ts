/**
 * GameLoop.ts
 * Heads-up hand orchestration
 *
 * Drives a hand through its phases:
 * blinds → hole cards → betting rounds → (runout) → showdown | fold → settlement
 *
 * The engine owns one TableState and replaces it on every transition. It is
 * synchronous: startHand() and apply() do all the work for one call and
 * return the events they produced.
 */

import { Deck } from './Deck';
import { Rng, createSeededRng, generateRandomSeed } from './Random';
import { compareHandValues } from './HandRank';
import { evaluateHoldem } from './HandEvaluator';
import {
  TableState,
  PlayerId,
  Seat,
  Position,
  Street,
  Action,
  LegalAction,
  HandResult,
  HandResolution,
  ShowdownHand,
  createSeat,
  createTableState,
  getBigBlindPlayer,
  getCallAmount,
  getStackTotal,
  opponentOf,
  updateSeat,
  commitChips,
  isAllIn,
} from './TableState';
import {
  getLegalActions,
  validateAction,
  applyAction,
  isBettingRoundClosed,
  getUncalledBet,
  hasFolded,
} from './BettingRound';
import {
  EngineEvent,
  EngineEventEmitter,
  EventMeta,
  createEngineEventEmitter,
  createHandStartedEvent,
  createBlindPostedEvent,
  createHoleCardsDealtEvent,
  createPlayerToActEvent,
  createPlayerActedEvent,
  createUncalledBetReturnedEvent,
  createStreetDealtEvent,
  createShowdownEvent,
  createPotAwardedEvent,
  createHandCompletedEvent,
} from './GameEvents';
import {
  EngineError,
  EngineErrorCode,
  IllegalActionError,
  ChipConservationError,
} from './EngineErrors';
import { PlayerView, createPlayerView } from './PlayerView';

// ============================================================================
// Types
// ============================================================================

export interface TableEngineConfig {
  /** Starting stack in chips for each player */
  readonly startingStack: number;
  readonly smallBlind?: number;
  readonly bigBlind?: number;
}

export interface TableEngineOptions {
  /** Shuffle source; a random seed is drawn when omitted */
  readonly rng?: Rng;
  /** Supplies the deck for each hand, replacing the shuffle */
  readonly deckFactory?: (handNumber: number) => Deck;
}

export type ApplyResult =
  | { readonly success: true; readonly events: readonly EngineEvent[] }
  | { readonly success: false; readonly error: IllegalActionError };

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_SMALL_BLIND = 1;
export const DEFAULT_BIG_BLIND = 2;

const NEXT_STREET: Record<'preflop' | 'flop' | 'turn', 'flop' | 'turn' | 'river'> = {
  preflop: 'flop',
  flop: 'turn',
  turn: 'river',
};

// ============================================================================
// Table Engine
// ============================================================================

export class TableEngine {
  private state: TableState;
  private deck: Deck | null;
  private readonly rng: Rng;
  private readonly deckFactory?: (handNumber: number) => Deck;
  private readonly eventEmitter: EngineEventEmitter;
  private sequence: number;
  private collected: EngineEvent[];

  constructor(config: TableEngineConfig, options: TableEngineOptions = {}) {
    const smallBlind = config.smallBlind ?? DEFAULT_SMALL_BLIND;
    const bigBlind = config.bigBlind ?? DEFAULT_BIG_BLIND;
    if (!Number.isInteger(config.startingStack) || config.startingStack <= 0) {
      throw new EngineError(
        EngineErrorCode.INVALID_TABLE_CONFIG,
        `Starting stack must be a positive whole number, got ${config.startingStack}`
      );
    }

    this.state = createTableState(config.startingStack, smallBlind, bigBlind);
    this.deck = null;
    this.rng = options.rng ?? createSeededRng(generateRandomSeed());
    this.deckFactory = options.deckFactory;
    this.eventEmitter = createEngineEventEmitter();
    this.sequence = 0;
    this.collected = [];
  }

  // ==========================================================================
  // Event Management
  // ==========================================================================

  onEvent(listener: (event: EngineEvent) => void): () => void {
    return this.eventEmitter.on(listener);
  }

  private nextMeta(): EventMeta {
    return { handNumber: this.state.handNumber, sequence: ++this.sequence };
  }

  private emit(event: EngineEvent): void {
    this.collected.push(event);
    this.eventEmitter.emit(event);
  }

  private drainCollected(): readonly EngineEvent[] {
    const events = this.collected;
    this.collected = [];
    return events;
  }

  // ==========================================================================
  // Hand Lifecycle
  // ==========================================================================

  /**
   * Start the next hand. The button moves every hand; the human has it on
   * hand 1.
   */
  startHand(): readonly EngineEvent[] {
    if (this.state.phase === 'betting') {
      throw new EngineError(EngineErrorCode.HAND_IN_PROGRESS, 'A hand is already in progress');
    }
    if (this.isSessionOver()) {
      throw new EngineError(EngineErrorCode.SESSION_OVER, 'A player has no chips left', {
        stacks: this.getStacks(),
      });
    }

    const previous = this.state;
    const handNumber = previous.handNumber + 1;
    const button = opponentOf(previous.button);
    const positionOf = (id: PlayerId): Position => (id === button ? 'button' : 'big-blind');

    this.deck = this.deckFactory ? this.deckFactory(handNumber) : Deck.shuffled(this.rng);
    this.state = {
      ...previous,
      handNumber,
      phase: 'betting',
      street: 'preflop',
      button,
      seats: {
        human: createSeat('human', positionOf('human'), previous.seats.human.stack),
        bot: createSeat('bot', positionOf('bot'), previous.seats.bot.stack),
      },
      board: [],
      pot: 0,
      currentBet: 0,
      lastRaiseSize: previous.bigBlind,
      toAct: button,
      preflopAggressor: null,
      actions: [],
      result: null,
    };

    const bigBlindPlayer = getBigBlindPlayer(this.state);
    this.emit(createHandStartedEvent(
      this.nextMeta(),
      button,
      bigBlindPlayer,
      this.getStacks(),
      this.state.smallBlind,
      this.state.bigBlind
    ));

    this.postBlind(button, this.state.smallBlind);
    this.postBlind(bigBlindPlayer, this.state.bigBlind);
    this.dealHoleCards(button, bigBlindPlayer);

    this.progress();
    this.assertChipConservation();
    return this.drainCollected();
  }

  /**
   * Blinds are posted up to the player's stack
   */
  private postBlind(playerId: PlayerId, blind: number): void {
    const amount = Math.min(blind, this.state.seats[playerId].stack);
    this.state = commitChips(this.state, playerId, amount);
    const seat = this.state.seats[playerId];
    this.emit(createBlindPostedEvent(this.nextMeta(), playerId, seat.position, amount, seat.stack === 0));
  }

  private dealHoleCards(button: PlayerId, bigBlindPlayer: PlayerId): void {
    const deck = this.requireDeck();
    const buttonCards = deck.drawMany(2);
    const bigBlindCards = deck.drawMany(2);
    this.state = updateSeat(this.state, button, { holeCards: buttonCards });
    this.state = updateSeat(this.state, bigBlindPlayer, { holeCards: bigBlindCards });

    this.emit(createHoleCardsDealtEvent(this.nextMeta(), {
      human: this.state.seats.human.holeCards,
      bot: this.state.seats.bot.holeCards,
    }));
  }

  /**
   * Submit an action for a player. Illegal actions leave the state untouched.
   */
  apply(playerId: PlayerId, action: Action): ApplyResult {
    const error = validateAction(this.state, playerId, action);
    if (error) {
      return { success: false, error };
    }

    const { state, record } = applyAction(this.state, playerId, action);
    this.state = { ...state, toAct: opponentOf(playerId) };
    this.emit(createPlayerActedEvent(this.nextMeta(), record, this.state.pot));

    this.progress();
    this.assertChipConservation();
    return { success: true, events: this.drainCollected() };
  }

  // ==========================================================================
  // Progression
  // ==========================================================================

  /**
   * Advance until a seat must act or the hand is resolved
   */
  private progress(): void {
    for (;;) {
      if (!isBettingRoundClosed(this.state)) {
        const toAct = this.pickToAct(this.state.toAct ?? getBigBlindPlayer(this.state));
        this.state = { ...this.state, toAct };
        this.emit(createPlayerToActEvent(
          this.nextMeta(),
          toAct,
          this.state.street,
          getCallAmount(this.state, toAct),
          this.state.pot,
          getLegalActions(this.state)
        ));
        return;
      }

      this.closeBettingRound();

      if (hasFolded(this.state)) {
        this.awardUncontested();
        return;
      }
      if (this.state.street === 'river') {
        this.resolveShowdown();
        return;
      }
      if (isAllIn(this.state.seats.human) || isAllIn(this.state.seats.bot)) {
        this.runOutBoard();
        this.resolveShowdown();
        return;
      }

      this.dealNextStreet(false);
    }
  }

  /**
   * The preferred seat acts unless it has nothing left to decide
   */
  private pickToAct(preferred: PlayerId): PlayerId {
    return this.needsToAct(preferred) ? preferred : opponentOf(preferred);
  }

  private needsToAct(playerId: PlayerId): boolean {
    const seat = this.state.seats[playerId];
    const opponent = this.state.seats[opponentOf(playerId)];
    if (seat.folded || seat.stack === 0) return false;
    if (seat.streetCommitted < this.state.currentBet) return true;
    return !seat.hasActed && opponent.stack > 0;
  }

  /**
   * Return uncalled chips and reset the street's betting state
   */
  private closeBettingRound(): void {
    const uncalled = getUncalledBet(this.state);
    if (uncalled) {
      const seat = this.state.seats[uncalled.playerId];
      this.state = updateSeat(this.state, uncalled.playerId, {
        stack: seat.stack + uncalled.amount,
        streetCommitted: seat.streetCommitted - uncalled.amount,
        handCommitted: seat.handCommitted - uncalled.amount,
      });
      this.state = {
        ...this.state,
        pot: this.state.pot - uncalled.amount,
        currentBet: this.state.currentBet - uncalled.amount,
      };
      this.emit(createUncalledBetReturnedEvent(this.nextMeta(), uncalled.playerId, uncalled.amount));
    }

    this.state = {
      ...this.state,
      currentBet: 0,
      lastRaiseSize: this.state.bigBlind,
      toAct: null,
      seats: {
        human: { ...this.state.seats.human, streetCommitted: 0, hasActed: false },
        bot: { ...this.state.seats.bot, streetCommitted: 0, hasActed: false },
      },
    };
  }

  private dealNextStreet(runout: boolean): void {
    const street = this.state.street;
    if (street !== 'preflop' && street !== 'flop' && street !== 'turn') {
      return;
    }
    const next = NEXT_STREET[street];
    const cards = this.requireDeck().drawMany(next === 'flop' ? 3 : 1);
    const board = [...this.state.board, ...cards];

    this.state = {
      ...this.state,
      street: next,
      board,
      // Big blind acts first after the flop
      toAct: runout ? null : getBigBlindPlayer(this.state),
    };
    this.emit(createStreetDealtEvent(this.nextMeta(), next, cards, board, this.state.pot, runout));
  }

  private runOutBoard(): void {
    while (this.state.board.length < 5) {
      this.dealNextStreet(true);
    }
  }

  // ==========================================================================
  // Resolution
  // ==========================================================================

  private awardUncontested(): void {
    const winner: PlayerId = this.state.seats.human.folded ? 'bot' : 'human';
    const pot = this.state.pot;
    this.emit(createPotAwardedEvent(this.nextMeta(), winner, pot, null));
    this.finishHand('fold', [winner], { human: winner === 'human' ? pot : 0, bot: winner === 'bot' ? pot : 0 }, []);
  }

  /**
   * Compare both hands; a split gives the odd chip to the button
   */
  private resolveShowdown(): void {
    const board = this.state.board;
    const hands: ShowdownHand[] = [this.state.button, getBigBlindPlayer(this.state)].map(playerId => ({
      playerId,
      holeCards: this.state.seats[playerId].holeCards,
      evaluation: evaluateHoldem(this.state.seats[playerId].holeCards, board),
    }));
    this.state = { ...this.state, street: 'showdown', toAct: null };
    this.emit(createShowdownEvent(this.nextMeta(), hands, board));

    const [buttonHand, bigBlindHand] = hands;
    const comparison = compareHandValues(buttonHand.evaluation.value, bigBlindHand.evaluation.value);
    const pot = this.state.pot;
    const payouts: Record<PlayerId, number> = { human: 0, bot: 0 };
    let winners: PlayerId[];

    if (comparison === 0) {
      const half = Math.floor(pot / 2);
      payouts[buttonHand.playerId] = pot - half;
      payouts[bigBlindHand.playerId] = half;
      winners = [buttonHand.playerId, bigBlindHand.playerId];
    } else {
      const winner = comparison > 0 ? buttonHand : bigBlindHand;
      payouts[winner.playerId] = pot;
      winners = [winner.playerId];
    }

    for (const hand of hands) {
      if (payouts[hand.playerId] > 0) {
        this.emit(createPotAwardedEvent(
          this.nextMeta(),
          hand.playerId,
          payouts[hand.playerId],
          hand.evaluation.description
        ));
      }
    }

    this.finishHand('showdown', winners, payouts, hands);
  }

  private finishHand(
    resolution: HandResolution,
    winners: readonly PlayerId[],
    payouts: Readonly<Record<PlayerId, number>>,
    showdown: readonly ShowdownHand[]
  ): void {
    const { human, bot } = this.state.seats;
    const settle = (seat: Seat): Seat => ({ ...seat, stack: seat.stack + payouts[seat.playerId] });

    const result: HandResult = {
      handNumber: this.state.handNumber,
      resolution,
      winners,
      pot: this.state.pot,
      payouts,
      net: {
        human: payouts.human - human.handCommitted,
        bot: payouts.bot - bot.handCommitted,
      },
      showdown,
      board: this.state.board,
      finalStreet: this.state.street,
      button: this.state.button,
      bigBlind: this.state.bigBlind,
    };

    this.state = {
      ...this.state,
      phase: 'complete',
      toAct: null,
      pot: 0,
      seats: { human: settle(human), bot: settle(bot) },
      result,
    };
    this.deck = null;

    this.assertChipConservation();
    this.emit(createHandCompletedEvent(this.nextMeta(), result, this.getStacks()));
  }

  // ==========================================================================
  // Invariants
  // ==========================================================================

  private assertChipConservation(): void {
    const actual = getStackTotal(this.state) + this.state.pot;
    if (actual !== this.state.totalChips) {
      throw new ChipConservationError(this.state.totalChips, actual, this.state.handNumber);
    }
  }

  private requireDeck(): Deck {
    if (!this.deck) {
      throw new EngineError(EngineErrorCode.DECK_EXHAUSTED, 'No deck for the current hand');
    }
    return this.deck;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Current state. State objects are never mutated once handed out.
   */
  getState(): TableState {
    return this.state;
  }

  getLegalActions(): LegalAction[] {
    return getLegalActions(this.state);
  }

  getPlayerView(playerId: PlayerId): PlayerView {
    return createPlayerView(this.state, playerId);
  }

  getCurrentPlayer(): PlayerId | null {
    return this.state.phase === 'betting' ? this.state.toAct : null;
  }

  getStreet(): Street {
    return this.state.street;
  }

  getStacks(): Readonly<Record<PlayerId, number>> {
    return { human: this.state.seats.human.stack, bot: this.state.seats.bot.stack };
  }

  getHandResult(): HandResult | null {
    return this.state.result;
  }

  isHandInProgress(): boolean {
    return this.state.phase === 'betting';
  }

  isHandComplete(): boolean {
    return this.state.phase === 'complete';
  }

  /**
   * No further hand can be dealt once a player is out of chips
   */
  isSessionOver(): boolean {
    return this.state.phase !== 'betting'
      && (this.state.seats.human.stack === 0 || this.state.seats.bot.stack === 0);
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createTableEngine(
  config: TableEngineConfig,
  options: TableEngineOptions = {}
): TableEngine {
  return new TableEngine(config, options);
}
