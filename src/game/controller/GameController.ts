/**
 * GameController.ts
 * Runs one human-vs-bot session
 *
 * ARCHITECTURE:
 * - Single source of truth: the TableEngine
 * - Engine events feed the stats aggregator and the hand history recorder
 * - Bot turns run synchronously inside startHand() / submit()
 * - Subscribers receive a frozen SessionSnapshot after every transition
 *
 * Lifetime stats are loaded from the store when the session opens and
 * written back by saveStats().
 */

import { Deck } from '../engine/Deck';
import { Action, PlayerId } from '../engine/TableState';
import { IllegalActionError } from '../engine/EngineErrors';
import { TableEngine, createTableEngine } from '../engine/GameLoop';
import { createSeededRng, deriveSeed, generateRandomSeed } from '../engine/Random';
import { GameConfig, getStartingChips } from '../config/GameConfig';
import { StatsAggregator, createStatsAggregator } from '../stats/StatsAggregator';
import { LifetimeCounters, StatsSnapshot } from '../stats/StatsTypes';
import { PersistenceError, StatsStore, StoreResult } from '../persistence/PersistenceTypes';
import { RuleBasedBot, createRuleBasedBot } from './RuleBasedBot';
import { HandHistory, HandHistoryRecorder } from './HandHistory';
import { SessionSnapshot, SnapshotListener, createSessionSnapshot } from './SessionSnapshot';

// ============================================================================
// Types
// ============================================================================

export interface GameControllerOptions {
  readonly config: GameConfig;
  readonly store: StatsStore;
  /** Lifetime counters to continue from; zero when omitted */
  readonly lifetime?: LifetimeCounters;
  /** Replaces the shuffled deck, for scripted hands */
  readonly deckFactory?: (handNumber: number) => Deck;
}

export type SubmitResult =
  | { readonly success: true; readonly snapshot: SessionSnapshot }
  | { readonly success: false; readonly error: IllegalActionError };

// Stream index of the bot's random source within the session seed
const BOT_RNG_STREAM = 1;

// ============================================================================
// GameController Class
// ============================================================================

export class GameController {
  private readonly config: GameConfig;
  private readonly seed: number;
  private readonly engine: TableEngine;
  private readonly bot: RuleBasedBot;
  private readonly stats: StatsAggregator;
  private readonly history: HandHistoryRecorder;
  private readonly store: StatsStore;
  private readonly listeners: Set<SnapshotListener>;
  private snapshot: SessionSnapshot;

  constructor(options: GameControllerOptions) {
    this.config = options.config;
    this.seed = options.config.seed ?? generateRandomSeed();
    this.store = options.store;
    this.listeners = new Set();

    this.engine = createTableEngine(
      { startingStack: getStartingChips(this.config) },
      { rng: createSeededRng(this.seed), deckFactory: options.deckFactory }
    );
    this.bot = createRuleBasedBot({
      aggression: this.config.aggression,
      rng: createSeededRng(deriveSeed(this.seed, BOT_RNG_STREAM)),
    });
    this.stats = createStatsAggregator({ trackedPlayer: 'human', lifetime: options.lifetime });
    this.history = new HandHistoryRecorder();

    this.engine.onEvent(event => {
      this.stats.consume(event);
      this.history.record(event);
    });

    this.snapshot = this.buildSnapshot();
  }

  // ============================================================================
  // Public API
  // ============================================================================

  getSeed(): number {
    return this.seed;
  }

  getSnapshot(): SessionSnapshot {
    return this.snapshot;
  }

  getStats(): StatsSnapshot {
    return this.stats.snapshot();
  }

  getHandHistory(): readonly HandHistory[] {
    return this.history.getFinishedHands();
  }

  isSessionOver(): boolean {
    return this.engine.isSessionOver();
  }

  /**
   * Subscribe to snapshots; returns an unsubscribe function
   */
  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Deal the next hand and play the bot's turns up to the human's decision
   *
   * @throws EngineError when a hand is running or a player is out of chips
   */
  nextHand(): SessionSnapshot {
    this.engine.startHand();
    this.publish();
    this.runBotTurns();
    return this.snapshot;
  }

  /**
   * Apply the human's action, then any bot turns that follow it
   */
  submit(action: Action): SubmitResult {
    const result = this.engine.apply('human', action);
    if (!result.success) {
      return { success: false, error: result.error };
    }
    this.publish();
    this.runBotTurns();
    return { success: true, snapshot: this.snapshot };
  }

  /**
   * Write the human's lifetime counters to the store
   */
  async saveStats(): Promise<StoreResult> {
    return this.store.saveLifetimeStats(this.stats.getLifetimeCounters());
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private runBotTurns(): void {
    let toAct: PlayerId | null = this.engine.getCurrentPlayer();
    while (toAct === 'bot') {
      const action = this.bot.decide(this.engine.getPlayerView('bot'));
      const result = this.engine.apply('bot', action);
      if (!result.success) {
        // Decisions are projected onto the legal set before they are returned
        throw result.error;
      }
      this.publish();
      toAct = this.engine.getCurrentPlayer();
    }
  }

  private buildSnapshot(): SessionSnapshot {
    return createSessionSnapshot(
      this.engine.getState(),
      this.history.getCurrentHand().entries,
      this.stats.snapshot(),
      this.engine.isSessionOver()
    );
  }

  private publish(): void {
    this.snapshot = this.buildSnapshot();
    for (const listener of this.listeners) {
      listener(this.snapshot);
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

export interface OpenedSession {
  readonly controller: GameController;
  /** Set when stored stats could not be used and the session starts from zero */
  readonly warning: PersistenceError | null;
}

/**
 * Load lifetime stats from the store and open a session on top of them
 */
export async function openGameSession(
  options: Omit<GameControllerOptions, 'lifetime'>
): Promise<OpenedSession> {
  const loaded = await options.store.loadLifetimeStats();
  return {
    controller: new GameController({ ...options, lifetime: loaded.counters }),
    warning: loaded.warning,
  };
}
