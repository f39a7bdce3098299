/**
 * StatsAggregator.ts
 * Session and lifetime statistics from the engine event stream
 *
 * Per-hand flags (VPIP, PFR, 3-bet, c-bet, fold to c-bet) are staged while
 * the hand runs and committed once it completes, so each counts at most once
 * per hand. Postflop bets, raises and calls are counted as they happen. A
 * hand abandoned before completion only contributes those action counts.
 *
 * Pure with respect to the outside world: no I/O, no logging.
 */

import {
  EngineEvent,
  HandStartedEvent,
  HandCompletedEvent,
} from '../engine/GameEvents';
import { ActionRecord, PlayerId, PLAYER_IDS, opponentOf } from '../engine/TableState';
import {
  CounterKey,
  LifetimeCounters,
  Mutable,
  StatsCounters,
  StatsSnapshot,
  createEmptyCounters,
  createEmptyLifetimeCounters,
  createStatLine,
} from './StatsTypes';

// ============================================================================
// Types
// ============================================================================

interface HandFlags {
  vpip: boolean;
  pfr: boolean;
  threeBetOpportunity: boolean;
  threeBet: boolean;
  cbetOpportunity: boolean;
  cbet: boolean;
  foldToCbetOpportunity: boolean;
  foldToCbet: boolean;
}

interface HandContext {
  readonly handNumber: number;
  readonly flags: Record<PlayerId, HandFlags>;
  preflopAggressor: PlayerId | null;
  /** Set once the preflop aggressor has bet the flop into no prior bet */
  cbetBy: PlayerId | null;
}

export interface StatsAggregatorOptions {
  /** Player whose lifetime counters are kept (default: the human) */
  readonly trackedPlayer?: PlayerId;
  /** Lifetime counters loaded from a previous session */
  readonly lifetime?: LifetimeCounters;
}

function createHandFlags(): HandFlags {
  return {
    vpip: false,
    pfr: false,
    threeBetOpportunity: false,
    threeBet: false,
    cbetOpportunity: false,
    cbet: false,
    foldToCbetOpportunity: false,
    foldToCbet: false,
  };
}

function isAggressive(record: ActionRecord): boolean {
  return record.action.type === 'bet' || record.action.type === 'raise';
}

// ============================================================================
// Aggregator
// ============================================================================

export class StatsAggregator {
  private readonly trackedPlayer: PlayerId;
  private readonly session: Record<PlayerId, Mutable<StatsCounters>>;
  private readonly lifetime: Mutable<LifetimeCounters>;
  private hand: HandContext | null = null;
  private sessionCounted = false;

  constructor(options: StatsAggregatorOptions = {}) {
    this.trackedPlayer = options.trackedPlayer ?? 'human';
    this.session = { human: createEmptyCounters(), bot: createEmptyCounters() };
    this.lifetime = { ...(options.lifetime ?? createEmptyLifetimeCounters()) };
  }

  /**
   * Route any engine event to its handler; events without stats are ignored
   */
  consume(event: EngineEvent): void {
    switch (event.type) {
      case 'HAND_STARTED':
        this.onHandStart(event);
        break;
      case 'PLAYER_ACTED':
        this.onAction(event);
        break;
      case 'HAND_COMPLETED':
        this.onHandComplete(event);
        break;
      default:
        break;
    }
  }

  onHandStart(event: HandStartedEvent): void {
    // The first dealt hand makes this a counted session
    if (!this.sessionCounted) {
      this.sessionCounted = true;
      this.lifetime.sessions += 1;
    }
    this.hand = {
      handNumber: event.handNumber,
      flags: { human: createHandFlags(), bot: createHandFlags() },
      preflopAggressor: null,
      cbetBy: null,
    };
  }

  onAction(record: ActionRecord): void {
    const hand = this.hand;
    if (!hand) return;

    if (record.street === 'preflop') {
      this.stagePreflop(hand, record);
    } else {
      this.recordPostflop(hand, record);
    }
  }

  onHandComplete(event: HandCompletedEvent): void {
    const hand = this.hand;
    if (!hand || hand.handNumber !== event.result.handNumber) return;

    const { result } = event;
    const sawFlop = result.board.length >= 3;
    const showdown = result.resolution === 'showdown';

    for (const playerId of PLAYER_IDS) {
      const flags = hand.flags[playerId];
      const net = result.net[playerId];

      this.increment(playerId, 'handsPlayed');
      if (flags.vpip) this.increment(playerId, 'vpipHands');
      if (flags.pfr) this.increment(playerId, 'pfrHands');
      if (flags.threeBetOpportunity) this.increment(playerId, 'threeBetOpportunities');
      if (flags.threeBet) this.increment(playerId, 'threeBetHands');
      if (flags.cbetOpportunity) this.increment(playerId, 'cbetOpportunities');
      if (flags.cbet) this.increment(playerId, 'cbetHands');
      if (flags.foldToCbetOpportunity) this.increment(playerId, 'foldToCbetOpportunities');
      if (flags.foldToCbet) this.increment(playerId, 'foldToCbetHands');
      if (sawFlop) this.increment(playerId, 'sawFlopHands');
      if (sawFlop && showdown) {
        this.increment(playerId, 'wentToShowdownHands');
        if (net > 0) this.increment(playerId, 'wonAtShowdownHands');
      }

      this.increment(playerId, 'netBigBlinds', net / result.bigBlind);
      if (net > 0) this.raiseToAtLeast(playerId, 'biggestPotWon', result.pot);
      if (net < 0) this.raiseToAtLeast(playerId, 'biggestPotLost', result.pot);
    }

    this.hand = null;
  }

  // ==========================================================================
  // Staging
  // ==========================================================================

  private stagePreflop(hand: HandContext, record: ActionRecord): void {
    const flags = hand.flags[record.playerId];
    const { type } = record.action;

    if (type === 'call' || type === 'bet' || type === 'raise') {
      flags.vpip = true;
    }
    if (isAggressive(record)) {
      flags.pfr = true;
      hand.preflopAggressor = record.playerId;
    }
    if (record.aggressionBefore === 1 && !flags.threeBetOpportunity) {
      flags.threeBetOpportunity = true;
      flags.threeBet = type === 'raise';
    }
  }

  private recordPostflop(hand: HandContext, record: ActionRecord): void {
    const { playerId } = record;
    const flags = hand.flags[playerId];
    const { type } = record.action;

    if (type === 'bet') this.increment(playerId, 'postflopBets');
    if (type === 'raise') this.increment(playerId, 'postflopRaises');
    if (type === 'call') this.increment(playerId, 'postflopCalls');

    if (record.street !== 'flop') return;

    if (
      playerId === hand.preflopAggressor &&
      record.aggressionBefore === 0 &&
      !flags.cbetOpportunity
    ) {
      flags.cbetOpportunity = true;
      flags.cbet = type === 'bet';
      if (flags.cbet) hand.cbetBy = playerId;
      return;
    }

    // First response to the c-bet, before any raise
    if (
      hand.cbetBy === opponentOf(playerId) &&
      record.aggressionBefore === 1 &&
      !flags.foldToCbetOpportunity
    ) {
      flags.foldToCbetOpportunity = true;
      flags.foldToCbet = type === 'fold';
    }
  }

  // ==========================================================================
  // Counter Updates
  // ==========================================================================

  private increment(playerId: PlayerId, key: CounterKey, by = 1): void {
    this.session[playerId][key] += by;
    if (playerId === this.trackedPlayer) {
      this.lifetime[key] += by;
    }
  }

  private raiseToAtLeast(playerId: PlayerId, key: 'biggestPotWon' | 'biggestPotLost', value: number): void {
    this.session[playerId][key] = Math.max(this.session[playerId][key], value);
    if (playerId === this.trackedPlayer) {
      this.lifetime[key] = Math.max(this.lifetime[key], value);
    }
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  snapshot(): StatsSnapshot {
    return {
      trackedPlayer: this.trackedPlayer,
      session: {
        human: createStatLine({ ...this.session.human }),
        bot: createStatLine({ ...this.session.bot }),
      },
      lifetime: createStatLine({ ...this.lifetime }),
    };
  }

  getLifetimeCounters(): LifetimeCounters {
    return { ...this.lifetime };
  }

  getSessionCounters(playerId: PlayerId): StatsCounters {
    return { ...this.session[playerId] };
  }
}

export function createStatsAggregator(options: StatsAggregatorOptions = {}): StatsAggregator {
  return new StatsAggregator(options);
}
