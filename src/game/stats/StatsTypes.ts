/**
 * StatsTypes.ts
 * Counters and derived values for player statistics
 *
 * Only raw counters are stored; every percentage is derived on read so a
 * persisted record can never disagree with itself.
 */

import { PlayerId } from '../engine/TableState';

// ============================================================================
// Counters
// ============================================================================

export interface StatsCounters {
  readonly handsPlayed: number;
  /** Voluntary call, bet or raise preflop; blinds and big blind checks excluded */
  readonly vpipHands: number;
  readonly pfrHands: number;
  /** Acting preflop facing exactly one raise */
  readonly threeBetOpportunities: number;
  readonly threeBetHands: number;
  /** Preflop aggressor acting first on the flop with no bet yet */
  readonly cbetOpportunities: number;
  readonly cbetHands: number;
  readonly foldToCbetOpportunities: number;
  readonly foldToCbetHands: number;
  readonly sawFlopHands: number;
  readonly wentToShowdownHands: number;
  /** Showdowns that won chips; a split pot is not a win */
  readonly wonAtShowdownHands: number;
  readonly postflopBets: number;
  readonly postflopRaises: number;
  readonly postflopCalls: number;
  /** May be negative */
  readonly netBigBlinds: number;
  readonly biggestPotWon: number;
  readonly biggestPotLost: number;
}

export interface LifetimeCounters extends StatsCounters {
  readonly sessions: number;
}

export type CounterKey = keyof StatsCounters;

export type Mutable<T> = { -readonly [K in keyof T]: T[K] };

// ============================================================================
// Derived Values
// ============================================================================

/**
 * Percentages are 0-100; a zero denominator gives 0
 */
export interface DerivedStats {
  readonly vpip: number;
  readonly pfr: number;
  readonly threeBet: number;
  readonly cbet: number;
  readonly foldToCbet: number;
  /** Of hands that saw the flop */
  readonly wtsd: number;
  /** Of showdowns */
  readonly wsd: number;
  readonly aggressionFactor: number;
  readonly bbPer100: number;
}

export type DerivedStatKey = keyof DerivedStats;

export interface StatLine<C extends StatsCounters = StatsCounters> {
  readonly counters: C;
  readonly derived: DerivedStats;
}

export interface StatsSnapshot {
  readonly trackedPlayer: PlayerId;
  readonly session: Readonly<Record<PlayerId, StatLine>>;
  readonly lifetime: StatLine<LifetimeCounters>;
}

// ============================================================================
// Factories
// ============================================================================

export function createEmptyCounters(): StatsCounters {
  return {
    handsPlayed: 0,
    vpipHands: 0,
    pfrHands: 0,
    threeBetOpportunities: 0,
    threeBetHands: 0,
    cbetOpportunities: 0,
    cbetHands: 0,
    foldToCbetOpportunities: 0,
    foldToCbetHands: 0,
    sawFlopHands: 0,
    wentToShowdownHands: 0,
    wonAtShowdownHands: 0,
    postflopBets: 0,
    postflopRaises: 0,
    postflopCalls: 0,
    netBigBlinds: 0,
    biggestPotWon: 0,
    biggestPotLost: 0,
  };
}

export function createEmptyLifetimeCounters(): LifetimeCounters {
  return { ...createEmptyCounters(), sessions: 0 };
}

// ============================================================================
// Derivation
// ============================================================================

/** Aggression factor reported when there are bets or raises but no calls */
export const AGGRESSION_FACTOR_CAP = 99.9;

function percentage(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : (numerator / denominator) * 100;
}

export function aggressionFactor(counters: StatsCounters): number {
  const aggressive = counters.postflopBets + counters.postflopRaises;
  if (counters.postflopCalls === 0) {
    return aggressive > 0 ? AGGRESSION_FACTOR_CAP : 0;
  }
  return aggressive / counters.postflopCalls;
}

export function bbPer100(counters: StatsCounters): number {
  return counters.handsPlayed === 0 ? 0 : (counters.netBigBlinds / counters.handsPlayed) * 100;
}

export function deriveStats(counters: StatsCounters): DerivedStats {
  return {
    vpip: percentage(counters.vpipHands, counters.handsPlayed),
    pfr: percentage(counters.pfrHands, counters.handsPlayed),
    threeBet: percentage(counters.threeBetHands, counters.threeBetOpportunities),
    cbet: percentage(counters.cbetHands, counters.cbetOpportunities),
    foldToCbet: percentage(counters.foldToCbetHands, counters.foldToCbetOpportunities),
    wtsd: percentage(counters.wentToShowdownHands, counters.sawFlopHands),
    wsd: percentage(counters.wonAtShowdownHands, counters.wentToShowdownHands),
    aggressionFactor: aggressionFactor(counters),
    bbPer100: bbPer100(counters),
  };
}

export function createStatLine<C extends StatsCounters>(counters: C): StatLine<C> {
  return { counters, derived: deriveStats(counters) };
}
