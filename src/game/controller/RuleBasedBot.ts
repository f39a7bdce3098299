/**
 * RuleBasedBot.ts
 * Rule-based opponent for heads-up No-Limit Hold'em
 *
 * Decisions follow the interpolated profile:
 * - Preflop: tier-table strength against open / iso / 3-bet / jam thresholds
 * - Postflop: made-hand strength plus draws, position and board texture
 * - River: value bet or check, no draws
 *
 * Every candidate is projected onto the legal action set before it is
 * returned, so the result can always be applied.
 */

import { Rng, randomNoise } from '../engine/Random';
import { Action, LegalAction } from '../engine/TableState';
import { findLegalAction } from '../engine/BettingRound';
import { PlayerView } from '../engine/PlayerView';
import { evaluateHoldem } from '../engine/HandEvaluator';
import { handStrength } from '../engine/HandRank';
import { BotProfile, TEXTURE_BET_FRACTION, clampAggression, interpolateProfile } from './BotProfiles';
import { TIER_STRENGTH, classifyPreflop, preflopStrength } from './PreflopStrength';
import { DrawInfo, detectDraws, drawEquity, drawStrengthBoost, hasStrongDraw } from './DrawDetector';
import { analyzeBoardTexture } from './BoardTexture';

// ============================================================================
// Constants
// ============================================================================

const NOISE = 0.05;
const IN_POSITION_BONUS = 0.06;
const OUT_OF_POSITION_PENALTY = -0.04;
const RAISE_POT_FRACTION = 0.7;

// ============================================================================
// Decision Functions
// ============================================================================

/**
 * Choose a legal action for the seat the view belongs to
 */
export function decideAction(view: PlayerView, aggression: number, rng: Rng): Action {
  if (view.legalActions.length === 0) {
    throw new Error(`No legal actions for ${view.playerId}; it is not their turn`);
  }

  const profile = interpolateProfile(aggression);
  const candidate =
    view.street === 'preflop'
      ? decidePreflop(view, profile, rng)
      : decidePostflop(view, profile, rng);

  return projectOntoLegal(candidate, view.legalActions);
}

function countPreflopRaises(view: PlayerView): number {
  return view.actions.filter(
    a => a.street === 'preflop' && (a.action.type === 'bet' || a.action.type === 'raise')
  ).length;
}

function decidePreflop(view: PlayerView, profile: BotProfile, rng: Rng): Action {
  const strength = preflopStrength(view.holeCards) + randomNoise(rng, NOISE);
  const raises = countPreflopRaises(view);

  // Big blind option after a limp
  if (view.toCall === 0) {
    if (strength >= profile.isoRaiseThreshold) {
      return { type: 'raise', amount: view.currentBet * 3 };
    }
    return { type: 'check' };
  }

  // Unopened pot on the button
  if (raises === 0) {
    if (strength >= profile.openThreshold) {
      return { type: 'raise', amount: Math.round(profile.openSizeBb * view.bigBlind) };
    }
    if (strength >= profile.limpThreshold) {
      return { type: 'call' };
    }
    return { type: 'fold' };
  }

  // Facing a single raise
  if (raises === 1) {
    if (strength >= profile.threeBetThreshold) {
      return { type: 'raise', amount: view.currentBet * 3 };
    }
    const cheap = view.toCall <= view.bigBlind && strength > TIER_STRENGTH.marginal;
    if (strength >= profile.continueThreshold || cheap) {
      return { type: 'call' };
    }
    return { type: 'fold' };
  }

  // Facing a 3-bet or more
  if (strength >= profile.jamThreshold && classifyPreflop(view.holeCards) === 'premium') {
    return { type: 'raise', amount: view.committed + view.stack };
  }
  if (strength >= profile.fourBetCallThreshold) {
    return { type: 'call' };
  }
  return { type: 'fold' };
}

function streetFactor(boardSize: number): number {
  if (boardSize === 3) return 1;
  if (boardSize === 4) return 0.5;
  return 0;
}

function decidePostflop(view: PlayerView, profile: BotProfile, rng: Rng): Action {
  const made = handStrength(evaluateHoldem(view.holeCards, view.board).value);
  const draws: DrawInfo = detectDraws(view.holeCards, view.board);
  const position = view.position === 'button' ? IN_POSITION_BONUS : OUT_OF_POSITION_PENALTY;
  const strength =
    made +
    drawStrengthBoost(draws, streetFactor(view.board.length)) +
    position +
    randomNoise(rng, NOISE);
  const isRiver = view.street === 'river';

  if (view.toCall === 0) {
    const texture = analyzeBoardTexture(view.board);
    const betTo =
      view.currentBet +
      Math.floor(view.pot * TEXTURE_BET_FRACTION[texture.category] * profile.betSizeScale);
    const bet: Action =
      view.currentBet === 0 ? { type: 'bet', amount: betTo } : { type: 'raise', amount: betTo };

    if (strength >= profile.valueBetThreshold) {
      return bet;
    }
    if (isRiver) {
      return { type: 'check' };
    }
    if (isContinuationBetSpot(view) && rng.next() < profile.cbetFrequency) {
      return bet;
    }
    if (hasStrongDraw(draws) && rng.next() < profile.bluffFrequency) {
      return bet;
    }
    return { type: 'check' };
  }

  const raise: Action = {
    type: 'raise',
    amount: view.currentBet + Math.floor(view.pot * RAISE_POT_FRACTION),
  };

  if (strength >= profile.raiseThreshold) {
    return raise;
  }
  if (strength >= profile.callThreshold) {
    return { type: 'call' };
  }
  if (!isRiver && hasStrongDraw(draws) && rng.next() < profile.bluffRaiseFrequency) {
    return raise;
  }
  const potOdds = view.toCall / (view.pot + view.toCall);
  if (drawEquity(draws, view.board.length) >= potOdds) {
    return { type: 'call' };
  }
  return { type: 'fold' };
}

function isContinuationBetSpot(view: PlayerView): boolean {
  return (
    view.street === 'flop' &&
    view.preflopAggressor === view.playerId &&
    !view.actions.some(
      a => a.street === 'flop' && (a.action.type === 'bet' || a.action.type === 'raise')
    )
  );
}

// ============================================================================
// Legal Projection
// ============================================================================

/**
 * Map a candidate onto the legal set: amounts are clamped, a bet or raise
 * that is not available falls back to call or check, a check facing a bet
 * becomes a fold, and a fold is never chosen when checking is free.
 */
export function projectOntoLegal(candidate: Action, legal: readonly LegalAction[]): Action {
  const canCheck = findLegalAction(legal, 'check') !== undefined;
  const canCall = findLegalAction(legal, 'call') !== undefined;
  const passive: Action = canCheck ? { type: 'check' } : canCall ? { type: 'call' } : { type: 'fold' };

  switch (candidate.type) {
    case 'fold':
      return canCheck ? { type: 'check' } : { type: 'fold' };

    case 'check':
      return canCheck ? { type: 'check' } : { type: 'fold' };

    case 'call':
      return passive;

    case 'bet':
    case 'raise': {
      const range = findLegalAction(legal, 'bet') ?? findLegalAction(legal, 'raise');
      if (!range) {
        return passive;
      }
      const amount = Math.min(Math.max(Math.floor(candidate.amount), range.min), range.max);
      return range.type === 'bet' ? { type: 'bet', amount } : { type: 'raise', amount };
    }
  }
}

// ============================================================================
// Bot
// ============================================================================

export interface RuleBasedBotOptions {
  /** 0 = passive, 1 = aggressive; clamped */
  readonly aggression: number;
  readonly rng: Rng;
}

export class RuleBasedBot {
  readonly aggression: number;
  private readonly rng: Rng;

  constructor(options: RuleBasedBotOptions) {
    this.aggression = clampAggression(options.aggression);
    this.rng = options.rng;
  }

  decide(view: PlayerView): Action {
    return decideAction(view, this.aggression, this.rng);
  }
}

export function createRuleBasedBot(options: RuleBasedBotOptions): RuleBasedBot {
  return new RuleBasedBot(options);
}
