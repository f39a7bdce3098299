/**
 * BotProfiles.ts
 * Bot personality profiles
 *
 * Two anchor profiles bound the bot's behaviour:
 * - Passive: plays few hands, rarely bets without a hand, calls down light
 * - Aggressive: opens wide, c-bets often, bluffs and raises draws
 *
 * The profile actually used is interpolated between them by the session's
 * aggression setting (0 = passive, 1 = aggressive).
 */

import { TextureCategory } from './BoardTexture';

// ============================================================================
// Types
// ============================================================================

export type BotProfileType = 'passive' | 'aggressive';

export interface BotProfile {
  // Preflop
  /** Minimum strength to open-raise from the button */
  readonly openThreshold: number;
  /** Minimum strength to limp from the button */
  readonly limpThreshold: number;
  /** Open raise size in big blinds */
  readonly openSizeBb: number;
  /** Minimum strength to raise the big blind option after a limp */
  readonly isoRaiseThreshold: number;
  readonly threeBetThreshold: number;
  /** Minimum strength to call a single raise */
  readonly continueThreshold: number;
  /** Minimum strength to call a 3-bet or more */
  readonly fourBetCallThreshold: number;
  /** Minimum strength to move all-in over a 3-bet */
  readonly jamThreshold: number;

  // Postflop
  readonly cbetFrequency: number;
  readonly valueBetThreshold: number;
  /** Chance to semi-bluff a strong draw when checked to */
  readonly bluffFrequency: number;
  readonly raiseThreshold: number;
  readonly callThreshold: number;
  /** Chance to raise a strong draw facing a bet */
  readonly bluffRaiseFrequency: number;
  /** Multiplier on texture bet sizes */
  readonly betSizeScale: number;
}

// ============================================================================
// Profile Definitions
// ============================================================================

const PASSIVE_PROFILE: BotProfile = {
  openThreshold: 0.66,
  limpThreshold: 0.4,
  openSizeBb: 2.5,
  isoRaiseThreshold: 0.78,
  threeBetThreshold: 0.88,
  continueThreshold: 0.5,
  fourBetCallThreshold: 0.78,
  jamThreshold: 0.94,

  cbetFrequency: 0.35,
  valueBetThreshold: 0.45,
  bluffFrequency: 0.05,
  raiseThreshold: 0.5,
  callThreshold: 0.2,
  bluffRaiseFrequency: 0.02,
  betSizeScale: 0.8,
};

const AGGRESSIVE_PROFILE: BotProfile = {
  openThreshold: 0.46,
  limpThreshold: 0.3,
  openSizeBb: 3,
  isoRaiseThreshold: 0.58,
  threeBetThreshold: 0.72,
  continueThreshold: 0.46,
  fourBetCallThreshold: 0.72,
  jamThreshold: 0.9,

  cbetFrequency: 0.8,
  valueBetThreshold: 0.35,
  bluffFrequency: 0.35,
  raiseThreshold: 0.38,
  callThreshold: 0.14,
  bluffRaiseFrequency: 0.15,
  betSizeScale: 1.2,
};

// ============================================================================
// Profile Registry
// ============================================================================

export const BOT_PROFILES: Record<BotProfileType, BotProfile> = {
  passive: PASSIVE_PROFILE,
  aggressive: AGGRESSIVE_PROFILE,
};

/** Bet size as a fraction of the pot, before scaling */
export const TEXTURE_BET_FRACTION: Record<TextureCategory, number> = {
  dry: 0.3,
  medium: 0.6,
  wet: 0.85,
};

export function clampAggression(aggression: number): number {
  if (!Number.isFinite(aggression)) return 0.5;
  return Math.min(Math.max(aggression, 0), 1);
}

/**
 * Linear interpolation between the passive and aggressive profiles
 */
export function interpolateProfile(aggression: number): BotProfile {
  const t = clampAggression(aggression);
  const mix = (key: keyof BotProfile): number =>
    PASSIVE_PROFILE[key] + (AGGRESSIVE_PROFILE[key] - PASSIVE_PROFILE[key]) * t;

  return {
    openThreshold: mix('openThreshold'),
    limpThreshold: mix('limpThreshold'),
    openSizeBb: mix('openSizeBb'),
    isoRaiseThreshold: mix('isoRaiseThreshold'),
    threeBetThreshold: mix('threeBetThreshold'),
    continueThreshold: mix('continueThreshold'),
    fourBetCallThreshold: mix('fourBetCallThreshold'),
    jamThreshold: mix('jamThreshold'),
    cbetFrequency: mix('cbetFrequency'),
    valueBetThreshold: mix('valueBetThreshold'),
    bluffFrequency: mix('bluffFrequency'),
    raiseThreshold: mix('raiseThreshold'),
    callThreshold: mix('callThreshold'),
    bluffRaiseFrequency: mix('bluffRaiseFrequency'),
    betSizeScale: mix('betSizeScale'),
  };
}
