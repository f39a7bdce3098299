/**
 * StatDefinitions.ts
 * Help text for each derived stat, shown by the renderer's stats view
 */

import { DerivedStatKey } from './StatsTypes';

export interface StatDefinition {
  readonly key: DerivedStatKey;
  readonly shortName: string;
  readonly fullName: string;
  readonly description: string;
  /** Typical heads-up range for a solid player */
  readonly goodRange: string;
  readonly unit: 'percent' | 'ratio' | 'bb-per-100';
}

export const STAT_DEFINITIONS: readonly StatDefinition[] = [
  {
    key: 'vpip',
    shortName: 'VPIP',
    fullName: 'Voluntarily Put money In Pot',
    description: 'How often you call, bet or raise before the flop. Posting a blind or checking the big blind does not count.',
    goodRange: '60-85%',
    unit: 'percent',
  },
  {
    key: 'pfr',
    shortName: 'PFR',
    fullName: 'Preflop Raise',
    description: 'How often you bet or raise before the flop.',
    goodRange: '45-70%',
    unit: 'percent',
  },
  {
    key: 'threeBet',
    shortName: '3-Bet',
    fullName: 'Three-Bet',
    description: 'How often you re-raise when facing a single preflop raise.',
    goodRange: '12-25%',
    unit: 'percent',
  },
  {
    key: 'cbet',
    shortName: 'C-Bet',
    fullName: 'Continuation Bet',
    description: 'How often you bet the flop after raising preflop, when no one has bet yet.',
    goodRange: '50-75%',
    unit: 'percent',
  },
  {
    key: 'foldToCbet',
    shortName: 'Fold to C-Bet',
    fullName: 'Fold to Continuation Bet',
    description: "How often you fold the flop to the preflop raiser's continuation bet.",
    goodRange: '30-50%',
    unit: 'percent',
  },
  {
    key: 'wtsd',
    shortName: 'WTSD',
    fullName: 'Went To Showdown',
    description: 'Of the hands where you saw the flop, how often you reached showdown.',
    goodRange: '30-45%',
    unit: 'percent',
  },
  {
    key: 'wsd',
    shortName: 'W$SD',
    fullName: 'Won Money at Showdown',
    description: 'Of the hands that reached showdown, how often you won chips. A split pot does not count.',
    goodRange: '50-60%',
    unit: 'percent',
  },
  {
    key: 'aggressionFactor',
    shortName: 'AF',
    fullName: 'Aggression Factor',
    description: 'Postflop bets and raises divided by postflop calls.',
    goodRange: '2.0-4.0',
    unit: 'ratio',
  },
  {
    key: 'bbPer100',
    shortName: 'BB/100',
    fullName: 'Big Blinds per 100 Hands',
    description: 'Net winnings in big blinds, scaled to 100 hands.',
    goodRange: 'Above 0',
    unit: 'bb-per-100',
  },
];

export function getStatDefinition(key: DerivedStatKey): StatDefinition {
  const definition = STAT_DEFINITIONS.find(d => d.key === key);
  if (!definition) {
    throw new Error(`Unknown stat: ${key}`);
  }
  return definition;
}

/**
 * Display form: "62.5%", "2.3", "+12.0 bb/100"
 */
export function formatStatValue(key: DerivedStatKey, value: number): string {
  switch (getStatDefinition(key).unit) {
    case 'percent':
      return `${value.toFixed(1)}%`;
    case 'ratio':
      return value.toFixed(1);
    case 'bb-per-100':
      return `${value >= 0 ? '+' : ''}${value.toFixed(1)} bb/100`;
  }
}
