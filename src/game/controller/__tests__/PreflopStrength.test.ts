/**
 * PreflopStrength.test.ts
 * Starting-hand tiers, strength and notation
 */

import { classifyPreflop, handNotation, preflopStrength } from '../PreflopStrength';
import { cards } from '../../engine/__tests__/testUtils';

describe('PreflopStrength', () => {
  describe('classifyPreflop', () => {
    test.each([
      ['As Ad', 'premium'],
      ['Ah Kh', 'premium'],
      ['Ac Kd', 'premium'],
      ['Ks Qs', 'strong'],
      ['Ts 9s', 'playable'],
      ['2c 2d', 'marginal'],
      ['7d 2c', 'trash'],
    ])('%s is %s', (hand, tier) => {
      expect(classifyPreflop(cards(hand))).toBe(tier);
    });

    test('card order does not matter', () => {
      expect(classifyPreflop(cards('2c 7d'))).toBe(classifyPreflop(cards('7d 2c')));
    });

    test('suited hands rank at least as high as the offsuit version', () => {
      expect(preflopStrength(cards('Kh Qh'))).toBeGreaterThan(preflopStrength(cards('Kh Qd')));
    });
  });

  describe('preflopStrength', () => {
    test('pocket aces get the full kicker bonus', () => {
      expect(preflopStrength(cards('As Ad'))).toBeCloseTo(0.95, 10);
    });

    test('seven-deuce offsuit sits just above the trash tier', () => {
      expect(preflopStrength(cards('7d 2c'))).toBeCloseTo(0.25 + (5 / 12) * 0.04, 10);
    });

    test('never exceeds 1', () => {
      expect(preflopStrength(cards('Ah Kh'))).toBeLessThanOrEqual(1);
    });

    test('rejects anything but two cards', () => {
      expect(() => preflopStrength(cards('As'))).toThrow('Expected 2 hole cards, got 1');
    });
  });

  describe('handNotation', () => {
    test.each([
      ['As Ad', 'AA'],
      ['Kh Ah', 'AKs'],
      ['9c Td', 'T9o'],
    ])('%s is written %s', (hand, notation) => {
      expect(handNotation(cards(hand))).toBe(notation);
    });
  });
});
