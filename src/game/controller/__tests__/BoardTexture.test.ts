/**
 * BoardTexture.test.ts
 */

import { analyzeBoardTexture } from '../BoardTexture';
import { cards } from '../../engine/__tests__/testUtils';

describe('analyzeBoardTexture', () => {
  test('rainbow disconnected board is dry', () => {
    const texture = analyzeBoardTexture(cards('Ks 7d 2c'));
    expect(texture.category).toBe('dry');
    expect(texture.wetness).toBe(0);
    expect(texture.flushPossible).toBe(false);
    expect(texture.straightPossible).toBe(false);
    expect(texture.highCard).toBe(13);
  });

  test('suited connectors are wet', () => {
    const texture = analyzeBoardTexture(cards('9h 8h 7h'));
    expect(texture.wetness).toBe(4);
    expect(texture.category).toBe('wet');
    expect(texture.monotone).toBe(true);
    expect(texture.flushPossible).toBe(true);
    expect(texture.straightPossible).toBe(true);
  });

  test('a paired board is medium', () => {
    const texture = analyzeBoardTexture(cards('8s 8d 3c'));
    expect(texture.paired).toBe(true);
    expect(texture.wetness).toBe(2);
    expect(texture.category).toBe('medium');
  });

  test('wheel cards count toward a straight', () => {
    expect(analyzeBoardTexture(cards('Ad 4c 2h')).straightPossible).toBe(true);
  });

  test('empty board', () => {
    expect(analyzeBoardTexture([]).category).toBe('dry');
  });
});
