import { describe, it, expect } from 'vitest';
import { formatHand, parseHand } from '@cardsleuth/protocol';
import {
  EngineError,
  InvalidHandSizeError,
  countHands,
  generateHands,
  handKey,
  initialGuess,
  makeDeck,
  openingHand,
} from '../src/index.js';

describe('generateHands', () => {
  it.each([
    [2, 1326],
    [3, 22100],
    [4, 270725],
  ])('produces C(52, %i) = %i distinct hands', (size, expected) => {
    const hands = generateHands(size);
    expect(hands).toHaveLength(expected);
    expect(countHands(52, size)).toBe(expected);
    expect(new Set(hands.map(handKey)).size).toBe(expected);
    expect(hands.every((h) => h.length === size)).toBe(true);
  });

  it('enumerates choose-before-skip in deck order', () => {
    const hands = generateHands(2);
    expect(formatHand(hands[0])).toBe('2C 3C');
    expect(formatHand(hands[1])).toBe('2C 4C');
    expect(formatHand(hands[hands.length - 1])).toBe('KS AS');

    const fours = generateHands(4);
    expect(formatHand(fours[1])).toBe('2C 3C 4C 6C');
    expect(formatHand(fours[fours.length - 1])).toBe('JS QS KS AS');
  });

  it('works over a custom deck', () => {
    const deck = parseHand('AS KH 2D');
    expect(generateHands(2, deck).map(formatHand)).toEqual(['AS KH', 'AS 2D', 'KH 2D']);
    expect(generateHands(0, deck)).toEqual([[]]);
    expect(generateHands(4, deck)).toEqual([]);
  });

  it('rejects negative and fractional sizes', () => {
    expect(() => generateHands(-1)).toThrow(EngineError);
    expect(() => generateHands(1.5)).toThrow(EngineError);
  });

  it('matches the deck order used everywhere else', () => {
    const deck = makeDeck();
    expect(generateHands(1).map((h) => h[0])).toEqual(deck);
  });
});

describe('initialGuess', () => {
  it.each([
    [2, '2D 6S'],
    [3, 'TC 2D 6S'],
    [4, '2C 5D 7H TS'],
  ])('opens size %i with %s', (size, expected) => {
    expect(formatHand(openingHand(size))).toBe(expected);
  });

  it('starts from every other hand of the size', () => {
    const { guess, candidates } = initialGuess(3);
    expect(candidates).toHaveLength(22099);
    expect(formatHand(candidates[0])).toBe('2C 3C 4C');
    expect(candidates.some((h) => handKey(h) === handKey(guess))).toBe(false);
  });

  it.each([0, 1, 5, 52])('fails with InvalidHandSizeError for size %i', (size) => {
    expect(() => initialGuess(size)).toThrow(InvalidHandSizeError);
    try {
      initialGuess(size);
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidHandSizeError);
      if (err instanceof InvalidHandSizeError) {
        expect(err.size).toBe(size);
      }
    }
  });
});
