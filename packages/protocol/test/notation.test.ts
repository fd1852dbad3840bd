import { describe, it, expect } from 'vitest';
import {
  InvalidCardTokenError,
  NotationError,
  formatCard,
  formatFeedback,
  formatHand,
  parseCard,
  parseHand,
  rankSymbol,
  suitSymbol,
} from '../src/index.js';

describe('card notation', () => {
  it('parses rank then suit', () => {
    expect(parseCard('4C')).toEqual({ suit: 'clubs', rank: '4' });
    expect(parseCard('TH')).toEqual({ suit: 'hearts', rank: '10' });
    expect(parseCard('AS')).toEqual({ suit: 'spades', rank: 'A' });
    expect(parseCard('qd')).toEqual({ suit: 'diamonds', rank: 'Q' });
  });

  it.each(['', '4', '10C', 'C4', '1C', '4X', '4C '])('rejects token %j', (token) => {
    expect(() => parseCard(token)).toThrow(InvalidCardTokenError);
  });

  it('names the offending token', () => {
    try {
      parseCard('ZZ');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(NotationError);
      if (err instanceof InvalidCardTokenError) {
        expect(err.token).toBe('ZZ');
        expect(err.message).toContain('"ZZ"');
      }
    }
  });

  it('writes ten as T', () => {
    expect(rankSymbol('10')).toBe('T');
    expect(suitSymbol('diamonds')).toBe('D');
    expect(formatCard({ suit: 'diamonds', rank: '10' })).toBe('TD');
  });

  it('parses whitespace-separated hands in the order given', () => {
    expect(parseHand('  4C\t3H   2D \n')).toEqual([
      { suit: 'clubs', rank: '4' },
      { suit: 'hearts', rank: '3' },
      { suit: 'diamonds', rank: '2' },
    ]);
    expect(parseHand('')).toEqual([]);
    expect(parseHand('   ')).toEqual([]);
  });

  it('formats hands and feedback', () => {
    expect(formatHand(parseHand('tc 2d 6s'))).toBe('TC 2D 6S');
    expect(formatHand([])).toBe('');
    expect(formatFeedback([1, 0, 1, 0, 2])).toBe('(1,0,1,0,2)');
  });
});
