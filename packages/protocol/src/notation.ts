/**
 * Two-character card notation: rank symbol then suit symbol, e.g. "4C", "TH".
 *
 * This is the text format typed at the prompt and printed in transcripts.
 */

import type { Card, Feedback, Hand, Rank, Suit } from '@cardsleuth/types';
import { InvalidCardTokenError } from './errors.js';

const RANK_BY_SYMBOL: Readonly<Record<string, Rank>> = {
  '2': '2',
  '3': '3',
  '4': '4',
  '5': '5',
  '6': '6',
  '7': '7',
  '8': '8',
  '9': '9',
  T: '10',
  J: 'J',
  Q: 'Q',
  K: 'K',
  A: 'A',
};

const SUIT_BY_SYMBOL: Readonly<Record<string, Suit>> = {
  C: 'clubs',
  D: 'diamonds',
  H: 'hearts',
  S: 'spades',
};

const SYMBOL_BY_SUIT = {
  clubs: 'C',
  diamonds: 'D',
  hearts: 'H',
  spades: 'S',
} as const satisfies Record<Suit, string>;

export function rankSymbol(rank: Rank): string {
  return rank === '10' ? 'T' : rank;
}

export function suitSymbol(suit: Suit): string {
  return SYMBOL_BY_SUIT[suit];
}

/** Parse one card token. Case-insensitive. */
export function parseCard(token: string): Card {
  if (token.length !== 2) {
    throw new InvalidCardTokenError(token);
  }
  const upper = token.toUpperCase();
  const rank = RANK_BY_SYMBOL[upper[0]];
  const suit = SUIT_BY_SYMBOL[upper[1]];
  if (rank === undefined || suit === undefined) {
    throw new InvalidCardTokenError(token);
  }
  return { suit, rank };
}

export function formatCard(card: Card): string {
  return `${rankSymbol(card.rank)}${suitSymbol(card.suit)}`;
}

/**
 * Split on whitespace and parse every token. Empty text yields an empty list;
 * duplicate and size checks belong to validation, not parsing.
 */
export function parseHand(text: string): Card[] {
  const tokens = text.trim().split(/\s+/).filter((t) => t.length > 0);
  return tokens.map(parseCard);
}

export function formatHand(hand: Hand): string {
  return hand.map(formatCard).join(' ');
}

/** Renders the 5-tuple as `(c,l,r,h,s)` */
export function formatFeedback(feedback: Feedback): string {
  return `(${feedback.join(',')})`;
}
