/**
 * Canonical card representations
 * String literal ranks and suits so hands print and serialize as-is
 */

export type Suit = 'clubs' | 'diamonds' | 'hearts' | 'spades';
export type Rank = '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9' | '10' | 'J' | 'Q' | 'K' | 'A';

export interface Card {
  readonly suit: Suit;
  readonly rank: Rank;
}

/**
 * A set of distinct cards. Stored as an array, but two hands holding the
 * same cards in a different order are the same hand.
 */
export type Hand = readonly Card[];

/** Canonical suit order, lowest first. Enumeration and tie-breaks depend on it. */
export const SUITS = ['clubs', 'diamonds', 'hearts', 'spades'] as const satisfies readonly Suit[];

/** Canonical rank order, lowest first. */
export const RANKS = [
  '2', '3', '4', '5', '6', '7', '8', '9', '10', 'J', 'Q', 'K', 'A',
] as const satisfies readonly Rank[];

/** Unicode symbols for display (derived from Suit) */
export const SUIT_SYMBOLS = {
  clubs: '♣',
  diamonds: '♦',
  hearts: '♥',
  spades: '♠',
} as const satisfies Record<Suit, string>;
