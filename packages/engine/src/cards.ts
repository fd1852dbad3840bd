/**
 * Card ordering, equality and hand identity.
 *
 * Suits and ranks are compared through their index in the canonical tables
 * from @cardsleuth/types, never through string comparison.
 */
import { RANKS, SUITS, type Card, type Hand, type Rank, type Suit } from '@cardsleuth/types';

// Must agree with the order of RANKS and SUITS.
const RANK_VALUE: Record<Rank, number> = {
  '2': 0,
  '3': 1,
  '4': 2,
  '5': 3,
  '6': 4,
  '7': 5,
  '8': 6,
  '9': 7,
  '10': 8,
  J: 9,
  Q: 10,
  K: 11,
  A: 12,
};

const SUIT_INDEX: Record<Suit, number> = {
  clubs: 0,
  diamonds: 1,
  hearts: 2,
  spades: 3,
};

/** 0 for '2' up to 12 for 'A' */
export const rankValue = (rank: Rank): number => RANK_VALUE[rank];

export const suitIndex = (suit: Suit): number => SUIT_INDEX[suit];

/** Position of the card in the canonical deck (0-51, suit-major). */
export const cardIndex = (card: Card): number =>
  SUIT_INDEX[card.suit] * RANKS.length + RANK_VALUE[card.rank];

export function compareCards(a: Card, b: Card): number {
  return cardIndex(a) - cardIndex(b);
}

export function cardsEqual(a: Card, b: Card): boolean {
  return a.suit === b.suit && a.rank === b.rank;
}

export function sortHand(hand: Hand): Card[] {
  return [...hand].sort(compareCards);
}

/**
 * Identity of a hand as a set: the same cards in any order give the same key.
 */
export function handKey(hand: Hand): string {
  return hand
    .map(cardIndex)
    .sort((a, b) => a - b)
    .join('.');
}

export function handsEqual(a: Hand, b: Hand): boolean {
  return a.length === b.length && handKey(a) === handKey(b);
}

export function hasDuplicates(cards: readonly Card[]): boolean {
  return new Set(cards.map(cardIndex)).size !== cards.length;
}

/**
 * Full 52-card deck in enumeration order: clubs 2..A, diamonds 2..A,
 * hearts 2..A, spades 2..A.
 */
export function makeDeck(): Card[] {
  const deck: Card[] = [];
  for (const suit of SUITS) for (const rank of RANKS) deck.push({ suit, rank });
  return deck;
}
