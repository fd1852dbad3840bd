/**
 * Candidate space generation.
 */
import type { Card, Hand } from '@cardsleuth/types';
import { makeDeck } from './cards.js';
import { EngineError } from './errors.js';

/**
 * Every `size`-card subset of `deck`, each exactly once.
 *
 * Choose-or-skip over the deck in order: all hands containing deck[0] come
 * first, then all hands without it. Cards inside each hand keep deck order.
 * The output order is fixed for a given deck and size; guess selection
 * tie-breaks rely on it.
 */
export function generateHands(size: number, deck: readonly Card[] = makeDeck()): Hand[] {
  if (!Number.isInteger(size) || size < 0) {
    throw new EngineError(`Hand size must be a non-negative integer, got ${size}`);
  }

  const hands: Hand[] = [];
  const chosen: Card[] = [];

  const choose = (start: number, needed: number): void => {
    if (needed === 0) {
      hands.push([...chosen]);
      return;
    }
    if (deck.length - start < needed) return;

    chosen.push(deck[start]);
    choose(start + 1, needed - 1);
    chosen.pop();

    choose(start + 1, needed);
  };

  choose(0, size);
  return hands;
}

/** C(n, k) */
export function countHands(deckSize: number, size: number): number {
  if (size < 0 || size > deckSize) return 0;
  let result = 1;
  for (let i = 1; i <= size; i++) {
    result = (result * (deckSize - size + i)) / i;
  }
  return result;
}
