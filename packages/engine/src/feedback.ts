/**
 * Scores a guess against a reference hand.
 *
 * correctCards, correctRanks and correctSuits are symmetric in the two hands.
 * lowerRanks and higherRanks are measured against the guess's lowest and
 * highest rank, so swapping the arguments changes them.
 */
import type { Feedback, Hand } from '@cardsleuth/types';
import { cardIndex, rankValue } from './cards.js';
import { EngineError } from './errors.js';

/**
 * Size of the bag intersection: each distinct value counts
 * min(occurrences in xs, occurrences in ys) times.
 */
export function multisetIntersectionSize<T>(xs: readonly T[], ys: readonly T[]): number {
  const counts = new Map<T, number>();
  for (const x of xs) counts.set(x, (counts.get(x) ?? 0) + 1);

  let shared = 0;
  for (const y of ys) {
    const remaining = counts.get(y) ?? 0;
    if (remaining > 0) {
      shared++;
      counts.set(y, remaining - 1);
    }
  }
  return shared;
}

export function feedback(reference: Hand, guess: Hand): Feedback {
  if (guess.length === 0) {
    throw new EngineError('Cannot score an empty guess');
  }

  let lowest = Infinity;
  let highest = -Infinity;
  const guessCards = new Set<number>();
  for (const card of guess) {
    const value = rankValue(card.rank);
    if (value < lowest) lowest = value;
    if (value > highest) highest = value;
    guessCards.add(cardIndex(card));
  }

  let correctCards = 0;
  let lowerRanks = 0;
  let higherRanks = 0;
  for (const card of reference) {
    const value = rankValue(card.rank);
    if (value < lowest) lowerRanks++;
    if (value > highest) higherRanks++;
    if (guessCards.has(cardIndex(card))) correctCards++;
  }

  const correctRanks = multisetIntersectionSize(
    reference.map((c) => c.rank),
    guess.map((c) => c.rank)
  );
  const correctSuits = multisetIntersectionSize(
    reference.map((c) => c.suit),
    guess.map((c) => c.suit)
  );

  return [correctCards, lowerRanks, correctRanks, higherRanks, correctSuits];
}

/**
 * Packs a feedback tuple into one integer for hashing. Each component is at
 * most the hand size (<= 4), so 3 bits apiece is enough.
 */
export function feedbackKey(fb: Feedback): number {
  const [c, l, r, h, s] = fb;
  return (((c * 8 + l) * 8 + r) * 8 + h) * 8 + s;
}

export function feedbackEquals(a: Feedback, b: Feedback): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2] && a[3] === b[3] && a[4] === b[4];
}

/** All cards right: (n, 0, n, 0, n) */
export function winningFeedback(size: number): Feedback {
  return [size, 0, size, 0, size];
}

export function isWin(fb: Feedback, size: number): boolean {
  return fb[0] === size;
}
