/**
 * Opening guesses per hand size, in card notation.
 *
 * Tuned by play-testing: cards of different suits, ranks roughly 13/(n+1)
 * apart. Listed in canonical order (suit, then rank) so each matches the
 * hand the candidate enumeration produces for the same cards.
 * Do NOT reorder without re-running the simulation.
 */
export const OPENING_GUESSES = {
  2: ['2D', '6S'],
  3: ['TC', '2D', '6S'],
  4: ['2C', '5D', '7H', 'TS'],
} as const satisfies Record<number, readonly string[]>;

export type OpeningHandSize = keyof typeof OPENING_GUESSES;
