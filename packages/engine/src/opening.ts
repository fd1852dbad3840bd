/**
 * First guess of a game and the candidate space it starts from.
 */
import type { GuesserState, Hand } from '@cardsleuth/types';
import { OPENING_GUESSES, type OpeningHandSize } from '@cardsleuth/constants';
import { parseCard } from '@cardsleuth/protocol';
import { handKey } from './cards.js';
import { generateHands } from './candidates.js';
import { InvalidHandSizeError } from './errors.js';

export function isPlayableSize(size: number): size is OpeningHandSize {
  return size === 2 || size === 3 || size === 4;
}

/**
 * Fixed opening hand for a hand size. Not derived: picked because it
 * converged fastest in simulation.
 */
export function openingHand(size: number): Hand {
  if (!isPlayableSize(size)) {
    throw new InvalidHandSizeError(size);
  }
  const tokens: readonly string[] = OPENING_GUESSES[size];
  return tokens.map(parseCard);
}

/**
 * Opening guess plus every other hand of the same size. The opening hand is
 * left out of the candidates since it has already been played.
 */
export function initialGuess(size: number): GuesserState {
  const guess = openingHand(size);
  const guessKey = handKey(guess);
  const candidates = generateHands(size).filter((hand) => handKey(hand) !== guessKey);
  return { guess, candidates };
}
