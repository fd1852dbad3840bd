// Hand-size bounds for the guessing game. Sizes outside this range are rejected
// before any candidate space is built.

export const MIN_HAND_SIZE = 2;
export const MAX_HAND_SIZE = 4;
export const DECK_SIZE = 52;

/** Guess cap for one automated game unless configured otherwise */
export const DEFAULT_MAX_GUESSES = 100;

/**
 * Above this hand size the refiner stops computing expected remaining
 * candidates per guess and takes the middle candidate instead.
 */
export const MAX_SCORED_HAND_SIZE = 2;
