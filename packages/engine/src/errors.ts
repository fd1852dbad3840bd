/**
 * Engine error types.
 *
 * All three signal a caller or invariant problem rather than bad luck:
 * honest feedback over well-formed hands never raises any of them.
 */
import type { Feedback, Hand } from '@cardsleuth/types';
import { MAX_HAND_SIZE, MIN_HAND_SIZE } from '@cardsleuth/constants';

export class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EngineError';
  }
}

export class InvalidHandSizeError extends EngineError {
  readonly size: number;

  constructor(size: number) {
    super(`The game can only guess ${MIN_HAND_SIZE}-${MAX_HAND_SIZE} cards, got ${size}`);
    this.name = 'InvalidHandSizeError';
    this.size = size;
  }
}

/**
 * The consistency filter removed every candidate. The hidden hand always
 * survives filtering under honest feedback, so this means the feedback and
 * the answer disagree.
 */
export class EmptyCandidateSpaceError extends EngineError {
  readonly previousGuess: Hand;
  readonly feedback: Feedback;

  constructor(previousGuess: Hand, feedback: Feedback) {
    super(`No candidate hand is consistent with feedback (${feedback.join(',')})`);
    this.name = 'EmptyCandidateSpaceError';
    this.previousGuess = previousGuess;
    this.feedback = feedback;
  }
}

export class HandSizeMismatchError extends EngineError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(`Guess has ${actual} cards but the answer has ${expected}`);
    this.name = 'HandSizeMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/** A hand with no cards, or with the same card twice. */
export class InvalidSelectionError extends EngineError {
  constructor(reason: string) {
    super(`Invalid selection: ${reason}`);
    this.name = 'InvalidSelectionError';
  }
}
