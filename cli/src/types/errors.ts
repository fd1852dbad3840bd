/**
 * Error code taxonomy for the interactive surface
 */
import {
  EmptyCandidateSpaceError,
  HandSizeMismatchError,
  InvalidHandSizeError,
  InvalidSelectionError,
} from '@cardsleuth/engine';

export const ErrorCodes = {
  // Input errors: reported, the loop keeps going
  INVALID_SELECTION: 'INVALID_SELECTION',     // Empty, malformed or repeated cards
  INVALID_HAND_SIZE: 'INVALID_HAND_SIZE',     // Answer outside 2-4 cards

  // Guesser errors: reported, the program exits non-zero
  HAND_SIZE_MISMATCH: 'HAND_SIZE_MISMATCH',   // Guess and answer differ in size
  EMPTY_CANDIDATE_SPACE: 'EMPTY_CANDIDATE_SPACE', // Feedback left no consistent hand

  // Startup errors
  INVALID_CONFIG: 'INVALID_CONFIG',           // Environment failed validation

  INTERNAL_ERROR: 'INTERNAL_ERROR',           // Unexpected error
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

/**
 * Structured error response
 */
export interface ErrorResponse {
  type: 'error';
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Create error response
 */
export function createError(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): ErrorResponse {
  return {
    type: 'error',
    code,
    message,
    ...(details && { details }),
  };
}

/**
 * Map an engine failure to its code. Anything unrecognised is INTERNAL_ERROR.
 */
export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof InvalidSelectionError) {
    return createError(ErrorCodes.INVALID_SELECTION, err.message);
  }
  if (err instanceof InvalidHandSizeError) {
    return createError(ErrorCodes.INVALID_HAND_SIZE, err.message, { size: err.size });
  }
  if (err instanceof HandSizeMismatchError) {
    return createError(ErrorCodes.HAND_SIZE_MISMATCH, err.message, {
      expected: err.expected,
      actual: err.actual,
    });
  }
  if (err instanceof EmptyCandidateSpaceError) {
    return createError(ErrorCodes.EMPTY_CANDIDATE_SPACE, err.message, {
      feedback: [...err.feedback],
    });
  }
  const message = err instanceof Error ? err.message : String(err);
  return createError(ErrorCodes.INTERNAL_ERROR, message);
}

/** Printed, line by line, when an answer cannot be parsed */
export const INVALID_ANSWER_MESSAGE = [
  'Invalid answer:  input must be a string of one or more',
  'distinct cards separated by whitespace, where each card',
  'is a single character rank 2-9, T, J, Q, K or A, followed',
  'by a single character suit C, D, H, or S.',
] as const;

export const INVALID_GUESS_MESSAGE = 'Invalid guess';
