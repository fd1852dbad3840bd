import { describe, it, expect } from 'vitest';
import { parseHand } from '@cardsleuth/protocol';
import {
  EmptyCandidateSpaceError,
  HandSizeMismatchError,
  InvalidHandSizeError,
  InvalidSelectionError,
} from '@cardsleuth/engine';
import { ErrorCodes, createError, toErrorResponse } from '../../src/types/errors.js';

describe('error code translation', () => {
  it('creates errors without details when none are given', () => {
    expect(createError(ErrorCodes.INTERNAL_ERROR, 'oops')).toEqual({
      type: 'error',
      code: 'INTERNAL_ERROR',
      message: 'oops',
    });
  });

  it('maps each engine error to its code', () => {
    expect(toErrorResponse(new InvalidSelectionError('hand is empty'))).toEqual({
      type: 'error',
      code: 'INVALID_SELECTION',
      message: 'Invalid selection: hand is empty',
    });
    expect(toErrorResponse(new InvalidHandSizeError(5))).toEqual({
      type: 'error',
      code: 'INVALID_HAND_SIZE',
      message: 'The game can only guess 2-4 cards, got 5',
      details: { size: 5 },
    });
    expect(toErrorResponse(new HandSizeMismatchError(3, 2)).details).toEqual({ expected: 3, actual: 2 });
    expect(
      toErrorResponse(new EmptyCandidateSpaceError(parseHand('2D 6S'), [2, 0, 2, 0, 2])).details
    ).toEqual({ feedback: [2, 0, 2, 0, 2] });
  });

  it('falls back to INTERNAL_ERROR', () => {
    expect(toErrorResponse(new Error('boom')).code).toBe('INTERNAL_ERROR');
    expect(toErrorResponse('plain string')).toEqual({
      type: 'error',
      code: 'INTERNAL_ERROR',
      message: 'plain string',
    });
  });
});
