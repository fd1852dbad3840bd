/**
 * Notation-specific error types.
 * Thrown when decoding card text typed by a user.
 */

export class NotationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotationError';
  }
}

/** Error thrown when a token is not a two-character card */
export class InvalidCardTokenError extends NotationError {
  readonly token: string;

  constructor(token: string) {
    super(`Invalid card: "${token}" (expected rank 2-9, T, J, Q, K or A followed by suit C, D, H or S)`);
    this.name = 'InvalidCardTokenError';
    this.token = token;
  }
}
