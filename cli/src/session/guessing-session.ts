/**
 * Guessing Session
 *
 * One interactive run: takes answers line by line, lets the engine guess each
 * one and prints the transcript. Output and logging are injected so the
 * session can be driven without a terminal.
 */
import { SUIT_SYMBOLS, type Hand, type SolveSummary } from '@cardsleuth/types';
import { HandInputSchema, formatFeedback, formatHand, rankSymbol } from '@cardsleuth/protocol';
import {
  EmptyCandidateSpaceError,
  HandSizeMismatchError,
  InvalidSelectionError,
  isPlayableSize,
  solve,
  type SolveOptions,
} from '@cardsleuth/engine';
import { MAX_HAND_SIZE, MIN_HAND_SIZE } from '@cardsleuth/constants';
import type { CliConfig } from '../config/validation.js';
import type { Logger } from '../logger.js';
import {
  ErrorCodes,
  INVALID_ANSWER_MESSAGE,
  INVALID_GUESS_MESSAGE,
  createError,
  toErrorResponse,
  type ErrorResponse,
} from '../types/errors.js';

export const BANNER = [
  '- Welcome to the Card Guessing Game!',
  '- Enter the cards (answer) in the format "4C 3H"',
  "- Type 'exit' if you wish to leave the game",
] as const;

export const PROMPT = '- ';
export const EXIT_COMMAND = 'exit';
export const GOODBYE = 'Exiting the game. Goodbye!';

export interface SessionOutput {
  writeLine(line: string): void;
}

export type AnswerOutcome =
  | { status: 'won'; guesses: number }
  | { status: 'gave_up'; guesses: number }
  | { status: 'rejected'; error: ErrorResponse }
  | { status: 'aborted'; error: ErrorResponse };

export type LineResult =
  | { action: 'continue'; outcome: AnswerOutcome }
  | { action: 'exit'; code: number };

export type Solver = (answer: Hand, options: SolveOptions) => SolveSummary;

export interface GuessingSessionOptions {
  output: SessionOutput;
  logger: Logger;
  config: CliConfig;
  /** Defaults to the engine's solve */
  solver?: Solver;
}

export class GuessingSession {
  private readonly output: SessionOutput;
  private readonly logger: Logger;
  private readonly config: CliConfig;
  private readonly solver: Solver;
  private gamesPlayed = 0;

  constructor(options: GuessingSessionOptions) {
    this.output = options.output;
    this.logger = options.logger;
    this.config = options.config;
    this.solver = options.solver ?? solve;
  }

  printBanner(): void {
    for (const line of BANNER) this.output.writeLine(line);
  }

  /**
   * Handle one line typed at the prompt
   */
  handleLine(line: string): LineResult {
    if (line.trim() === EXIT_COMMAND) {
      this.output.writeLine(GOODBYE);
      return { action: 'exit', code: 0 };
    }

    const outcome = this.playAnswer(line);
    if (outcome.status === 'aborted') {
      return { action: 'exit', code: 1 };
    }
    return { action: 'continue', outcome };
  }

  /**
   * Parse an answer and let the engine guess it, printing each round.
   */
  playAnswer(text: string): AnswerOutcome {
    const parsed = HandInputSchema.safeParse(text);
    if (!parsed.success) {
      for (const line of INVALID_ANSWER_MESSAGE) this.output.writeLine(line);
      const reason = parsed.error.issues.map((i) => i.message).join('; ');
      this.logger.debug('Rejected answer:', reason);
      return { status: 'rejected', error: createError(ErrorCodes.INVALID_SELECTION, reason) };
    }

    const answer = parsed.data;
    if (!isPlayableSize(answer.length)) {
      this.output.writeLine(
        `Invalid answer:  the game can only guess ${MIN_HAND_SIZE}-${MAX_HAND_SIZE} cards, got ${answer.length}`
      );
      return {
        status: 'rejected',
        error: createError(ErrorCodes.INVALID_HAND_SIZE, 'Unsupported hand size', { size: answer.length }),
      };
    }

    this.gamesPlayed++;
    const runId = `game-${this.gamesPlayed}`;
    let roundStarted = Date.now();

    try {
      const summary = this.solver(answer, {
        maxGuesses: this.config.maxGuesses,
        onGuess: (guess, round) => {
          roundStarted = Date.now();
          this.output.writeLine(`Guess ${round}:  ${this.displayHand(guess)}`);
        },
        onStep: (step, round) => {
          this.output.writeLine(`Feedback: ${formatFeedback(step.feedback)}`);
          this.logger.debug('Round scored', {
            runId,
            round,
            remaining: step.remaining,
            ms: Date.now() - roundStarted,
          });
        },
      });

      const guesses = summary.steps.length;
      if (summary.success) {
        this.output.writeLine(`You got it in ${guesses} guesses!`);
        return { status: 'won', guesses };
      }
      this.output.writeLine(`Gave up after ${guesses} guesses.`);
      this.logger.warn('Guess cap reached', { runId, maxGuesses: this.config.maxGuesses });
      return { status: 'gave_up', guesses };
    } catch (err) {
      if (err instanceof InvalidSelectionError || err instanceof HandSizeMismatchError) {
        this.output.writeLine(INVALID_GUESS_MESSAGE);
        this.logger.error('Guesser produced an invalid guess:', err.message, { runId });
        return { status: 'aborted', error: toErrorResponse(err) };
      }
      if (err instanceof EmptyCandidateSpaceError) {
        this.logger.error('Candidate space exhausted:', err.message, { runId });
        return { status: 'aborted', error: toErrorResponse(err) };
      }
      throw err;
    }
  }

  private displayHand(hand: Hand): string {
    if (!this.config.showSymbols) return formatHand(hand);
    return hand.map((c) => `${rankSymbol(c.rank)}${SUIT_SYMBOLS[c.suit]}`).join(' ');
  }
}
