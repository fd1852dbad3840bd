/**
 * Automated games: play the guesser against a known answer until it wins.
 */
import type { Feedback, GuessStep, Hand, SimulationSummary, SolveSummary } from '@cardsleuth/types';
import { DEFAULT_MAX_GUESSES } from '@cardsleuth/constants';
import { hasDuplicates } from './cards.js';
import { generateHands } from './candidates.js';
import { HandSizeMismatchError, InvalidHandSizeError, InvalidSelectionError } from './errors.js';
import { feedback, isWin } from './feedback.js';
import { initialGuess, isPlayableSize } from './opening.js';
import { nextGuess } from './refine.js';

export interface SolveOptions {
  /** Give up after this many guesses (default DEFAULT_MAX_GUESSES) */
  maxGuesses?: number;
  /** Called with each guess before it is checked and scored */
  onGuess?: (guess: Hand, round: number) => void;
  /** Called once each guess has been scored */
  onStep?: (step: GuessStep, round: number) => void;
}

/**
 * @throws InvalidSelectionError for an empty hand or one with a repeated card
 */
export function validateSelection(cards: Hand): void {
  if (cards.length === 0) {
    throw new InvalidSelectionError('hand is empty');
  }
  if (hasDuplicates(cards)) {
    throw new InvalidSelectionError('hand contains a repeated card');
  }
}

export function solve(answer: Hand, options: SolveOptions = {}): SolveSummary {
  validateSelection(answer);
  if (!isPlayableSize(answer.length)) {
    throw new InvalidHandSizeError(answer.length);
  }

  const maxGuesses = options.maxGuesses ?? DEFAULT_MAX_GUESSES;
  const steps: GuessStep[] = [];
  let state = initialGuess(answer.length);

  for (let round = 1; round <= maxGuesses; round++) {
    options.onGuess?.(state.guess, round);
    validateSelection(state.guess);
    if (state.guess.length !== answer.length) {
      throw new HandSizeMismatchError(answer.length, state.guess.length);
    }

    const result: Feedback = feedback(answer, state.guess);
    const step: GuessStep = {
      guess: state.guess,
      feedback: result,
      remaining: state.candidates.length,
    };
    steps.push(step);
    options.onStep?.(step, round);

    if (isWin(result, answer.length)) {
      return { success: true, answer, steps };
    }
    if (round < maxGuesses) {
      state = nextGuess(state, result);
    }
  }

  return { success: false, answer, steps };
}

/**
 * Deterministic sample of `count` answers of one size: evenly spaced through
 * the enumeration order, starting at the first hand.
 */
export function sampleAnswers(size: number, count: number): Hand[] {
  if (!isPlayableSize(size)) {
    throw new InvalidHandSizeError(size);
  }
  const all = generateHands(size);
  const wanted = Math.max(0, Math.min(count, all.length));
  if (wanted === 0) return [];

  const stride = Math.floor(all.length / wanted);
  const sample: Hand[] = [];
  for (let i = 0; i < wanted; i++) sample.push(all[i * stride]);
  return sample;
}

export function simulate(answers: readonly Hand[], options: Pick<SolveOptions, 'maxGuesses'> = {}): SimulationSummary {
  const distribution: Record<number, number> = {};
  let solved = 0;
  let totalGuesses = 0;
  let maxGuesses = 0;

  for (const answer of answers) {
    const summary = solve(answer, options);
    if (!summary.success) continue;

    const guesses = summary.steps.length;
    solved++;
    totalGuesses += guesses;
    maxGuesses = Math.max(maxGuesses, guesses);
    distribution[guesses] = (distribution[guesses] ?? 0) + 1;
  }

  return {
    games: answers.length,
    solved,
    totalGuesses,
    averageGuesses: solved === 0 ? 0 : totalGuesses / solved,
    maxGuesses,
    distribution,
  };
}
