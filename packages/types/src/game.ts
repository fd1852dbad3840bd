/**
 * Guessing game type definitions
 */
import type { Hand } from './cards.js';

/**
 * Five-number score of a guess against a reference hand, in the fixed order
 * (correctCards, lowerRanks, correctRanks, higherRanks, correctSuits).
 */
export type Feedback = readonly [
  correctCards: number,
  lowerRanks: number,
  correctRanks: number,
  higherRanks: number,
  correctSuits: number,
];

/** Hands still consistent with every feedback received so far, in enumeration order. */
export type CandidateSpace = readonly Hand[];

/** What the guesser carries between rounds. */
export interface GuesserState {
  guess: Hand;
  candidates: CandidateSpace;
}

export interface GuessStep {
  guess: Hand;
  feedback: Feedback;
  /** Candidate-space size after this guess was played */
  remaining: number;
}

export interface SolveSummary {
  success: boolean;
  answer: Hand;
  steps: GuessStep[];
}

export interface SimulationSummary {
  games: number;
  solved: number;
  totalGuesses: number;
  averageGuesses: number;
  maxGuesses: number;
  /** distribution[k] = games solved in exactly k guesses */
  distribution: Record<number, number>;
}
