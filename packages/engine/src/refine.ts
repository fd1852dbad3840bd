/**
 * Guess refinement: narrow the candidate space with the latest feedback, then
 * choose the next guess from what is left.
 */
import type { CandidateSpace, Feedback, GuesserState, Hand } from '@cardsleuth/types';
import { MAX_SCORED_HAND_SIZE } from '@cardsleuth/constants';
import { handKey } from './cards.js';
import { EmptyCandidateSpaceError, EngineError } from './errors.js';
import { feedback, feedbackEquals, feedbackKey } from './feedback.js';

/**
 * Keep the candidates that, had they been the answer, would have produced
 * `observed` against `previousGuess`. The previous guess itself is dropped.
 */
export function filterConsistent(
  candidates: CandidateSpace,
  previousGuess: Hand,
  observed: Feedback
): Hand[] {
  const previousKey = handKey(previousGuess);
  return candidates.filter(
    (candidate) =>
      feedbackEquals(feedback(candidate, previousGuess), observed) &&
      handKey(candidate) !== previousKey
  );
}

/**
 * Expected size of the next candidate space if `guess` is played:
 * sum of squared group sizes over the total, where candidates are grouped
 * by their feedback against `guess`.
 */
export function expectedRemaining(guess: Hand, candidates: CandidateSpace): number {
  const groups = new Map<number, number>();
  for (const candidate of candidates) {
    const key = feedbackKey(feedback(candidate, guess));
    groups.set(key, (groups.get(key) ?? 0) + 1);
  }

  let sumSquares = 0;
  let total = 0;
  for (const size of groups.values()) {
    sumSquares += size * size;
    total += size;
  }
  return total === 0 ? 0 : sumSquares / total;
}

/**
 * Index of the next guess within `candidates`.
 *
 * Two-card hands: the candidate with the lowest expected remaining count,
 * earliest on ties. Larger hands: the middle candidate, since scoring every
 * candidate against every other is quadratic in a space of up to 270k hands.
 */
export function selectGuessIndex(candidates: CandidateSpace): number {
  if (candidates.length === 0) {
    throw new EngineError('Cannot select a guess from an empty candidate space');
  }

  const size = candidates[0].length;
  if (size > MAX_SCORED_HAND_SIZE) {
    return Math.floor(candidates.length / 2);
  }

  let bestIndex = 0;
  let bestCost = Infinity;
  candidates.forEach((guess, index) => {
    const cost = expectedRemaining(guess, candidates);
    if (cost < bestCost) {
      bestCost = cost;
      bestIndex = index;
    }
  });
  return bestIndex;
}

export function selectGuess(candidates: CandidateSpace): Hand {
  return candidates[selectGuessIndex(candidates)];
}

/**
 * One round of the guesser: filter by the feedback the previous guess got,
 * pick the next guess, and return it with the candidates that remain.
 * The input state is left untouched.
 *
 * @throws EmptyCandidateSpaceError when no candidate survives filtering
 */
export function nextGuess(state: GuesserState, observed: Feedback): GuesserState {
  const filtered = filterConsistent(state.candidates, state.guess, observed);
  if (filtered.length === 0) {
    throw new EmptyCandidateSpaceError(state.guess, observed);
  }

  const chosen = selectGuessIndex(filtered);
  return {
    guess: filtered[chosen],
    candidates: filtered.filter((_, index) => index !== chosen),
  };
}
