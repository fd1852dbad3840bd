/**
 * Zod schemas for validating hands entered at the prompt or passed in as data.
 * Used by the CLI to reject bad input before any engine call runs.
 */

import { z } from 'zod';
import { RANKS, SUITS, type Card } from '@cardsleuth/types';
import { NotationError } from './errors.js';
import { formatCard, parseCard } from './notation.js';

export const SuitSchema = z.enum(SUITS);
export const RankSchema = z.enum(RANKS);

export const CardSchema = z.object({
  suit: SuitSchema,
  rank: RankSchema,
});

export const HandValidationMessages = {
  EMPTY: 'Hand must contain at least one card',
  DUPLICATE: 'Hand contains a duplicate card',
} as const;

function findDuplicate(cards: readonly Card[]): Card | null {
  const seen = new Set<string>();
  for (const card of cards) {
    const key = formatCard(card);
    if (seen.has(key)) return card;
    seen.add(key);
  }
  return null;
}

/**
 * Structured hand: at least one card, no card twice.
 * Size limits are the engine's concern (it rejects sizes it cannot play).
 */
export const HandSchema = z
  .array(CardSchema)
  .min(1, HandValidationMessages.EMPTY)
  .superRefine((cards, ctx) => {
    const dup = findDuplicate(cards);
    if (dup) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${HandValidationMessages.DUPLICATE}: ${formatCard(dup)}`,
      });
    }
  });

/**
 * Raw text such as "4C 3H" -> validated hand.
 */
export const HandInputSchema = z.string().transform((text, ctx): Card[] => {
  const tokens = text.trim().split(/\s+/).filter((t) => t.length > 0);
  if (tokens.length === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: HandValidationMessages.EMPTY });
    return z.NEVER;
  }

  const cards: Card[] = [];
  for (const token of tokens) {
    try {
      cards.push(parseCard(token));
    } catch (err) {
      if (!(err instanceof NotationError)) throw err;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message });
      return z.NEVER;
    }
  }

  const dup = findDuplicate(cards);
  if (dup) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `${HandValidationMessages.DUPLICATE}: ${formatCard(dup)}`,
    });
    return z.NEVER;
  }
  return cards;
});

export type CardInput = z.infer<typeof CardSchema>;
export type HandInput = z.output<typeof HandInputSchema>;
