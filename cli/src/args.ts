/**
 * Command-line flags
 */
import { parseArgs } from 'node:util';
import { z } from 'zod';

export type CliCommand =
  | { kind: 'interactive' }
  | { kind: 'simulate'; games: number; size: number }
  | { kind: 'help' };

export const USAGE = [
  'Usage: cardsleuth [--simulate <games>] [--size <2|3|4>]',
  '',
  '  (no flags)          interactive game: type a hidden hand, watch it being guessed',
  '  --simulate <games>  solve <games> sample hands and print guess statistics',
  '  --size <n>          hand size for --simulate (default 3)',
  '  -h, --help          show this message',
] as const;

const gamesSchema = z.coerce.number().int().positive();
const sizeSchema = z.coerce.number().int().min(2).max(4);

/**
 * @throws Error for unknown flags or values out of range
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      simulate: { type: 'string' },
      size: { type: 'string', short: 's' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
    allowPositionals: false,
  });

  if (values.help) return { kind: 'help' };

  if (values.simulate === undefined) {
    if (values.size !== undefined) {
      throw new Error('--size only applies together with --simulate');
    }
    return { kind: 'interactive' };
  }

  const games = gamesSchema.safeParse(values.simulate);
  if (!games.success) {
    throw new Error(`--simulate expects a positive whole number, got "${values.simulate}"`);
  }
  const size = sizeSchema.safeParse(values.size ?? '3');
  if (!size.success) {
    throw new Error(`--size expects 2, 3 or 4, got "${values.size}"`);
  }
  return { kind: 'simulate', games: games.data, size: size.data };
}
