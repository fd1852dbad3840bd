/**
 * Batch run over sample answers, reporting how many guesses the engine needs.
 */
import type { SimulationSummary } from '@cardsleuth/types';
import { sampleAnswers, simulate } from '@cardsleuth/engine';
import type { CliConfig } from '../config/validation.js';
import type { Logger } from '../logger.js';
import type { SessionOutput } from '../session/index.js';

export function formatSimulation(summary: SimulationSummary, size: number): string[] {
  const lines = [
    `Simulated ${summary.games} games of ${size} cards`,
    `Solved: ${summary.solved}/${summary.games}`,
    `Average guesses: ${summary.averageGuesses.toFixed(2)}`,
    `Worst case: ${summary.maxGuesses} guesses`,
  ];
  const counts = Object.keys(summary.distribution)
    .map(Number)
    .sort((a, b) => a - b);
  for (const guesses of counts) {
    lines.push(`  ${guesses} guesses: ${summary.distribution[guesses]}`);
  }
  return lines;
}

export function runSimulation(
  games: number,
  size: number,
  deps: { output: SessionOutput; logger: Logger; config: CliConfig }
): SimulationSummary {
  const started = Date.now();
  const answers = sampleAnswers(size, games);
  const summary = simulate(answers, { maxGuesses: deps.config.maxGuesses });
  deps.logger.debug('Simulation finished', { runId: `simulate-${size}`, games, ms: Date.now() - started });

  for (const line of formatSimulation(summary, size)) deps.output.writeLine(line);
  return summary;
}
