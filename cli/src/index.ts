/**
 * Card guessing game CLI
 *
 * Reads a hidden hand from stdin and lets the engine find it.
 */
import { main } from './app.js';
import { logError } from './logger.js';

main(process.argv.slice(2), process.env, { input: process.stdin, output: process.stdout })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logError('Fatal error:', err);
    process.exitCode = 1;
  });
