/**
 * Prompt loop over a line-oriented stream.
 */
import * as readline from 'node:readline';
import { PROMPT, type GuessingSession } from './guessing-session.js';

/**
 * Feed each input line to the session until it asks to exit or input ends.
 * Resolves to the process exit code.
 */
export async function runPromptLoop(
  session: GuessingSession,
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream
): Promise<number> {
  const rl = readline.createInterface({ input, output, terminal: false });
  rl.setPrompt(PROMPT);

  session.printBanner();
  rl.prompt();

  try {
    for await (const line of rl) {
      const result = session.handleLine(line);
      if (result.action === 'exit') {
        return result.code;
      }
      rl.prompt();
    }
    return 0;
  } finally {
    rl.close();
  }
}
