/**
 * CLI wiring: configuration, flags, then either the prompt loop or a
 * simulation. Returns the exit code instead of exiting so it can be tested.
 */
import { loadConfig } from './config/validation.js';
import { logger as defaultLogger, setLogLevel, type Logger } from './logger.js';
import { parseCliArgs, USAGE, type CliCommand } from './args.js';
import { runSimulation } from './commands/simulate.js';
import { GuessingSession, runPromptLoop, type SessionOutput } from './session/index.js';
import { ErrorCodes, createError, toErrorResponse } from './types/errors.js';

export interface AppIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  logger?: Logger;
}

export async function main(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
  io: AppIO
): Promise<number> {
  const logger = io.logger ?? defaultLogger;
  const out: SessionOutput = { writeLine: (line) => io.output.write(`${line}\n`) };

  const configResult = loadConfig(env);
  if (!configResult.success) {
    const error = createError(ErrorCodes.INVALID_CONFIG, 'Invalid configuration', {
      errors: configResult.errors,
    });
    logger.error(`[${error.code}] ${error.message}`);
    for (const e of configResult.errors) {
      logger.error(`  ${e.key}=${e.value}: ${e.reason}`);
    }
    return 1;
  }
  const config = configResult.config;
  if (config.logLevel) setLogLevel(config.logLevel);

  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    for (const line of USAGE) out.writeLine(line);
    return 1;
  }

  switch (command.kind) {
    case 'help':
      for (const line of USAGE) out.writeLine(line);
      return 0;
    case 'simulate':
      try {
        runSimulation(command.games, command.size, { output: out, logger, config });
        return 0;
      } catch (err) {
        const error = toErrorResponse(err);
        logger.error(`[${error.code}] ${error.message}`);
        return 1;
      }
    case 'interactive': {
      const session = new GuessingSession({ output: out, logger, config });
      return runPromptLoop(session, io.input, io.output);
    }
  }
}
