/**
 * Configuration Validation
 *
 * Reads the CLI's settings from the environment once at startup and fails
 * fast with every problem listed, instead of misbehaving mid-game.
 */
import { z } from 'zod';
import { DEFAULT_MAX_GUESSES } from '@cardsleuth/constants';
import { LOG_LEVELS, type LogLevel } from '../logger.js';

export interface ConfigValidationError {
  key: string;
  value: string;
  reason: string;
}

export interface CliConfig {
  maxGuesses: number;
  /** Unset means the logger keeps the level it resolved itself */
  logLevel?: LogLevel;
  showSymbols: boolean;
}

export type ConfigResult =
  | { success: true; config: CliConfig }
  | { success: false; errors: ConfigValidationError[] };

const logLevelSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(LOG_LEVELS, { errorMap: () => ({ message: `Must be one of: ${LOG_LEVELS.join(', ')}` }) }));

const booleanFlagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0'], { errorMap: () => ({ message: 'Must be true or false' }) }))
  .transform((v) => v === 'true' || v === '1');

const EnvSchema = z.object({
  CARDSLEUTH_MAX_GUESSES: z.coerce
    .number({ invalid_type_error: 'Must be a number' })
    .int('Must be a whole number')
    .positive('Must be at least 1')
    .default(DEFAULT_MAX_GUESSES),
  CARDSLEUTH_LOG_LEVEL: logLevelSchema.optional(),
  LOG_LEVEL: logLevelSchema.optional(),
  CARDSLEUTH_SHOW_SYMBOLS: booleanFlagSchema.default('false'),
});

const describeValue = (value: unknown): string => {
  if (value === undefined) return '[UNSET]';
  const text = String(value);
  return text.length > 20 ? text.slice(0, 20) + '...' : text;
};

/**
 * Parse configuration from an environment map
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConfigResult {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    return {
      success: false,
      errors: parsed.error.issues.map((issue) => {
        const key = String(issue.path[0] ?? '(root)');
        return { key, value: describeValue(env[key]), reason: issue.message };
      }),
    };
  }

  const data = parsed.data;
  return {
    success: true,
    config: {
      maxGuesses: data.CARDSLEUTH_MAX_GUESSES,
      logLevel: data.CARDSLEUTH_LOG_LEVEL ?? data.LOG_LEVEL,
      showSymbols: data.CARDSLEUTH_SHOW_SYMBOLS,
    },
  };
}

/**
 * Parse configuration, throwing one error that lists every problem
 *
 * @throws Error if any setting is invalid
 */
export function loadConfigOrThrow(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const result = loadConfig(env);
  if (!result.success) {
    const lines = result.errors.map((e) => `  - ${e.key}=${e.value}: ${e.reason}`);
    throw new Error(`Invalid configuration:\n${lines.join('\n')}`);
  }
  return result.config;
}
