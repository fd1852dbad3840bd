export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (raw: string): raw is LogLevel =>
  raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error';

export const resolveLogLevel = (env: NodeJS.ProcessEnv = process.env): LogLevel => {
  const raw = (
    env.CARDSLEUTH_LOG_LEVEL ??
    env.LOG_LEVEL ??
    (env.NODE_ENV === 'production' ? 'info' : 'debug')
  )
    .toString()
    .trim()
    .toLowerCase();

  return isLogLevel(raw) ? raw : 'info';
};

let minRank = LEVELS[resolveLogLevel()];

/** Override the level picked up from the environment at load time. */
export const setLogLevel = (level: LogLevel): void => {
  minRank = LEVELS[level];
};

const shouldLog = (level: LogLevel): boolean => LEVELS[level] >= minRank;

/** Context object for structured logging, correlated by game */
export interface LogContext {
  runId?: string;
  [key: string]: unknown;
}

const isLogContext = (arg: unknown): arg is LogContext => {
  return arg !== null && typeof arg === 'object' && !Array.isArray(arg) && !(arg instanceof Error);
};

/**
 * Format structured context as key=value pairs for log correlation.
 */
export const formatContext = (context: LogContext): string => {
  const pairs = Object.entries(context)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`)
    .join(' ');
  return pairs;
};

type ConsoleMethod = (...args: unknown[]) => void;

const emit = (level: LogLevel, write: ConsoleMethod, args: unknown[]): void => {
  if (!shouldLog(level)) return;
  // Trailing context object with a runId is rendered as key=value pairs
  const lastArg = args[args.length - 1];
  if (args.length >= 2 && isLogContext(lastArg) && 'runId' in lastArg) {
    write(...args.slice(0, -1), formatContext(lastArg));
  } else {
    write(...args);
  }
};

export const logDebug = (...args: unknown[]): void => emit('debug', (...a) => console.debug(...a), args);
export const logInfo = (...args: unknown[]): void => emit('info', (...a) => console.info(...a), args);
export const logWarn = (...args: unknown[]): void => emit('warn', (...a) => console.warn(...a), args);
export const logError = (...args: unknown[]): void => emit('error', (...a) => console.error(...a), args);

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export const logger: Logger = {
  debug: logDebug,
  info: logInfo,
  warn: logWarn,
  error: logError,
};
