import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  formatContext,
  isLogLevel,
  logDebug,
  logError,
  logInfo,
  resolveLogLevel,
  setLogLevel,
} from '../../src/logger.js';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel('debug');
  });

  it('resolves the level from the environment', () => {
    expect(resolveLogLevel({ CARDSLEUTH_LOG_LEVEL: 'warn', LOG_LEVEL: 'error' })).toBe('warn');
    expect(resolveLogLevel({ LOG_LEVEL: ' ERROR ' })).toBe('error');
    expect(resolveLogLevel({ NODE_ENV: 'production' })).toBe('info');
    expect(resolveLogLevel({ NODE_ENV: 'development' })).toBe('debug');
    expect(resolveLogLevel({ LOG_LEVEL: 'chatty' })).toBe('info');
  });

  it('recognizes level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });

  it('formats context as key=value pairs, skipping undefined', () => {
    expect(formatContext({ runId: 'game-1', round: 2, skipped: undefined, feedback: [1, 0] })).toBe(
      'runId=game-1 round=2 feedback=[1,0]'
    );
  });

  it('appends a trailing context with runId as key=value pairs', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    setLogLevel('debug');
    logInfo('Round scored', { runId: 'game-3', remaining: 17 });
    expect(info).toHaveBeenCalledWith('Round scored', 'runId=game-3 remaining=17');
  });

  it('passes other objects through untouched', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    logInfo('payload', { remaining: 17 });
    expect(info).toHaveBeenCalledWith('payload', { remaining: 17 });
  });

  it('drops messages below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('error');
    logDebug('hidden');
    logError('shown');
    expect(debug).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('shown');
  });
});
