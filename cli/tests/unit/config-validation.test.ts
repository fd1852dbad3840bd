/**
 * Config Validation Tests
 *
 * Startup configuration fails fast with every invalid setting listed.
 */
import { describe, it, expect } from 'vitest';
import { loadConfig, loadConfigOrThrow } from '../../src/config/validation.js';

describe('Config Validation', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      success: true,
      config: { maxGuesses: 100, logLevel: undefined, showSymbols: false },
    });
  });

  it('reads every setting', () => {
    const result = loadConfig({
      CARDSLEUTH_MAX_GUESSES: '12',
      CARDSLEUTH_LOG_LEVEL: ' WARN ',
      CARDSLEUTH_SHOW_SYMBOLS: 'true',
    });
    expect(result).toEqual({
      success: true,
      config: { maxGuesses: 12, logLevel: 'warn', showSymbols: true },
    });
  });

  it('falls back to LOG_LEVEL and prefers the prefixed variable', () => {
    const fallback = loadConfig({ LOG_LEVEL: 'error' });
    expect(fallback.success && fallback.config.logLevel).toBe('error');

    const both = loadConfig({ LOG_LEVEL: 'error', CARDSLEUTH_LOG_LEVEL: 'debug' });
    expect(both.success && both.config.logLevel).toBe('debug');
  });

  it('accepts 1 and 0 as flag values', () => {
    const on = loadConfig({ CARDSLEUTH_SHOW_SYMBOLS: '1' });
    expect(on.success && on.config.showSymbols).toBe(true);
    const off = loadConfig({ CARDSLEUTH_SHOW_SYMBOLS: '0' });
    expect(off.success && off.config.showSymbols).toBe(false);
  });

  it('ignores unrelated variables', () => {
    const result = loadConfig({ PATH: '/usr/bin', HOME: '/root' });
    expect(result.success).toBe(true);
  });

  describe('invalid settings', () => {
    it('rejects a non-numeric guess cap', () => {
      expect(loadConfig({ CARDSLEUTH_MAX_GUESSES: 'lots' })).toEqual({
        success: false,
        errors: [{ key: 'CARDSLEUTH_MAX_GUESSES', value: 'lots', reason: 'Must be a number' }],
      });
    });

    it('rejects fractional and zero guess caps', () => {
      const fractional = loadConfig({ CARDSLEUTH_MAX_GUESSES: '2.5' });
      expect(fractional.success).toBe(false);
      if (!fractional.success) {
        expect(fractional.errors[0].reason).toBe('Must be a whole number');
      }

      const zero = loadConfig({ CARDSLEUTH_MAX_GUESSES: '0' });
      expect(zero.success).toBe(false);
      if (!zero.success) {
        expect(zero.errors[0].reason).toBe('Must be at least 1');
      }
    });

    it('rejects unknown log levels', () => {
      const result = loadConfig({ CARDSLEUTH_LOG_LEVEL: 'verbose' });
      expect(result).toEqual({
        success: false,
        errors: [
          {
            key: 'CARDSLEUTH_LOG_LEVEL',
            value: 'verbose',
            reason: 'Must be one of: debug, info, warn, error',
          },
        ],
      });
    });

    it('reports every problem at once and truncates long values', () => {
      const result = loadConfig({
        CARDSLEUTH_SHOW_SYMBOLS: 'yes-please-show-the-symbols',
        LOG_LEVEL: 'loud',
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errors).toHaveLength(2);
        expect(result.errors).toContainEqual({
          key: 'CARDSLEUTH_SHOW_SYMBOLS',
          value: 'yes-please-show-the-...',
          reason: 'Must be true or false',
        });
        expect(result.errors.map((e) => e.key)).toContain('LOG_LEVEL');
      }
    });

    it('throws a single error listing the problems', () => {
      expect(() => loadConfigOrThrow({ CARDSLEUTH_MAX_GUESSES: 'lots' })).toThrow(
        'Invalid configuration:\n  - CARDSLEUTH_MAX_GUESSES=lots: Must be a number'
      );
      expect(loadConfigOrThrow({}).maxGuesses).toBe(100);
    });
  });
});
