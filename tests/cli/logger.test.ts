import { describe, it, expect, afterEach, vi } from 'vitest';
import { formatMessage, isLogLevel, logger } from '../../cli/utils/logger';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('logger', () => {
  it('should prefix messages with their scope', () => {
    expect(formatMessage('Deck tiny', 'Wrote 7 cards')).toBe('[Deck tiny] Wrote 7 cards');
  });

  it('should route levels to the matching console method', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    logger.info('scope', 'hello', { cards: 7 });
    logger.warn('scope', 'careful');
    logger.error('scope', 'broken');

    expect(log).toHaveBeenCalledWith('[scope] hello', { cards: 7 });
    expect(warn).toHaveBeenCalledWith('[scope] careful');
    expect(error).toHaveBeenCalledWith('[scope] broken');
  });

  it('should accept only known level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
