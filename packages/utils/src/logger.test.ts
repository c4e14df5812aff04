import { describe, expect, it } from 'vitest';
import { createLogger, createNullLogger } from './logger.js';

describe('createLogger', () => {
  it('is silent when neither a log file nor the console is enabled', () => {
    const logger = createLogger({ level: 'info', console: false });

    expect(logger.level).toBe('silent');
    expect(logger.isLevelEnabled('error')).toBe(false);
  });
});

describe('createNullLogger', () => {
  it('discards every level', () => {
    expect(createNullLogger().isLevelEnabled('fatal')).toBe(false);
  });
});
