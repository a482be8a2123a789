import { describe, it, expect } from 'vitest';
import { createLogger } from '../logger.js';

describe('createLogger()', () => {
  it('should take the level from LOG_LEVEL', () => {
    // vitest.config.ts sets LOG_LEVEL=silent
    expect(createLogger('test').level).toBe('silent');
  });

  it('should let options override the level', () => {
    expect(createLogger('test', { level: 'warn' }).level).toBe('warn');
  });
});
