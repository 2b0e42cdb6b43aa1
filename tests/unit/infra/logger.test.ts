/**
 * Unit tests for logger factory
 */

import { describe, expect, it } from 'vitest';

import { createChildLogger, createLogger } from '@/infra/logger/index.js';

describe('createLogger', () => {
  it('applies the configured level and name', () => {
    const logger = createLogger({ level: 'silent', pretty: false, name: 'test-logger' });

    expect(logger.level).toBe('silent');
    expect(logger.bindings()).toMatchObject({ name: 'test-logger' });
  });

  it('creates child loggers carrying extra context', () => {
    const child = createChildLogger(createLogger({ level: 'silent', pretty: false }), {
      command: 'generate',
    });

    expect(child.bindings()).toMatchObject({ command: 'generate' });
  });
});
