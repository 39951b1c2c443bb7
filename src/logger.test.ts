import { describe, expect, it } from 'vitest';
import { createLogger, generateRequestId } from './logger.js';

describe('createLogger', () => {
  it('binds the module name', () => {
    expect(createLogger('agent').bindings().module).toBe('agent');
  });

  it('takes its level from LOG_LEVEL', () => {
    expect(createLogger('agent').level).toBe('silent');
  });
});

describe('generateRequestId', () => {
  it('returns distinct UUIDs', () => {
    const first = generateRequestId();

    expect(first).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(generateRequestId()).not.toBe(first);
  });
});
