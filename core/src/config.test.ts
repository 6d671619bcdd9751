import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, resolveFormTreeConfig } from './config.js';

describe('resolveFormTreeConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(resolveFormTreeConfig({})).toEqual(DEFAULT_CONFIG);
    expect(resolveFormTreeConfig({ FORMTREE_LOG_LEVEL: '', FORMTREE_PARENT_CYCLE: ' ' })).toEqual({
      logLevel: 'info',
      parentCycle: 'error',
    });
  });

  it('reads values case-insensitively', () => {
    expect(resolveFormTreeConfig({ FORMTREE_LOG_LEVEL: 'DEBUG', FORMTREE_PARENT_CYCLE: 'Stop' })).toEqual({
      logLevel: 'debug',
      parentCycle: 'stop',
    });
  });

  it('rejects an unknown log level', () => {
    expect(() => resolveFormTreeConfig({ FORMTREE_LOG_LEVEL: 'verbose' })).toThrowError(
      'Invalid log level "verbose".',
    );
  });

  it('rejects an unknown cycle policy', () => {
    let caught: unknown;
    try {
      resolveFormTreeConfig({ FORMTREE_PARENT_CYCLE: 'ignore' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({
      code: 'C002',
      category: 'config',
      suggestion: 'Use "error" or "stop".',
    });
  });
});
