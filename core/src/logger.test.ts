import { describe, expect, it, vi } from 'vitest';
import { createLogger, isLogLevel } from './logger.js';

function createSink() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('createLogger', () => {
  it('drops messages below the configured level', () => {
    const sink = createSink();
    const logger = createLogger({ level: 'warn', sink });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith('shown');
    expect(sink.error).toHaveBeenCalledWith('shown too');
  });

  it('defaults to info', () => {
    const sink = createSink();
    const logger = createLogger({ sink });
    logger.debug('hidden');
    logger.info('shown');
    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).toHaveBeenCalledWith('shown');
  });

  it('prefixes messages and passes metadata along', () => {
    const sink = createSink();
    const logger = createLogger({ level: 'debug', prefix: '[formtree]', sink });

    logger.debug('tree.kids.dangling', { nodeId: 'a', index: 1 });
    logger.info('plain', {});

    expect(sink.debug).toHaveBeenCalledWith('[formtree] tree.kids.dangling', { nodeId: 'a', index: 1 });
    expect(sink.info).toHaveBeenCalledWith('[formtree] plain');
  });
});

describe('isLogLevel', () => {
  it('accepts the four levels only', () => {
    expect(['debug', 'info', 'warn', 'error'].every(isLogLevel)).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });
});
