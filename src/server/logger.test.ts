import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger } from './logger';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});

    createLogger('info').info('Found 3 images', { extra: true });

    expect(info).toHaveBeenCalledWith('[scribble] Found 3 images', { extra: true });
  });

  it('drops messages below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const log = createLogger('warn');
    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[scribble] shown');
  });

  it('stays silent when off', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger('off').error('hidden');
    expect(error).not.toHaveBeenCalled();
  });
});
