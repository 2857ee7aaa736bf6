import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, isLogLevel } from './logger';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes JSON lines with metadata', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    createLogger('checker').info('Rule evaluated', { ruleId: '1' });

    expect(info).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(info.mock.calls[0][0]));
    expect(line).toMatchObject({ level: 'info', service: 'checker', message: 'Rule evaluated', ruleId: '1' });
  });

  it('drops messages below the level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const logger = createLogger('checker', { level: 'warn' });
    logger.debug('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('formats pretty output', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger('checker', { pretty: true }).error('failed');

    expect(String(error.mock.calls[0][0])).toMatch(/^\[.+\] ERROR checker: failed$/);
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(1)).toBe(false);
  });
});
