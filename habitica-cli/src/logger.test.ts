import { describe, expect, it } from 'vitest';
import { createLogger, levelFromFlags } from './logger.js';

describe('createLogger', () => {
  it('drops messages below the minimum level', () => {
    const lines: string[] = [];
    const logger = createLogger('info', (line) => lines.push(line));

    logger.debug('hidden');
    logger.info('fetching', { path: '/user' });
    logger.error('failed');

    expect(lines).toEqual(['[habitica] info fetching {"path":"/user"}', '[habitica] error failed']);
  });

  it('maps flags to levels', () => {
    expect(levelFromFlags({ debug: true, verbose: true })).toBe('debug');
    expect(levelFromFlags({ verbose: true })).toBe('info');
    expect(levelFromFlags({})).toBe('warn');
  });
});
