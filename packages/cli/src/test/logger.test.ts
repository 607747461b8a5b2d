import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { createLogger } from '../lib/logger.js';

beforeAll(() => {
  chalk.level = 0;
});

function capture(opts: { verbose?: boolean; quiet?: boolean } = {}) {
  const lines: string[] = [];
  const logger = createLogger({ ...opts, output: (msg) => lines.push(msg) });
  return { logger, lines };
}

describe('createLogger', () => {
  it('hides debug output unless verbose', () => {
    const { logger, lines } = capture();
    logger.debug('hidden');
    logger.info('shown', { rows: 4 });
    expect(lines).toEqual(['[info] shown']);
  });

  it('includes data on debug and info when verbose', () => {
    const { logger, lines } = capture({ verbose: true });
    logger.debug('statement', { ms: 3 });
    logger.info('done', { rows: 4 });
    expect(lines).toEqual(['[debug] statement {"ms":3}', '[info] done {"rows":4}']);
  });

  it('keeps warnings and errors when quiet', () => {
    const { logger, lines } = capture({ quiet: true, verbose: true });
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('slow', { ms: 80 });
    logger.error('failed');
    expect(lines).toEqual(['[warn] slow {"ms":80}', '[error] failed']);
  });
});
