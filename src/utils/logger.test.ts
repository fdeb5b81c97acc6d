import chalk from 'chalk';
import { beforeAll, describe, it, expect } from 'vitest';
import { createLogger } from './logger';

describe('Logger', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('writes scoped lines with structured data', () => {
    const lines: string[] = [];
    const logger = createLogger('agent', 'debug', (line) => lines.push(line));

    logger.warn('tool failed', { tool: 'echo' });
    logger.child('plan').info('replanning');

    expect(lines).toEqual([
      '[WARN] [agent] tool failed {"tool":"echo"}',
      '[INFO] [agent:plan] replanning',
    ]);
  });

  it('drops lines below the configured level', () => {
    const lines: string[] = [];
    const logger = createLogger('agent', 'warn', (line) => lines.push(line));

    logger.debug('raw output');
    logger.info('step');
    logger.error('request failed');

    expect(lines).toEqual(['[ERROR] [agent] request failed']);
  });

  it('writes nothing when silent', () => {
    const lines: string[] = [];
    const logger = createLogger('agent', 'silent', (line) => lines.push(line));

    logger.error('request failed');

    expect(lines).toEqual([]);
  });
});
