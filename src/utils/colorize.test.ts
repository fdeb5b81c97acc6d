import chalk from 'chalk';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { colorize } from './colorize';

describe('colorize', () => {
  const initialLevel = chalk.level;

  beforeAll(() => {
    chalk.level = 1;
  });

  afterAll(() => {
    chalk.level = initialLevel;
  });

  it('colours trace lines by prefix', () => {
    expect(colorize('Action: echo')).toBe(chalk.cyan('Action: echo'));
    expect(colorize('Observation: {}')).toBe(chalk.magenta('Observation: {}'));
    expect(colorize('Final Answer: done')).toBe(chalk.green.bold('Final Answer: done'));
  });

  it('indents action input and applied defaults', () => {
    expect(colorize('Action Input: {}')).toBe(chalk.cyan('  Action Input: {}'));
    expect(colorize('Defaults Applied: {"units":"metric"}')).toBe(
      chalk.cyan.dim('  Defaults Applied: {"units":"metric"}'),
    );
  });

  it('greys the raw model reply', () => {
    expect(colorize('Next: Final Answer: done')).toBe(chalk.gray('Next: Final Answer: done'));
  });

  it('leaves other lines untouched', () => {
    expect(colorize('hello')).toBe('hello');
  });
});
