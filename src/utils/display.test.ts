import { describe, it, expect, beforeEach, vi } from 'vitest';
import chalk from 'chalk';
import { printVersionProgression, printVersionSource } from './display.js';

describe('printVersionProgression', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  it('labels the list as an example run from the default version', () => {
    printVersionProgression();

    const rule = '='.repeat(50);
    expect(console.log).toHaveBeenCalledTimes(1);
    expect(console.log).toHaveBeenCalledWith(
      [
        `\n${chalk.blue('Version Progression System:')}`,
        rule,
        'Example progression from 1.1.3:',
        '  1.1.3 -> 1.1.4 -> ... -> 1.1.99',
        '  1.1.99 -> 1.2.0 -> ... -> 1.2.99',
        '  1.2.99 -> 1.3.0 -> ... -> 1.99.0',
        '  1.99.0 -> 1.99.1 -> ... -> 1.99.99',
        '  1.99.99 -> 2.0.0 -> ... -> 2.0.99',
        '  2.0.99 -> 2.1.0 -> ...',
        rule,
      ].join('\n')
    );
  });
});

describe('printVersionSource', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  it('names a version read from the file', () => {
    printVersionSource({ version: '1.4.2', source: 'file' });

    expect(console.log).toHaveBeenCalledWith(chalk.gray('✓ Loaded version: 1.4.2'));
  });

  it('names the default when the file is empty', () => {
    printVersionSource({ version: '1.1.3', source: 'empty-file' });

    expect(console.log).toHaveBeenCalledWith(chalk.gray('Version file empty, using default: 1.1.3'));
  });
});
