import { describe, it, expect, beforeAll } from '@jest/globals';
import chalk from 'chalk';
import { factorial, fitRows, renderDemoRows, runFactorialDemo } from './demo.js';
import { VirtualTerminal } from '../../test/virtual-terminal.js';

describe('factorial demo', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('computes exact factorials', () => {
    expect(factorial(0)).toBe(1n);
    expect(factorial(5)).toBe(120n);
    expect(factorial(25)).toBe(15511210043330985984000000n);
  });

  it('renders progress and elapsed time', () => {
    const rows = renderDemoRows({ computed: 3, total: 10, elapsedMs: 1500 });

    expect(rows).toHaveLength(5);
    expect(rows[2]).toBe(' Computed : 3 / 10');
    expect(rows[3]).toBe(' Elapsed Time: 1.50 seconds');
  });

  describe('fitRows', () => {
    const rows = ['header', 'about', 'progress', 'elapsed', 'footer'];

    it('keeps the most important rows in layout order', () => {
      expect(fitRows(rows, 1)).toEqual(['progress']);
      expect(fitRows(rows, 2)).toEqual(['progress', 'elapsed']);
      expect(fitRows(rows, 3)).toEqual(['about', 'progress', 'elapsed']);
    });

    it('pads a taller bar with empty rows', () => {
      expect(fitRows(rows, 7)).toEqual([...rows, '', '']);
    });
  });

  it('scrolls results above a live progress bar', async () => {
    const term = new VirtualTerminal();

    await runFactorialDemo({ height: 2, count: 3, delayMs: 0, sink: term, now: () => 1000 });

    expect(term.transcript()).toEqual([
      'Factorial of 0 is 1',
      'Factorial of 1 is 1',
      'Factorial of 2 is 2',
      ' Computed : 3 / 3',
      ' Elapsed Time: 0.00 seconds',
    ]);
  });

  it('prints plain text when the output is not a terminal', async () => {
    const plain = new VirtualTerminal({ isTTY: false });

    await runFactorialDemo({ height: 2, count: 2, delayMs: 0, sink: plain, now: () => 0 });

    expect(plain.output()).toBe(
      'Factorial of 0 is 1\nFactorial of 1 is 1\n Computed : 2 / 2\n Elapsed Time: 0.00 seconds\n'
    );
  });
});
