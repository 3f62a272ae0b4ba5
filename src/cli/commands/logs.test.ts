import { describe, it, expect, beforeAll } from '@jest/globals';
import chalk from 'chalk';
import { runLogDemo } from './logs.js';
import { Logger, LogLevel, type LogSink } from '../../utils/logger.js';
import { VirtualTerminal } from '../../test/virtual-terminal.js';

describe('log demo', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('routes leveled logs above the bar and restores the sink', async () => {
    const plain = new VirtualTerminal({ isTTY: false });
    const stray: string[] = [];
    const sink: LogSink = (line) => {
      stray.push(line);
    };
    const logger = new Logger({ level: LogLevel.INFO, useColors: false, sink });

    await runLogDemo({ rounds: 1, delayMs: 0, logger, sink: plain });

    expect(plain.output()).toBe(
      [
        'Info message 1',
        'Warning message 1',
        'Error message 1',
        '=========== Logging Bottom Bar ==========',
        ' Logs will appear above this bar. ',
        '=========================================',
        '',
      ].join('\n')
    );
    expect(logger.getSink()).toBe(sink);
    expect(stray).toEqual([]);
  });
});
