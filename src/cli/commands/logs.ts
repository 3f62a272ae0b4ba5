// Logger demo: log lines scroll above a three-row bar

import chalk from 'chalk';
import { withRegion } from '../../ui/region-scope.js';
import type { RegionSink } from '../../ui/region-controller.js';
import { loadConfig } from '../../utils/config.js';
import { Logger, logger as globalLogger, routeLoggerToRegion } from '../../utils/logger.js';
import { configureLogger } from '../setup.js';

export interface LogDemoOptions {
  rounds: number;
  delayMs: number;
  logger?: Logger;
  sink?: RegionSink;
  interactive?: boolean;
}

const BAR_HEIGHT = 3;

export async function runLogDemo(options: LogDemoOptions): Promise<void> {
  const target = options.logger ?? globalLogger;

  await withRegion(
    { height: BAR_HEIGHT, sink: options.sink, interactive: options.interactive },
    async (bar) => {
      const restore = routeLoggerToRegion(target, bar);
      try {
        bar.printBarLine(0, chalk.bold('=========== Logging Bottom Bar =========='));
        bar.printBarLine(1, ' Logs will appear above this bar. ');
        bar.printBarLine(2, chalk.bold('========================================='));

        for (let i = 1; i <= options.rounds; i++) {
          target.info(`Info message ${i}`);
          target.debug(`Debug message ${i}`);
          target.warn(`Warning message ${i}`);
          target.error(`Error message ${i}`);

          if (options.delayMs > 0) {
            await new Promise((resolve) => setTimeout(resolve, options.delayMs));
          }
        }
      } finally {
        restore();
      }
    }
  );
}

export async function logsCommand(options: { rounds?: number; delay?: number }): Promise<void> {
  const config = await loadConfig();
  configureLogger(config);

  await runLogDemo({
    rounds: options.rounds ?? 2,
    delayMs: options.delay ?? config.demo.delayMs,
    interactive: config.region.interactive,
  });
}
