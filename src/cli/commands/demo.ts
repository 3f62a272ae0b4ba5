// Factorial demo: results scroll while a status bar tracks progress

import chalk from 'chalk';
import { withRegion } from '../../ui/region-scope.js';
import type { RegionSink } from '../../ui/region-controller.js';
import { loadConfig } from '../../utils/config.js';
import { configureLogger } from '../setup.js';

export interface FactorialDemoOptions {
  height: number;
  count: number;
  delayMs: number;
  sink?: RegionSink;
  interactive?: boolean;
  /** Clock used for the elapsed-time row (default: Date.now) */
  now?: () => number;
}

export interface DemoProgress {
  computed: number;
  total: number;
  elapsedMs: number;
}

const DIVIDER = '=======================================';

// Rows kept when the bar is shorter than the full layout, most important first
const ROW_PRIORITY = [2, 3, 1, 0, 4];

export function factorial(n: number): bigint {
  let result = 1n;
  for (let i = 2n; i <= BigInt(n); i++) {
    result *= i;
  }
  return result;
}

/**
 * Build the full five-row status layout
 */
export function renderDemoRows(progress: DemoProgress): string[] {
  const seconds = (progress.elapsedMs / 1000).toFixed(2);
  return [
    chalk.bold('============== factorial =============='),
    chalk.gray(' Just a simple factorial calculator !'),
    ` Computed : ${chalk.green(String(progress.computed))} / ${progress.total}`,
    ` Elapsed Time: ${seconds} seconds`,
    chalk.bold(DIVIDER),
  ];
}

/**
 * Fit the layout to `height` rows, dropping the least important rows first
 * and leaving extra rows empty
 */
export function fitRows(rows: string[], height: number): string[] {
  if (height >= rows.length) {
    return [...rows, ...new Array<string>(height - rows.length).fill('')];
  }

  const kept = ROW_PRIORITY.filter((index) => index < rows.length)
    .slice(0, height)
    .sort((a, b) => a - b);
  return kept.map((index) => rows[index]);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function runFactorialDemo(options: FactorialDemoOptions): Promise<void> {
  const now = options.now ?? Date.now;
  const startTime = now();

  await withRegion(
    { height: options.height, sink: options.sink, interactive: options.interactive },
    async (bar) => {
      const draw = (computed: number) => {
        const rows = fitRows(
          renderDemoRows({ computed, total: options.count, elapsedMs: now() - startTime }),
          options.height
        );
        rows.forEach((row, index) => bar.printBarLine(index, row));
      };

      draw(0);

      for (let i = 0; i < options.count; i++) {
        if (options.delayMs > 0) {
          await sleep(options.delayMs);
        }
        bar.printLine(`Factorial of ${i} is ${factorial(i)}`);
        draw(i + 1);
      }
    }
  );
}

export async function demoCommand(options: {
  height?: number;
  count?: number;
  delay?: number;
}): Promise<void> {
  const config = await loadConfig();
  configureLogger(config);

  await runFactorialDemo({
    height: options.height ?? config.region.height,
    count: options.count ?? config.demo.count,
    delayMs: options.delay ?? config.demo.delayMs,
    interactive: config.region.interactive,
  });
}
