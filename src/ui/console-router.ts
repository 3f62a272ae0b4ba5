import chalk from 'chalk';
import { format } from 'util';
import type { RegionController } from './region-controller.js';

type ConsoleLevel = 'log' | 'info' | 'warn' | 'error' | 'debug';

const CONSOLE_LEVELS: ConsoleLevel[] = ['log', 'info', 'warn', 'error', 'debug'];

export type UninstallFn = () => void;

function decorate(line: string, level: ConsoleLevel): string {
  if (!line) return line;
  switch (level) {
    case 'warn':
      return chalk.yellow('⚠ ') + line;
    case 'error':
      return chalk.red('✗ ') + line;
    case 'debug':
      return chalk.dim('· ' + line);
    default:
      return line;
  }
}

function normalizeToText(text: string): string {
  // Avoid emitting a trailing empty line for `console.log('...\n')`
  return text.endsWith('\n') && text.length > 1 ? text.slice(0, -1) : text;
}

/**
 * Installs a router so `console.*` output is printed above the region
 * instead of corrupting it. Calls made while the region is not active go
 * to the original console methods.
 */
export function installRegionConsoleRouter(region: RegionController): UninstallFn {
  const originalConsole = {
    log: console.log,
    info: console.info,
    warn: console.warn,
    error: console.error,
    debug: console.debug,
  };

  for (const level of CONSOLE_LEVELS) {
    console[level] = (...args: unknown[]) => {
      if (!region.isActive()) {
        Reflect.apply(originalConsole[level], console, args);
        return;
      }

      const text: string = Reflect.apply(format, undefined, args);
      const lines = normalizeToText(text).split('\n');
      region.printLine(lines.map((line) => decorate(line, level)).join('\n'));
    };
  }

  return () => {
    console.log = originalConsole.log;
    console.info = originalConsole.info;
    console.warn = originalConsole.warn;
    console.error = originalConsole.error;
    console.debug = originalConsole.debug;
  };
}
