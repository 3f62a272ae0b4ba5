import { describe, it, expect, jest } from '@jest/globals';
import { Logger, LogLevel, parseLogLevel, routeLoggerToRegion, type LogSink } from './logger.js';
import { RegionController } from '../ui/region-controller.js';
import { VirtualTerminal } from '../test/virtual-terminal.js';

function createLogger(level: LogLevel = LogLevel.INFO) {
  const lines: string[] = [];
  const sink: LogSink = (line) => {
    lines.push(line);
  };
  return { lines, logger: new Logger({ level, useColors: false, sink }) };
}

describe('Logger', () => {
  it('filters messages below the configured level', () => {
    const { lines, logger } = createLogger(LogLevel.INFO);

    logger.debug('hidden');
    logger.info('shown');
    logger.warn('careful');

    expect(lines).toEqual(['shown', 'careful']);
  });

  it('changes level at runtime', () => {
    const { lines, logger } = createLogger(LogLevel.ERROR);

    logger.warn('dropped');
    logger.setLevel(LogLevel.DEBUG);
    logger.debug('kept');

    expect(lines).toEqual(['kept']);
  });

  it('prints nothing when silent', () => {
    const { lines, logger } = createLogger(LogLevel.SILENT);

    logger.error('nope');
    logger.newline();

    expect(lines).toEqual([]);
  });

  it('prefixes an ISO timestamp when enabled', () => {
    const { lines, logger } = createLogger();
    logger.setTimestamps(true);

    logger.info('tick');

    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] tick$/);
  });

  it('writes separators and blank lines at info level', () => {
    const { lines, logger } = createLogger();

    logger.separator('-', 5);
    logger.newline();

    expect(lines).toEqual(['-----', '']);
  });
});

describe('parseLogLevel', () => {
  it.each([
    ['debug', LogLevel.DEBUG],
    ['INFO', LogLevel.INFO],
    [' warn ', LogLevel.WARN],
    ['Error', LogLevel.ERROR],
    ['silent', LogLevel.SILENT],
  ])('parses %p', (name, level) => {
    expect(parseLogLevel(name)).toBe(level);
  });

  it.each(['verbose', 'constructor', ''])('returns undefined for %p', (name) => {
    expect(parseLogLevel(name)).toBeUndefined();
  });
});

describe('routeLoggerToRegion', () => {
  it('prints log lines above an active region', () => {
    const term = new VirtualTerminal();
    const region = new RegionController(1, { sink: term });
    const { lines, logger } = createLogger();
    region.init();
    region.printBarLine(0, 'status');

    const restore = routeLoggerToRegion(logger, region);
    logger.info('first');
    logger.error('second');
    restore();
    region.printFinalLine();

    expect(term.transcript()).toEqual(['first', 'second', 'status']);
    expect(lines).toEqual([]);
  });

  it('falls back to the previous sink once the region is finalized', () => {
    const term = new VirtualTerminal();
    const region = new RegionController(1, { sink: term });
    const { lines, logger } = createLogger();
    region.init();
    routeLoggerToRegion(logger, region);

    region.printFinalLine();
    logger.info('after');

    expect(lines).toEqual(['after']);
  });

  it('restores the previous sink', () => {
    const previous = jest.fn<LogSink>();
    const logger = new Logger({ sink: previous });
    const region = new RegionController(1, { sink: new VirtualTerminal() });

    const restore = routeLoggerToRegion(logger, region);
    expect(logger.getSink()).not.toBe(previous);
    restore();

    expect(logger.getSink()).toBe(previous);
  });
});
