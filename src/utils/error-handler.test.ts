import { describe, it, expect, beforeAll, afterEach, jest } from '@jest/globals';
import chalk from 'chalk';
import { ErrorHandler, handleError } from './error-handler.js';
import { IndexOutOfRangeError, OutputSinkError } from '../ui/region-errors.js';

describe('ErrorHandler', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('tags region errors with their code', () => {
    const output = ErrorHandler.formatError(new IndexOutOfRangeError(5, 2));

    expect(output).toBe('[INDEX_OUT_OF_RANGE] Bar line index 5 is outside [0, 2)\n');
  });

  it('includes the context and the underlying cause', () => {
    const error = new OutputSinkError('printLine', new Error('EPIPE'));

    const output = ErrorHandler.formatError(error, { context: 'demo' });

    expect(output.split('\n')).toEqual([
      'Error in demo:',
      '[OUTPUT_SINK_FAILURE] Output sink failed during printLine: EPIPE',
      'Caused by: EPIPE',
      '',
    ]);
  });

  it('formats non-Error values', () => {
    expect(ErrorHandler.formatError('boom')).toBe('boom\n');
    expect(ErrorHandler.getErrorMessage(42)).toBe('42');
    expect(ErrorHandler.getStackTrace('boom')).toBeUndefined();
  });

  it('appends the stack trace on request', () => {
    const error = new Error('with stack');

    const output = ErrorHandler.formatError(error, { includeStack: true });

    expect(output).toContain('Stack trace:');
    expect(output).toContain(error.stack ?? '');
  });

  it('writes the formatted error to stderr', () => {
    const write = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);

    handleError(new Error('failed'), { context: 'main', includeStack: false });

    expect(write).toHaveBeenCalledWith('Error in main:\nfailed\n\n');
  });

  it('stays quiet in silent mode', () => {
    const write = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);

    handleError(new Error('failed'), { silent: true });

    expect(write).not.toHaveBeenCalled();
  });
});
