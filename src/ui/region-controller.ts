/**
 * Fixed-height status region pinned to the bottom of the terminal.
 *
 * Ordinary output is scrolled in above the region with printLine(), while
 * printBarLine() rewrites a single row of the region in place. Between calls
 * the cursor always rests at column 0 of the region's top row, with one blank
 * spare row kept below the region's last row, so every repaint knows exactly
 * how far to move.
 *
 * Only one controller may be active on a given output stream at a time.
 * Terminal resizes are not tracked, and text wider than the terminal wraps
 * however the terminal chooses to wrap it.
 */

import { ANSI, hasLineBreak, splitLines } from './ansi.js';
import {
  IndexOutOfRangeError,
  InvalidConfigurationError,
  InvalidContentError,
  InvalidStateError,
  OutputSinkError,
} from './region-errors.js';

export interface RegionSink {
  write(chunk: string): unknown;
  readonly isTTY?: boolean;
  // Set by Node writable streams once they can no longer take writes
  readonly destroyed?: boolean;
  readonly writableEnded?: boolean;
}

export interface RegionOptions {
  /** Stream the region is drawn on (default: process.stdout) */
  sink?: RegionSink;
  /**
   * Draw with control sequences. When false, output is plain text and the
   * bar rows are only written once, on printFinalLine().
   * Defaults to sink.isTTY.
   */
  interactive?: boolean;
}

export type RegionState = 'uninitialized' | 'active' | 'finalized';

// Streams currently owned by an active controller
const activeSinks = new WeakMap<RegionSink, RegionController>();

export class RegionController {
  private readonly height: number;
  private readonly lines: string[];
  private readonly sink: RegionSink;
  private readonly interactive: boolean;
  private state: RegionState = 'uninitialized';

  constructor(height: number, options: RegionOptions = {}) {
    if (!Number.isInteger(height) || height < 1) {
      throw new InvalidConfigurationError(`Region height must be a positive integer, got ${height}`);
    }

    this.height = height;
    this.lines = new Array<string>(height).fill('');
    this.sink = options.sink ?? process.stdout;
    this.interactive = options.interactive ?? this.sink.isTTY === true;
  }

  /**
   * Reserve the region's rows below the current cursor position.
   * Throws InvalidStateError unless the controller is uninitialized.
   */
  init(): void {
    if (this.state !== 'uninitialized') {
      throw new InvalidStateError(`init() called on a ${this.state} region`);
    }
    if (activeSinks.has(this.sink)) {
      throw new InvalidStateError('Another region is already active on this output stream');
    }

    if (this.interactive) {
      // height rows for the region plus the spare row, then back to the top
      this.emit('init', ANSI.newline.repeat(this.height) + ANSI.cursorUp(this.height));
    }

    this.state = 'active';
    activeSinks.set(this.sink, this);
  }

  /**
   * Print text as scrolling output above the region.
   * Embedded line breaks produce several scrolled lines.
   */
  printLine(text: string): void {
    this.assertActive('printLine');
    const segments = splitLines(text);

    if (!this.interactive) {
      this.emit('printLine', segments.join('\n') + '\n');
      return;
    }

    let payload = ANSI.lineStart;
    for (const segment of segments) {
      payload += ANSI.eraseLine + segment + ANSI.newline;
    }
    payload += this.paintRows(this.height);
    payload += ANSI.cursorUp(this.height);

    this.emit('printLine', payload);
  }

  /**
   * Replace the content of one region row, redrawing only that row
   */
  printBarLine(index: number, text: string): void {
    this.assertActive('printBarLine');
    if (!Number.isInteger(index) || index < 0 || index >= this.height) {
      throw new IndexOutOfRangeError(index, this.height);
    }
    if (hasLineBreak(text)) {
      throw new InvalidContentError('Bar line content must be a single line');
    }

    this.lines[index] = text;
    if (!this.interactive) return;

    const payload =
      ANSI.cursorDown(index) +
      ANSI.lineStart +
      ANSI.eraseLine +
      text +
      ANSI.lineStart +
      ANSI.cursorUp(index);

    this.emit('printBarLine', payload);
  }

  /**
   * Leave the region behind and park the cursor on a clean line below it.
   * Safe to call in any state: a no-op unless the region is active.
   */
  printFinalLine(): void {
    if (this.state !== 'active') return;

    this.state = 'finalized';
    activeSinks.delete(this.sink);

    // Trailing rows that were never given content collapse
    let used = this.height;
    while (used > 0 && this.lines[used - 1] === '') {
      used--;
    }

    if (!this.interactive) {
      if (used > 0) {
        this.emit('printFinalLine', this.lines.slice(0, used).join('\n') + '\n');
      }
      return;
    }

    this.emit('printFinalLine', ANSI.lineStart + this.paintRows(used) + ANSI.eraseBelow);
  }

  /**
   * Run body between init() and printFinalLine().
   * printFinalLine() runs exactly once however the body exits.
   */
  async scope<T>(body: (region: RegionController) => T | Promise<T>): Promise<T> {
    this.init();

    let result: T;
    try {
      result = await body(this);
    } catch (error) {
      try {
        this.printFinalLine();
      } catch (finalError) {
        throw new AggregateError([error, finalError], 'Region body failed and the terminal could not be restored');
      }
      throw error;
    }

    this.printFinalLine();
    return result;
  }

  getHeight(): number {
    return this.height;
  }

  /**
   * Get a copy of the last content written to each row
   */
  getLines(): string[] {
    return [...this.lines];
  }

  getState(): RegionState {
    return this.state;
  }

  isActive(): boolean {
    return this.state === 'active';
  }

  isInteractive(): boolean {
    return this.interactive;
  }

  /**
   * Erase and rewrite the first `count` rows, each followed by a newline
   */
  private paintRows(count: number): string {
    let payload = '';
    for (let i = 0; i < count; i++) {
      payload += ANSI.eraseLine + this.lines[i] + ANSI.newline;
    }
    return payload;
  }

  private assertActive(operation: string): void {
    if (this.state !== 'active') {
      throw new InvalidStateError(`${operation}() called on a ${this.state} region`);
    }
  }

  /**
   * Every operation goes out as one write.
   * A closed stream would drop the payload or report it later through an
   * 'error' event, so it is rejected here before writing.
   */
  private emit(operation: string, payload: string): void {
    if (this.sink.destroyed === true || this.sink.writableEnded === true) {
      const reason = this.sink.destroyed === true ? 'stream destroyed' : 'stream ended';
      throw new OutputSinkError(operation, new Error(reason));
    }
    try {
      this.sink.write(payload);
    } catch (error) {
      throw new OutputSinkError(operation, error);
    }
  }
}
