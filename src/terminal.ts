/**
 * @fileoverview Terminal status line output
 *
 * Keeps one line of the terminal continuously overwritten.
 *
 * - `bottom`: saves the cursor, jumps to the last row, redraws, restores.
 *   Normal output keeps scrolling above it.
 * - `inline`: redraws the current line in place.
 *
 * With colors disabled nothing here writes an escape sequence: the line is
 * redrawn with a carriage return and space padding, and `bottom` behaves
 * like `inline`.
 *
 * @module terminal
 */

import {
  DEFAULT_TERMINAL_WIDTH,
  STATUS_LINE_MARGIN,
} from './config/limits.js';
import { stripAnsi, visibleLength } from './utils/ansi.js';

// ANSI escape sequences
const ANSI_SAVE_CURSOR = '\x1b[s';
const ANSI_RESTORE_CURSOR = '\x1b[u';
const ANSI_CLEAR_LINE = '\x1b[2K';
const ANSI_MOVE_TO_COL_1 = '\x1b[1G';
// Row 999 clamps to the last row
const ANSI_MOVE_TO_BOTTOM = '\x1b[999;1H';

export type StatusPosition = 'bottom' | 'inline';

/** Minimal writable stream surface used for status output */
export interface TerminalStream {
  write(chunk: string, callback?: (err?: Error | null) => void): boolean;
  isTTY?: boolean;
  columns?: number;
  writable?: boolean;
  on?(event: 'error', listener: (err: Error) => void): unknown;
  off?(event: 'error', listener: (err: Error) => void): unknown;
}

/** Destination for rendered lines */
export interface LineWriter {
  show(): void;
  /** Redraw the line. Throws if the underlying stream has failed. */
  update(line: string): void;
  /** Release the line after the final render */
  finish(): void;
  /** Detach from the underlying stream for good */
  release?(): void;
}

export interface StatusLineOptions {
  position?: StatusPosition;
  /** When false, no escape sequences are written */
  ansi?: boolean;
}

/**
 * Whether status output makes sense on this stream.
 *
 * @param stream - Output stream (usually stderr)
 * @param env - Environment to read TERM / AMPLIFIER_NO_STATUS from
 */
export function supportsStatusLine(
  stream: Pick<TerminalStream, 'isTTY'>,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  if (!stream.isTTY) return false;
  if (env.TERM === 'dumb') return false;
  if (env.AMPLIFIER_NO_STATUS !== undefined) return false;
  return true;
}

export class StatusLineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StatusLineError';
  }
}

/**
 * Single overwritten line on a terminal stream.
 */
export class StatusLine implements LineWriter {
  private readonly stream: TerminalStream;
  private readonly position: StatusPosition;
  private readonly ansi: boolean;
  private visible = false;
  private lastWidth = 0;
  /** Failure reported by an asynchronous write callback */
  private pendingError: Error | null = null;
  private readonly onStreamError = (err: Error): void => {
    this.pendingError = err;
  };

  constructor(stream: TerminalStream, options: StatusLineOptions = {}) {
    this.stream = stream;
    this.ansi = options.ansi ?? true;
    // Bottom positioning needs cursor addressing
    this.position = this.ansi ? (options.position ?? 'bottom') : 'inline';
    // An unhandled 'error' event (EPIPE on a closed terminal) would crash the host
    stream.on?.('error', this.onStreamError);
  }

  show(): void {
    if (this.visible) return;
    this.visible = true;
    if (this.position === 'bottom') {
      this.write('\n');
    }
  }

  update(line: string): void {
    if (this.pendingError) {
      const err = this.pendingError;
      this.pendingError = null;
      throw new StatusLineError(`Status line write failed: ${err.message}`, { cause: err });
    }
    if (this.stream.writable === false) {
      throw new StatusLineError('Status line stream is not writable');
    }
    if (!this.visible) this.show();

    const content = this.truncate(line);
    if (!this.ansi) {
      const width = visibleLength(content);
      const padding = ' '.repeat(Math.max(0, this.lastWidth - width));
      this.lastWidth = width;
      this.write(`\r${content}${padding}`);
      return;
    }

    if (this.position === 'bottom') {
      this.write(
        `${ANSI_SAVE_CURSOR}${ANSI_MOVE_TO_BOTTOM}${ANSI_CLEAR_LINE}${content}${ANSI_RESTORE_CURSOR}`
      );
    } else {
      this.write(`${ANSI_MOVE_TO_COL_1}${ANSI_CLEAR_LINE}${content}`);
    }
  }

  finish(): void {
    if (!this.visible) return;
    this.visible = false;
    if (this.position === 'inline' && this.stream.writable !== false) {
      this.write('\n');
    }
  }

  /**
   * Remove the stream error listener. The stream (usually process.stderr)
   * outlives the indicator.
   */
  release(): void {
    this.stream.off?.('error', this.onStreamError);
  }

  /**
   * Trim to the terminal width. A line that has to be cut loses its colors,
   * since slicing could split an escape sequence.
   */
  private truncate(line: string): string {
    const width = (this.stream.columns ?? DEFAULT_TERMINAL_WIDTH) - STATUS_LINE_MARGIN;
    if (width <= 3 || visibleLength(line) <= width) return line;
    return `${stripAnsi(line).slice(0, width - 3)}...`;
  }

  private write(text: string): void {
    this.stream.write(text, (err) => {
      if (err) this.pendingError = err;
    });
  }
}
