/**
 * @fileoverview ANSI escape helpers for measuring and cleaning status lines.
 *
 * @module utils/ansi
 */

/**
 * ANSI escape pattern covering:
 * - CSI sequences (colors, cursor movement): ESC [ params letter
 * - OSC sequences (title, etc.): ESC ] ... BEL or ESC ] ... ST
 * - Single-char escapes: ESC = or ESC >
 *
 * Note: Has global flag - reset lastIndex before exec() if reusing.
 */
export const ANSI_ESCAPE_PATTERN = /\x1b(?:\[[0-9;?]*[A-Za-z]|\][^\x07\x1b]*(?:\x07|\x1b\\)|[=>])/g;

/**
 * Strips ANSI escape codes from text.
 */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_ESCAPE_PATTERN, '');
}

/** Whether the text contains an escape character at all */
export function containsAnsi(text: string): boolean {
  return text.includes('\x1b');
}

/** Length of the text as shown on screen (escapes excluded) */
export function visibleLength(text: string): number {
  return stripAnsi(text).length;
}
