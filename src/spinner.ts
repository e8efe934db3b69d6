/**
 * @fileoverview Spinner frame sets
 *
 * Frames are picked by render tick (`tick % frames.length`), never by
 * wall-clock time, so one frame advances per `update_interval`.
 *
 * @module spinner
 */

export const SPINNER_NAMES = ['dots', 'line', 'box', 'arrow', 'bounce', 'circle', 'grow', 'ellipsis'] as const;

export type SpinnerName = (typeof SPINNER_NAMES)[number];

export const SPINNERS: Record<SpinnerName, readonly string[]> = {
  dots: ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'],
  line: ['|', '/', '-', '\\'],
  box: ['◰', '◳', '◲', '◱'],
  arrow: ['←', '↖', '↑', '↗', '→', '↘', '↓', '↙'],
  bounce: ['⠁', '⠂', '⠄', '⡀', '⢀', '⠠', '⠐', '⠈'],
  circle: ['◜', '◝', '◞', '◟'],
  grow: ['⣀', '⣄', '⣤', '⣦', '⣶', '⣷', '⣿', '⣾', '⣼', '⣸'],
  // Every frame is three columns wide
  ellipsis: ['   ', '.  ', '.. ', '...'],
};

export const DEFAULT_SPINNER: SpinnerName = 'dots';

/**
 * Frame for a given tick. Negative or fractional ticks are normalised.
 */
export function spinnerFrame(frames: readonly string[], tick: number): string {
  if (frames.length === 0) return '';
  const n = frames.length;
  const index = ((Math.floor(tick) % n) + n) % n;
  return frames[index];
}
