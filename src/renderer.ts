/**
 * @fileoverview Status line renderer
 *
 * Pure functions that turn a {@link RenderSnapshot} into one line of text.
 *
 * Line shapes:
 * ```
 * ⠹ executing: bash │ 1.2K↑ 340↓ │ 02:05
 * ⚠ 75s idle (Ctrl+C to interrupt)
 * ✓ Session complete │ 1.2K↑ 340↓ │ 02:05 │ 3 turns
 * ✗ Session failed: rate limited │ 1.2K↑ 340↓ │ 02:05 │ 3 turns
 * ```
 *
 * Disabled fields are dropped along with their separator. With colors
 * disabled the output contains no ANSI escapes at all.
 *
 * @module renderer
 */

import { Chalk, type ChalkInstance } from 'chalk';
import { MAX_TOOL_NAME_LENGTH } from './config/limits.js';
import { spinnerFrame } from './spinner.js';
import type { StuckStatus } from './stuck-detector.js';
import type { EscalationLevel, RenderSnapshot, SessionSnapshot } from './types.js';

/** Field separator glyph */
export const SEPARATOR = '│';

export interface DisplayOptions {
  showTokens: boolean;
  showElapsed: boolean;
  colorsEnabled: boolean;
  /** Append "(Ctrl+C to interrupt)" to the stuck warning */
  unstickHint: boolean;
  /** Spinner frames, indexed by render tick */
  frames: readonly string[];
}

const colored = new Chalk({ level: 1 });
const plain = new Chalk({ level: 0 });

const ESCALATION_NOTICES: Record<Exclude<EscalationLevel, 'normal'>, string> = {
  cancel: 'cancel requested (Ctrl+C again to abort turn)',
  abort: 'aborting turn (Ctrl+C again to exit)',
  emergency: 'emergency exit',
};

// ========== Field Formatting ==========

/**
 * Abbreviate a token count: `999`, `1.0K`, `1.5M`.
 */
export function formatTokenCount(n: number): string {
  if (!Number.isFinite(n) || n < 0) return '0';
  if (n < 1000) return String(Math.floor(n));
  if (n < 1_000_000) {
    const k = (n / 1000).toFixed(1);
    // 999,950+ rounds up to 1000.0K; show it as millions instead
    if (k !== '1000.0') return `${k}K`;
  }
  return `${(n / 1_000_000).toFixed(1)}M`;
}

export function formatTokens(tokensIn: number, tokensOut: number): string {
  return `${formatTokenCount(tokensIn)}↑ ${formatTokenCount(tokensOut)}↓`;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Format elapsed time as `mm:ss`, or `hh:mm:ss` from one hour on.
 */
export function formatElapsed(ms: number): string {
  const total = Number.isFinite(ms) ? Math.max(0, Math.floor(ms / 1000)) : 0;
  const seconds = total % 60;
  const minutes = Math.floor(total / 60) % 60;
  const hours = Math.floor(total / 3600);
  if (hours > 0) {
    return `${pad2(hours)}:${pad2(minutes)}:${pad2(seconds)}`;
  }
  return `${pad2(Math.floor(total / 60))}:${pad2(seconds)}`;
}

/**
 * Shorten long tool names: anything over 20 characters becomes 17 plus "...".
 */
export function truncateToolName(name: string): string {
  if (name.length <= MAX_TOOL_NAME_LENGTH) return name;
  return `${name.slice(0, MAX_TOOL_NAME_LENGTH - 3)}...`;
}

/**
 * Human-readable phrase for what the session is doing.
 * An active delegate takes precedence over the parent's own activity.
 */
export function activityPhrase(snapshot: Pick<SessionSnapshot, 'activity' | 'toolName' | 'delegateName'>): string {
  if (snapshot.delegateName) {
    return `→ ${snapshot.delegateName}`;
  }
  switch (snapshot.activity) {
    case 'executing':
      return snapshot.toolName ? `executing: ${truncateToolName(snapshot.toolName)}` : 'executing';
    case 'thinking':
      return 'thinking';
    case 'streaming':
      return 'streaming response';
    case 'idle':
      return 'waiting for input';
    case 'done':
      return 'done';
    case 'errored':
      return 'error';
  }
}

// ========== Line Assembly ==========

function joinSegments(c: ChalkInstance, segments: Array<string | null>): string {
  return segments.filter((s): s is string => s !== null).join(` ${c.dim(SEPARATOR)} `);
}

function statFields(snapshot: RenderSnapshot, display: DisplayOptions): Array<string | null> {
  return [
    display.showTokens ? formatTokens(snapshot.tokensIn, snapshot.tokensOut) : null,
    display.showElapsed ? formatElapsed(snapshot.elapsedMs) : null,
  ];
}

function escalationNotice(c: ChalkInstance, level: EscalationLevel): string | null {
  if (level === 'normal') return null;
  const text = ESCALATION_NOTICES[level];
  return level === 'emergency' ? c.red(text) : c.yellow(text);
}

/**
 * Render one status line.
 *
 * @param snapshot - Session snapshot with derived idle/elapsed/escalation values
 * @param stuck - Output of detectStuck() for the same tick
 * @param display - Display options
 * @param tick - Render tick counter, selects the spinner frame
 */
export function renderStatusLine(
  snapshot: RenderSnapshot,
  stuck: StuckStatus,
  display: DisplayOptions,
  tick: number
): string {
  const c = display.colorsEnabled ? colored : plain;

  if (snapshot.terminal) {
    const head = snapshot.activity === 'errored'
      ? `${c.red('✗')} Session failed${snapshot.errorMessage ? `: ${snapshot.errorMessage}` : ''}`
      : `${c.green('✓')} Session complete`;
    return joinSegments(c, [head, ...statFields(snapshot, display), `${snapshot.turnCount} turns`]);
  }

  const notice = escalationNotice(c, snapshot.escalation);

  if (stuck.stuck) {
    const seconds = Math.floor(stuck.idleMs / 1000);
    const text = `⚠ ${seconds}s idle${display.unstickHint ? ' (Ctrl+C to interrupt)' : ''}`;
    return joinSegments(c, [stuck.critical ? c.red(text) : c.yellow(text), notice]);
  }

  const head = `${c.cyan(spinnerFrame(display.frames, tick))} ${activityPhrase(snapshot)}`;
  return joinSegments(c, [head, ...statFields(snapshot, display), notice]);
}
