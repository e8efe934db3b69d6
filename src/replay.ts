/**
 * @fileoverview Event log playback for the CLI
 *
 * Event logs are JSON lines, one host event per line:
 *
 * ```json
 * {"type": "session:start", "payload": {"session_id": "abc"}, "at": 0}
 * {"type": "tool:pre", "payload": {"tool_name": "bash"}, "at": 1200}
 * ```
 *
 * `at` is the offset in milliseconds from the start of playback. Records
 * without `at` follow the previous record immediately.
 *
 * @module replay
 */

import { z } from 'zod';
import type { SessionIndicator } from './session-indicator.js';

const EventRecordSchema = z.object({
  type: z.string().min(1),
  payload: z.unknown().optional(),
  at: z.number().nonnegative().optional(),
});

export interface EventRecord {
  type: string;
  payload?: unknown;
  /** Offset from playback start (ms) */
  at: number;
}

export interface ParseResult {
  records: EventRecord[];
  /** 1-based line numbers that could not be parsed */
  skippedLines: number[];
}

/**
 * Parse a JSON-lines event log. Blank lines are ignored; bad lines are
 * reported and skipped. Offsets never go backwards.
 */
export function parseEventLog(content: string): ParseResult {
  const records: EventRecord[] = [];
  const skippedLines: number[] = [];
  let lastAt = 0;

  content.split(/\r?\n/).forEach((line, i) => {
    if (line.trim() === '') return;
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      skippedLines.push(i + 1);
      return;
    }
    const result = EventRecordSchema.safeParse(json);
    if (!result.success) {
      skippedLines.push(i + 1);
      return;
    }
    lastAt = Math.max(lastAt, result.data.at ?? lastAt);
    records.push({ type: result.data.type, payload: result.data.payload, at: lastAt });
  });

  return { records, skippedLines };
}

export interface PlaybackOptions {
  /** Playback speed multiplier (2 = twice as fast) */
  speed?: number;
}

/** Handle to a running playback */
export interface Playback {
  /** Resolves after the last record has been delivered or playback was cancelled */
  done: Promise<void>;
  cancel(): void;
}

/**
 * Deliver records to the indicator at their recorded offsets.
 */
export function playEvents(
  indicator: Pick<SessionIndicator, 'onEvent'>,
  records: readonly EventRecord[],
  options: PlaybackOptions = {}
): Playback {
  const speed = options.speed && options.speed > 0 ? options.speed : 1;
  const timers: NodeJS.Timeout[] = [];
  let finish: () => void = () => {};
  const done = new Promise<void>((resolve) => {
    finish = resolve;
  });

  if (records.length === 0) {
    finish();
  }

  records.forEach((record, i) => {
    const timer = setTimeout(() => {
      indicator.onEvent(record.type, record.payload);
      if (i === records.length - 1) finish();
    }, record.at / speed);
    timers.push(timer);
  });

  return {
    done,
    cancel: () => {
      for (const timer of timers) clearTimeout(timer);
      finish();
    },
  };
}
