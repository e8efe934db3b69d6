/**
 * @fileoverview Scripted demo session for the CLI `demo` command
 *
 * @module demo
 */

import { v4 as uuidv4 } from 'uuid';
import type { EventRecord } from './replay.js';

export interface DemoOptions {
  /** Insert a silent stretch long enough to trigger the stuck warning (ms) */
  stallMs?: number;
}

/**
 * Build a short session: one turn with thinking, streaming, two tools and
 * a delegated sub-agent, then a clean end.
 */
export function buildDemoSession(options: DemoOptions = {}): EventRecord[] {
  const sessionId = uuidv4();
  const subSessionId = uuidv4();
  const stall = options.stallMs ?? 0;
  const records: EventRecord[] = [];
  let at = 0;

  const step = (delayMs: number, type: string, payload?: unknown): void => {
    at += delayMs;
    records.push({ type, payload, at });
  };

  step(0, 'session:start', { session_id: sessionId });
  step(300, 'turn:start');
  step(200, 'llm:request', { token_count: 1840 });
  step(1500, 'llm:stream_start');
  step(1200, 'llm:stream_end');
  step(100, 'llm:response', { usage: { input_tokens: 0, output_tokens: 412 } });
  step(200, 'tool:pre', { tool_name: 'read_file' });
  step(900, 'tool:post');
  step(200, 'tool:pre', { tool_name: 'bash' });
  step(2000 + stall, 'tool:post');
  step(200, 'task:agent_spawned', { agent: 'explorer', session_id: subSessionId });
  step(2500, 'task:agent_complete', { session_id: subSessionId });
  step(200, 'llm:request', { token_count: 3120 });
  step(1600, 'llm:response', { token_count: 655 });
  step(100, 'turn:end');
  step(800, 'session:end');

  return records;
}
