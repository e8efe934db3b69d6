import { describe, it, expect, beforeEach, vi } from 'vitest';
import { parseEventLog, playEvents, type EventRecord } from '../src/replay.js';
import { buildDemoSession } from '../src/demo.js';
import { decodeHostEvent } from '../src/event-ingestor.js';

/**
 * Replay and Demo Tests
 */

/**
 * Mock indicator that records delivered events
 */
class MockIndicator {
  events: Array<{ type: string; payload: unknown }> = [];

  onEvent(type: string, payload?: unknown): void {
    this.events.push({ type, payload });
  }
}

describe('parseEventLog', () => {
  it('should parse records and skip blank lines', () => {
    const content = [
      '{"type": "session:start", "payload": {"session_id": "abc"}, "at": 0}',
      '',
      '{"type": "tool:pre", "payload": {"tool_name": "bash"}, "at": 1200}',
      '   ',
    ].join('\n');

    const { records, skippedLines } = parseEventLog(content);
    expect(skippedLines).toEqual([]);
    expect(records).toEqual([
      { type: 'session:start', payload: { session_id: 'abc' }, at: 0 },
      { type: 'tool:pre', payload: { tool_name: 'bash' }, at: 1200 },
    ]);
  });

  it('should report unparseable lines by 1-based number', () => {
    const content = [
      '{"type": "turn:start", "at": 10}',
      'not json',
      '{"payload": {}}',
      '{"type": "turn:end", "at": -5}',
      '{"type": "turn:end", "at": 20}',
    ].join('\r\n');

    const { records, skippedLines } = parseEventLog(content);
    expect(skippedLines).toEqual([2, 3, 4]);
    expect(records.map((r) => r.type)).toEqual(['turn:start', 'turn:end']);
  });

  it('should carry offsets forward and never go backwards', () => {
    const content = [
      '{"type": "turn:start", "at": 500}',
      '{"type": "tool:pre"}',
      '{"type": "tool:post", "at": 100}',
    ].join('\n');

    expect(parseEventLog(content).records.map((r) => r.at)).toEqual([500, 500, 500]);
  });
});

describe('playEvents', () => {
  let indicator: MockIndicator;

  beforeEach(() => {
    vi.useFakeTimers();
    indicator = new MockIndicator();
  });

  const records: EventRecord[] = [
    { type: 'session:start', at: 0 },
    { type: 'turn:start', at: 1000 },
    { type: 'session:end', at: 3000 },
  ];

  it('should deliver records at their offsets', async () => {
    const playback = playEvents(indicator, records);

    vi.advanceTimersByTime(0);
    expect(indicator.events.map((e) => e.type)).toEqual(['session:start']);
    vi.advanceTimersByTime(1000);
    expect(indicator.events).toHaveLength(2);
    vi.advanceTimersByTime(2000);
    expect(indicator.events).toHaveLength(3);

    await expect(playback.done).resolves.toBeUndefined();
  });

  it('should scale offsets by speed', () => {
    playEvents(indicator, records, { speed: 4 });
    vi.advanceTimersByTime(750);
    expect(indicator.events).toHaveLength(3);
  });

  it('should stop delivering after cancel', async () => {
    const playback = playEvents(indicator, records);
    vi.advanceTimersByTime(1500);
    playback.cancel();
    vi.advanceTimersByTime(5000);

    expect(indicator.events).toHaveLength(2);
    await expect(playback.done).resolves.toBeUndefined();
  });

  it('should resolve at once for an empty log', async () => {
    await expect(playEvents(indicator, []).done).resolves.toBeUndefined();
  });
});

describe('buildDemoSession', () => {
  it('should script a complete session with increasing offsets', () => {
    const records = buildDemoSession();
    expect(records[0].type).toBe('session:start');
    expect(records[records.length - 1].type).toBe('session:end');
    expect(records).toHaveLength(16);

    for (let i = 1; i < records.length; i++) {
      expect(records[i].at).toBeGreaterThanOrEqual(records[i - 1].at);
    }
  });

  it('should only contain events the ingestor understands', () => {
    for (const record of buildDemoSession()) {
      expect(decodeHostEvent(record.type, record.payload)).not.toBeNull();
    }
  });

  it('should stretch the tool call by the stall', () => {
    const base = buildDemoSession();
    const stalled = buildDemoSession({ stallMs: 8000 });
    expect(stalled[stalled.length - 1].at - base[base.length - 1].at).toBe(8000);
  });

  it('should use a fresh session id per run', () => {
    const first = decodeHostEvent('session:start', buildDemoSession()[0].payload);
    const second = decodeHostEvent('session:start', buildDemoSession()[0].payload);
    expect(first).not.toEqual(second);
  });
});
