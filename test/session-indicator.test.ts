import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventEmitter } from 'node:events';
import {
  mount,
  SessionIndicator,
  SUBSCRIBED_EVENTS,
  type HookCoordinator,
  type SessionIndicatorOptions,
} from '../src/session-indicator.js';
import { ManualClock } from '../src/clock.js';
import type { LineWriter, TerminalStream } from '../src/terminal.js';

/**
 * SessionIndicator Tests
 *
 * End-to-end behaviour of the mounted hook: host events in, status lines
 * out, Ctrl+C escalation callbacks and teardown. Signals come from a mock
 * target, never the real process.
 */

/**
 * Mock line writer that records rendered lines
 */
class MockWriter implements LineWriter {
  lines: string[] = [];
  finished = 0;
  failing = false;

  show(): void {}

  update(line: string): void {
    if (this.failing) throw new Error('stream closed');
    this.lines.push(line);
  }

  finish(): void {
    this.finished++;
  }
}

/**
 * Mock SIGINT source
 */
class MockSignalTarget extends EventEmitter {
  sendSigint(): void {
    this.emit('SIGINT');
  }
}

/**
 * Mock TTY stream
 */
class MockStream extends EventEmitter implements TerminalStream {
  chunks: string[] = [];
  isTTY = true;
  columns = 120;

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }
}

const NO_COLOR_ENV = { NO_COLOR: '1' };

describe('SessionIndicator', () => {
  let clock: ManualClock;
  let writer: MockWriter;
  let signals: MockSignalTarget;
  let indicator: SessionIndicator | null;

  beforeEach(() => {
    vi.useFakeTimers();
    clock = new ManualClock();
    writer = new MockWriter();
    signals = new MockSignalTarget();
    indicator = null;
  });

  afterEach(() => {
    indicator?.dispose();
  });

  function create(config: Record<string, unknown> = {}, extra: SessionIndicatorOptions = {}): SessionIndicator {
    indicator = new SessionIndicator(config, {
      clock,
      writer,
      env: NO_COLOR_ENV,
      signalTarget: signals,
      ...extra,
    });
    return indicator;
  }

  describe('Subscription', () => {
    it('should list every host event it handles', () => {
      const hook = create();
      expect(hook.subscribedEvents).toBe(SUBSCRIBED_EVENTS);
      expect(hook.subscribedEvents).toHaveLength(14);
      expect(hook.subscribedEvents).toContain('llm:stream_chunk');
      expect(hook.subscribedEvents).toContain('task:agent_complete');
    });

    it('should register itself through mount()', () => {
      const registerHook = vi.fn();
      const coordinator: HookCoordinator = { registerHook };

      const hook = mount(coordinator, { position: 'inline' }, { clock, writer, env: NO_COLOR_ENV });
      indicator = hook;

      expect(registerHook).toHaveBeenCalledWith(hook);
      expect(hook.config.position).toBe('inline');
    });
  });

  describe('Rendering', () => {
    it('should start rendering on session:start', async () => {
      const hook = create();
      expect(writer.lines).toEqual([]);

      hook.onEvent('session:start', { session_id: 'sess-1' });
      await Promise.resolve();

      expect(writer.lines).toEqual(['⠋ waiting for input │ 0↑ 0↓ │ 00:00']);
    });

    it('should follow a session through to its final line', async () => {
      const hook = create();
      const stopped = vi.fn();
      hook.on('renderStopped', stopped);

      hook.onEvent('session:start');
      await Promise.resolve();

      hook.onEvent('turn:start');
      hook.onEvent('tool:pre', { tool_name: 'bash' });
      await Promise.resolve();
      clock.advance(100);
      vi.advanceTimersByTime(100);
      expect(writer.lines[writer.lines.length - 1]).toBe('⠙ executing: bash │ 0↑ 0↓ │ 00:00');

      hook.onEvent('llm:response', { usage: { input_tokens: 1200, output_tokens: 340 } });
      hook.onEvent('turn:end');
      hook.onEvent('session:end');
      await Promise.resolve();
      clock.advance(1900);
      vi.advanceTimersByTime(100);

      expect(writer.lines[writer.lines.length - 1]).toBe('✓ Session complete │ 1.2K↑ 340↓ │ 00:00 │ 1 turns');
      expect(writer.finished).toBe(1);
      expect(stopped).toHaveBeenCalledTimes(1);
      expect(hook.snapshot().activity).toBe('done');
    });

    it('should not render when AMPLIFIER_NO_STATUS is set', async () => {
      const hook = create({}, { env: { AMPLIFIER_NO_STATUS: '1' } });
      expect(hook.rendering).toBe(false);

      hook.onEvent('session:start');
      hook.onEvent('llm:request', { token_count: 9 });
      await Promise.resolve();

      expect(writer.lines).toEqual([]);
      expect(hook.snapshot().tokensIn).toBe(9);
    });

    it('should not render to a stream that is not a TTY', () => {
      const stream = new MockStream();
      stream.isTTY = false;
      const hook = create({}, { writer: undefined, stream });
      expect(hook.rendering).toBe(false);
    });

    it('should build a status line on a TTY stream', async () => {
      const stream = new MockStream();
      const hook = create({ position: 'inline' }, { writer: undefined, stream, env: {} });

      hook.onEvent('session:start');
      await Promise.resolve();

      expect(stream.chunks).toHaveLength(1);
      expect(stream.chunks[0].startsWith('\x1b[1G\x1b[2K')).toBe(true);
    });

    it('should not leave error listeners on a shared stream after dispose', () => {
      const stream = new MockStream();
      for (let i = 0; i < 12; i++) {
        create({}, { writer: undefined, stream, env: {} }).dispose();
      }
      expect(stream.listenerCount('error')).toBe(0);
    });

    it('should warn once when the status line cannot be written', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      writer.failing = true;
      const hook = create();

      hook.onEvent('session:start');
      await Promise.resolve();
      vi.advanceTimersByTime(500);

      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith('[session-indicator] Status line write failed: stream closed');
    });
  });

  describe('Host safety', () => {
    it('should swallow malformed events', async () => {
      const hook = create();
      expect(() => hook.onEvent('tool:pre', 'bash')).not.toThrow();
      expect(() => hook.onEvent('unknown:event', {})).not.toThrow();
      await Promise.resolve();
      expect(hook.snapshot().activity).toBe('idle');
    });

    it('should warn about invalid config and keep defaults', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const hook = create({ update_interval: -1 });

      expect(hook.config.updateIntervalMs).toBe(100);
      expect(warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('Ctrl+C escalation', () => {
    let onCancel: ReturnType<typeof vi.fn>;
    let onAbort: ReturnType<typeof vi.fn>;
    let onExit: ReturnType<typeof vi.fn>;

    beforeEach(() => {
      onCancel = vi.fn();
      onAbort = vi.fn();
      onExit = vi.fn();
      vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    it('should not listen for SIGINT unless enabled', () => {
      create({}, { onCancel });
      expect(signals.listenerCount('SIGINT')).toBe(0);
      signals.sendSigint();
      expect(onCancel).not.toHaveBeenCalled();
    });

    it('should call cancel, abort and exit handlers in turn', () => {
      create({ handle_interrupts: true }, { onCancel, onAbort, onExit });

      signals.sendSigint();
      expect(onCancel).toHaveBeenCalledTimes(1);
      clock.advance(500);
      signals.sendSigint();
      expect(onAbort).toHaveBeenCalledTimes(1);
      clock.advance(500);
      signals.sendSigint();
      expect(onExit).toHaveBeenCalledTimes(1);

      expect(indicator?.escalation.peek().level).toBe('normal');
    });

    it('should start over after the window expires', () => {
      const hook = create({}, { onCancel, onAbort });
      expect(hook.interrupt()).toBe('cancel');
      clock.advance(2000);
      expect(hook.interrupt()).toBe('cancel');

      expect(onCancel).toHaveBeenCalledTimes(2);
      expect(onAbort).not.toHaveBeenCalled();
    });

    it('should clear an open escalation window when a new session starts', async () => {
      const hook = create({}, { onCancel, onAbort });
      hook.interrupt();
      expect(hook.escalation.peek().level).toBe('cancel');

      hook.onEvent('session:start');
      await Promise.resolve();

      expect(hook.escalation.peek().level).toBe('normal');
      expect(hook.interrupt()).toBe('cancel');
      expect(onAbort).not.toHaveBeenCalled();
    });

    it('should print a hint when no status line is running', () => {
      const hook = create({}, { onCancel });
      hook.interrupt();
      expect(console.error).toHaveBeenCalledWith('\n⚠ Canceling current operation... (press again to abort turn)');
    });

    it('should show the escalation on the status line instead of printing', async () => {
      const hook = create({}, { onCancel });
      hook.onEvent('session:start');
      await Promise.resolve();

      hook.interrupt();
      vi.advanceTimersByTime(100);

      expect(console.error).not.toHaveBeenCalled();
      expect(writer.lines[writer.lines.length - 1])
        .toBe('⠙ waiting for input │ 0↑ 0↓ │ 00:00 │ cancel requested (Ctrl+C again to abort turn)');
    });

    it('should exit with code 130 by default', () => {
      const exit = vi.spyOn(process, 'exit').mockImplementation((code) => {
        throw new Error(`exit ${String(code)}`);
      });
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const hook = create();

      hook.interrupt();
      hook.interrupt();
      hook.interrupt();

      expect(exit).toHaveBeenCalledWith(130);
      expect(warn).toHaveBeenCalledWith('[session-indicator] emergency handler failed: exit 130');
    });

    it('should keep going when a handler throws', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const hook = create({}, {
        onCancel: () => {
          throw new Error('host busy');
        },
      });

      expect(hook.interrupt()).toBe('cancel');
      expect(warn).toHaveBeenCalledWith('[session-indicator] cancel handler failed: host busy');
    });
  });

  describe('dispose', () => {
    it('should apply queued events, stop rendering and release SIGINT', async () => {
      const hook = create({ handle_interrupts: true });
      hook.onEvent('session:start');
      await Promise.resolve();
      expect(hook.rendering).toBe(true);

      hook.onEvent('llm:request', { token_count: 42 });
      hook.dispose();

      expect(hook.snapshot().tokensIn).toBe(42);
      expect(signals.listenerCount('SIGINT')).toBe(0);

      const linesBefore = writer.lines.length;
      vi.advanceTimersByTime(1000);
      expect(writer.lines).toHaveLength(linesBefore);
    });

    it('should ignore events after dispose', async () => {
      const hook = create();
      hook.dispose();
      hook.onEvent('session:start', { session_id: 'late' });
      await Promise.resolve();
      expect(hook.snapshot().sessionId).toBeUndefined();
    });
  });

  describe('Debug logging', () => {
    it('should print component logs only when debug is on', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});

      const quiet = create();
      quiet.onEvent('session:start');
      await Promise.resolve();
      expect(error).not.toHaveBeenCalled();
      quiet.dispose();

      const loud = create({ debug: true });
      loud.onEvent('session:start', { session_id: 'dbg' });
      await Promise.resolve();
      expect(error.mock.calls.some(([msg]) => typeof msg === 'string' && msg.endsWith('[StateTracker] Session started: dbg'))).toBe(true);
    });
  });
});
