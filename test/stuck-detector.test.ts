import { describe, it, expect } from 'vitest';
import { detectStuck } from '../src/stuck-detector.js';

describe('detectStuck', () => {
  const active = { lastActivityAt: 10_000, terminal: false };

  it('should not flag a session below the threshold', () => {
    const status = detectStuck(active, 69_999, 60_000);
    expect(status).toEqual({ stuck: false, idleMs: 59_999, critical: false });
  });

  it('should flag a session idle for exactly the threshold', () => {
    const status = detectStuck(active, 70_000, 60_000);
    expect(status.stuck).toBe(true);
    expect(status.idleMs).toBe(60_000);
  });

  it('should never flag a terminal session', () => {
    const status = detectStuck({ lastActivityAt: 10_000, terminal: true }, 1_000_000, 60_000, 180_000);
    expect(status.stuck).toBe(false);
    expect(status.critical).toBe(false);
    expect(status.idleMs).toBe(990_000);
  });

  it('should clamp idle time when the clock reads before the last activity', () => {
    const status = detectStuck(active, 5_000, 60_000);
    expect(status.idleMs).toBe(0);
    expect(status.stuck).toBe(false);
  });

  it('should flag everything with a zero threshold', () => {
    expect(detectStuck(active, 10_000, 0).stuck).toBe(true);
  });

  it('should mark critical past the critical threshold', () => {
    expect(detectStuck(active, 189_999, 60_000, 180_000).critical).toBe(false);
    expect(detectStuck(active, 190_000, 60_000, 180_000).critical).toBe(true);
  });

  it('should never be critical without a critical threshold', () => {
    expect(detectStuck(active, Number.MAX_SAFE_INTEGER, 60_000).critical).toBe(false);
  });
});
